/**
 * WGS84 bounding box in degrees.
 */

import type { Feature, Polygon } from "geojson";

export class Wgs84BBox {
  constructor(
    readonly north: number,
    readonly east: number,
    readonly south: number,
    readonly west: number
  ) {}

  /**
   * GeoJSON "Polygon" feature tracing the box counter-clockwise from its
   * south-west corner.
   */
  toGeoJSON(): Feature<Polygon> {
    return {
      type: "Feature",
      properties: {},
      geometry: {
        type: "Polygon",
        coordinates: [
          [
            [this.west, this.south],
            [this.east, this.south],
            [this.east, this.north],
            [this.west, this.north],
            [this.west, this.south],
          ],
        ],
      },
    };
  }
}
