/**
 * WGS84 coordinate in degrees.
 */

import type { Feature, Point } from "geojson";

export class Wgs84Coordinate {
  readonly longitude: number;
  readonly latitude: number;

  /**
   * @param longitude - Longitude in degrees, within [-180, 180]
   * @param latitude - Latitude in degrees, within [-90, 90]
   * @throws RangeError if either value is outside its range
   */
  constructor(longitude: number, latitude: number) {
    if (!(longitude >= -180 && longitude <= 180)) {
      throw new RangeError(
        `The longitude value ${longitude} exceeds the valid range of [-180, 180].`
      );
    }
    if (!(latitude >= -90 && latitude <= 90)) {
      throw new RangeError(
        `The latitude value ${latitude} exceeds the valid range of [-90, 90].`
      );
    }
    this.longitude = longitude;
    this.latitude = latitude;
  }

  /** GeoJSON "Point" feature for this coordinate */
  toGeoJSON(): Feature<Point> {
    return {
      type: "Feature",
      properties: {},
      geometry: {
        type: "Point",
        coordinates: [this.longitude, this.latitude],
      },
    };
  }
}
