/**
 * Bounding box in NDS units.
 *
 * Kept separate from NdsTile so a tile's box can be passed around without
 * the tile itself.
 */

import type { Feature, Polygon } from "geojson";
import {
  MAX_LONGITUDE,
  MIN_LONGITUDE,
  MAX_LATITUDE,
  MIN_LATITUDE,
} from "./constants";
import { NdsCoordinate } from "./NdsCoordinate";
import { Wgs84BBox } from "../wgs84/Wgs84BBox";

export class NdsBBox {
  readonly north: number;
  readonly east: number;
  readonly south: number;
  readonly west: number;

  /**
   * West may exceed east for a box crossing the antimeridian; the values
   * are stored as given.
   *
   * @throws RangeError if north is below south
   */
  constructor(north: number, east: number, south: number, west: number) {
    if (north < south) {
      throw new RangeError(
        `Bounding box north ${north} lies below south ${south}.`
      );
    }
    this.north = north;
    this.east = east;
    this.south = south;
    this.west = west;
  }

  /** Level 0 tile 0: longitudes [0, MAX_LONGITUDE] */
  static eastHemisphere(): NdsBBox {
    return new NdsBBox(MAX_LATITUDE, MAX_LONGITUDE, MIN_LATITUDE, 0);
  }

  /** Level 0 tile 1: longitudes [MIN_LONGITUDE, 0] */
  static westHemisphere(): NdsBBox {
    return new NdsBBox(MAX_LATITUDE, 0, MIN_LATITUDE, MIN_LONGITUDE);
  }

  southWest(): NdsCoordinate {
    return NdsCoordinate.fromUnits(this.west, this.south);
  }

  southEast(): NdsCoordinate {
    return NdsCoordinate.fromUnits(this.east, this.south);
  }

  northWest(): NdsCoordinate {
    return NdsCoordinate.fromUnits(this.west, this.north);
  }

  northEast(): NdsCoordinate {
    return NdsCoordinate.fromUnits(this.east, this.north);
  }

  center(): NdsCoordinate {
    return NdsCoordinate.fromUnits(
      Math.floor((this.east + this.west) / 2),
      Math.floor((this.north + this.south) / 2)
    );
  }

  toWgs84(): Wgs84BBox {
    const ne = this.northEast().toWgs84();
    const sw = this.southWest().toWgs84();
    return new Wgs84BBox(ne.latitude, ne.longitude, sw.latitude, sw.longitude);
  }

  toGeoJSON(): Feature<Polygon> {
    return this.toWgs84().toGeoJSON();
  }

  equals(other: NdsBBox): boolean {
    return (
      this.north === other.north &&
      this.east === other.east &&
      this.south === other.south &&
      this.west === other.west
    );
  }
}
