/**
 * NDS fixed-point coordinate.
 *
 * Each axis is a signed integer where one unit is 360/2^32 = 90/2^30
 * degrees. Longitude spans [-2^31, 2^31-1]; latitude spans only
 * [-2^30, 2^30-1] since its degree range is half as wide.
 */

import type { Feature, Point } from "geojson";
import {
  MAX_LONGITUDE,
  MIN_LONGITUDE,
  MAX_LATITUDE,
  MIN_LATITUDE,
  toInt32,
} from "./constants";
import { encodeMorton, decodeMorton } from "./morton";
import { degreesToUnits, unitsToDegrees } from "./geodetic";
import { Wgs84Coordinate } from "../wgs84/Wgs84Coordinate";
import { createLogger } from "../log";
import { logBinary } from "../debug/binary";

const log = createLogger("NdsCoordinate");

export class NdsCoordinate {
  readonly longitude: number;
  readonly latitude: number;

  private constructor(longitude: number, latitude: number) {
    this.longitude = longitude;
    this.latitude = latitude;
  }

  /**
   * Create a coordinate from NDS units.
   *
   * Inputs wrap to 32-bit two's complement, then values above the axis
   * maximum are clamped to it.
   *
   * @throws RangeError if an input is not an integer or a value is below
   * the axis minimum
   */
  static fromUnits(longitude: number, latitude: number): NdsCoordinate {
    if (!Number.isInteger(longitude) || !Number.isInteger(latitude)) {
      throw new RangeError(
        `NDS units must be integers, got (${longitude}, ${latitude}).`
      );
    }
    const lon = Math.min(toInt32(longitude), MAX_LONGITUDE);
    const lat = Math.min(toInt32(latitude), MAX_LATITUDE);
    NdsCoordinate.verify(lon, lat);
    return new NdsCoordinate(lon, lat);
  }

  /**
   * Create a coordinate from WGS84 degrees.
   *
   * @throws RangeError if longitude is outside [-180, 180] or latitude
   * outside [-90, 90]
   */
  static fromDegrees(longitude: number, latitude: number): NdsCoordinate {
    return NdsCoordinate.fromWgs84(new Wgs84Coordinate(longitude, latitude));
  }

  static fromWgs84(coordinate: Wgs84Coordinate): NdsCoordinate {
    const units = degreesToUnits(coordinate.longitude, coordinate.latitude);
    return NdsCoordinate.fromUnits(units.longitude, units.latitude);
  }

  /**
   * Create a coordinate from its Morton code.
   */
  static fromMorton(code: bigint): NdsCoordinate {
    const { longitude, latitude } = decodeMorton(code);
    logBinary(log, longitude, "lon binary");
    logBinary(log, latitude, "lat binary");
    log.debug(`lat: ${latitude}, lon: ${longitude}`);
    return NdsCoordinate.fromUnits(longitude, latitude);
  }

  private static verify(longitude: number, latitude: number): void {
    if (longitude < MIN_LONGITUDE || longitude > MAX_LONGITUDE) {
      throw new RangeError(
        `Longitude value ${longitude} exceeds allowed range [${MIN_LONGITUDE}, ${MAX_LONGITUDE}].`
      );
    }
    if (latitude < MIN_LATITUDE || latitude > MAX_LATITUDE) {
      throw new RangeError(
        `Latitude value ${latitude} exceeds allowed range [${MIN_LATITUDE}, ${MAX_LATITUDE}].`
      );
    }
  }

  /**
   * Offset this coordinate by a number of units on each axis.
   * Useful when decoding coordinates stored relative to a tile.
   */
  add(deltaLongitude: number, deltaLatitude: number): NdsCoordinate {
    return NdsCoordinate.fromUnits(
      this.longitude + deltaLongitude,
      this.latitude + deltaLatitude
    );
  }

  mortonCode(): bigint {
    return encodeMorton(this.longitude, this.latitude);
  }

  toWgs84(): Wgs84Coordinate {
    const { longitude, latitude } = unitsToDegrees(
      this.longitude,
      this.latitude
    );
    return new Wgs84Coordinate(longitude, latitude);
  }

  toGeoJSON(): Feature<Point> {
    return this.toWgs84().toGeoJSON();
  }

  equals(other: NdsCoordinate): boolean {
    return (
      this.longitude === other.longitude && this.latitude === other.latitude
    );
  }

  toString(): string {
    return `NdsCoordinate(${this.longitude}, ${this.latitude})`;
  }
}
