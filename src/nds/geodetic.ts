/**
 * Geodetic Conversion
 *
 * Functions for converting between NDS fixed-point units and WGS84 degrees.
 */

import {
  MAX_LONGITUDE,
  MIN_LONGITUDE,
  MAX_LATITUDE,
  MIN_LATITUDE,
  LONGITUDE_RANGE,
  LATITUDE_RANGE,
} from "./constants";

/** Longitude/latitude pair, in whichever unit the caller works with */
export interface LonLat {
  longitude: number;
  latitude: number;
}

/**
 * Convert WGS84 degrees to NDS units.
 *
 * Values are truncated toward zero. Range checking is left to the caller.
 *
 * @param longitude - Longitude in degrees (-180 to 180)
 * @param latitude - Latitude in degrees (-90 to 90)
 */
export function degreesToUnits(longitude: number, latitude: number): LonLat {
  return {
    longitude: Math.trunc((longitude / 360) * LONGITUDE_RANGE),
    latitude: Math.trunc((latitude / 180) * LATITUDE_RANGE),
  };
}

/**
 * Convert NDS units to WGS84 degrees.
 *
 * Positive and negative values are scaled separately because
 * |MIN| = |MAX| + 1 on both axes.
 */
export function unitsToDegrees(longitude: number, latitude: number): LonLat {
  return {
    longitude:
      longitude >= 0
        ? (longitude / MAX_LONGITUDE) * 180
        : (longitude / MIN_LONGITUDE) * -180,
    latitude:
      latitude >= 0
        ? (latitude / MAX_LATITUDE) * 90
        : (latitude / MIN_LATITUDE) * -90,
  };
}
