/**
 * NDS Coordinate Constants
 *
 * The NDS encoding divides 360° into 2^32 units. Longitude uses the full
 * signed 32-bit range; latitude covers only 180° and therefore half of it,
 * so one unit has the same size on both axes.
 */

/** Largest longitude value (Integer.MAX_VALUE) */
export const MAX_LONGITUDE = 2 ** 31 - 1;

/** Smallest longitude value (Integer.MIN_VALUE) */
export const MIN_LONGITUDE = -(2 ** 31);

/** Largest latitude value (2^30 - 1) */
export const MAX_LATITUDE = Math.floor(MAX_LONGITUDE / 2);

/** Smallest latitude value (-2^30) */
export const MIN_LATITUDE = Math.floor(MIN_LONGITUDE / 2);

export const LONGITUDE_RANGE = MAX_LONGITUDE - MIN_LONGITUDE;
export const LATITUDE_RANGE = MAX_LATITUDE - MIN_LATITUDE;

/** Finest tile level */
export const MAX_LEVEL = 15;

/**
 * Wrap an integer to 32-bit two's complement, the way fixed-width integer
 * arithmetic overflows.
 */
export function toInt32(value: number): number {
  return value | 0;
}
