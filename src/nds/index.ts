/**
 * NDS Module
 *
 * Fixed-point coordinates, Morton codes and the tile addressing scheme of
 * the Navigation Data Standard.
 */

export {
  MAX_LONGITUDE,
  MIN_LONGITUDE,
  MAX_LATITUDE,
  MIN_LATITUDE,
  LONGITUDE_RANGE,
  LATITUDE_RANGE,
  MAX_LEVEL,
  toInt32,
} from "./constants";

export { encodeMorton, decodeMorton } from "./morton";
export type { MortonPair } from "./morton";

export { degreesToUnits, unitsToDegrees } from "./geodetic";
export type { LonLat } from "./geodetic";

export { NdsCoordinate } from "./NdsCoordinate";
export { NdsBBox } from "./NdsBBox";
export { NdsTile } from "./NdsTile";
export type { GridCoordinates, TileCoordinate } from "./NdsTile";
export { MalformedTileIdError } from "./errors";
