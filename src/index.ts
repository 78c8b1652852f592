/**
 * nds-tiles - NDS fixed-point coordinates and tile addressing
 */

export const VERSION = "0.1.0";

export * from "./nds";
export { Wgs84Coordinate, Wgs84BBox, stringifyFeature } from "./wgs84";
export { formatBinary, logBinary } from "./debug/binary";
export {
  type LogLevel,
  type Logger,
  LOG_LEVELS,
  createLogger,
  setLogLevel,
  getLogLevel,
  isLogLevel,
} from "./log";
