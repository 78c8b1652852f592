/**
 * WGS84 Module
 *
 * Plain degree-based coordinate and bounding box values with GeoJSON output.
 */

export { Wgs84Coordinate } from "./Wgs84Coordinate";
export { Wgs84BBox } from "./Wgs84BBox";
export { stringifyFeature } from "./geojson";
