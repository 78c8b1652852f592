/**
 * GeoJSON text rendering.
 */

import type { Feature } from "geojson";

/**
 * Render a feature as indented JSON text.
 */
export function stringifyFeature(feature: Feature): string {
  return JSON.stringify(feature, null, 2);
}
