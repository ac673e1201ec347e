import type { ConfigLayer, ProvenanceConfig } from "./types.js";

/**
 * Fold layers lowest precedence first. A layer only overrides the keys it
 * sets; parameter objects are replaced whole, not merged.
 */
export function mergeConfig(...layers: readonly ConfigLayer[]): ProvenanceConfig {
  const merged: ConfigLayer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }
  return {
    ...merged,
    externalParameters: merged.externalParameters ?? {},
    internalParameters: merged.internalParameters ?? {},
  };
}
