import { parseParameters } from "../provenance/parameters.js";
import type { ConfigLayer, Environment } from "./types.js";

export const ENV_KEYS = {
  buildType: ["PROVENANCE_BUILD_TYPE"],
  builderId: ["PROVENANCE_BUILDER_ID"],
  invocationId: ["PROVENANCE_INVOCATION_ID"],
  timestampBegin: ["PROVENANCE_TIMESTAMP_BEGIN"],
  timestampEnd: ["PROVENANCE_TIMESTAMP_END", "PROVENANCE_TIMESTAMP_FINISHED"],
  externalParameters: [
    "PROVENANCE_EXTERNAL_PARAMS",
    "PROVENANCE_EXTERNAL_PARAMETERS",
  ],
  internalParameters: [
    "PROVENANCE_INTERNAL_PARAMS",
    "PROVENANCE_INTERNAL_PARAMETERS",
  ],
  outputFile: ["PROVENANCE_OUTPUT_FILE"],
} as const satisfies Record<keyof ConfigLayer, readonly string[]>;

/**
 * Read the recognized PROVENANCE_* variables once. Empty variables count as
 * unset; the first listed name of an alias group wins.
 */
export function readEnvConfig(env: Environment): ConfigLayer {
  const layer: ConfigLayer = {};

  const buildType = pick(env, ENV_KEYS.buildType);
  if (buildType) {
    layer.buildType = buildType.value;
  }
  const builderId = pick(env, ENV_KEYS.builderId);
  if (builderId) {
    layer.builderId = builderId.value;
  }
  const invocationId = pick(env, ENV_KEYS.invocationId);
  if (invocationId) {
    layer.invocationId = invocationId.value;
  }
  const timestampBegin = pick(env, ENV_KEYS.timestampBegin);
  if (timestampBegin) {
    layer.timestampBegin = timestampBegin.value;
  }
  const timestampEnd = pick(env, ENV_KEYS.timestampEnd);
  if (timestampEnd) {
    layer.timestampEnd = timestampEnd.value;
  }
  const external = pick(env, ENV_KEYS.externalParameters);
  if (external) {
    layer.externalParameters = parseParameters(external.value, external.key);
  }
  const internal = pick(env, ENV_KEYS.internalParameters);
  if (internal) {
    layer.internalParameters = parseParameters(internal.value, internal.key);
  }
  const outputFile = pick(env, ENV_KEYS.outputFile);
  if (outputFile) {
    layer.outputFile = outputFile.value;
  }

  return layer;
}

function pick(
  env: Environment,
  keys: readonly string[],
): { key: string; value: string } | undefined {
  for (const key of keys) {
    const value = env[key];
    if (value !== undefined && value !== "") {
      return { key, value };
    }
  }
  return undefined;
}
