import fs from "node:fs/promises";
import yaml from "js-yaml";
import { ConfigParseError } from "../errors.js";
import { isPlainObject, parseParameters } from "../provenance/parameters.js";
import type { ConfigLayer } from "./types.js";

const STRING_KEYS = [
  "buildType",
  "builderId",
  "invocationId",
  "outputFile",
] as const;
const TIMESTAMP_KEYS = ["timestampBegin", "timestampEnd"] as const;
const PARAMETER_KEYS = ["externalParameters", "internalParameters"] as const;
const KNOWN_KEYS = new Set<string>([
  ...STRING_KEYS,
  ...TIMESTAMP_KEYS,
  ...PARAMETER_KEYS,
]);

export async function loadConfigFile(configPath: string): Promise<ConfigLayer> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigParseError(configPath, `cannot read file (${detail})`, error);
  }
  return parseConfigDocument(raw, configPath);
}

/**
 * Validate a YAML (or JSON) config document. Parameter sections may be
 * mappings or JSON strings, matching what the environment variables carry.
 */
export function parseConfigDocument(raw: string, source: string): ConfigLayer {
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigParseError(source, `malformed YAML (${detail})`, error);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigParseError(source, "config must be a mapping");
  }

  const errors: string[] = [];
  for (const key of Object.keys(parsed)) {
    if (!KNOWN_KEYS.has(key)) {
      errors.push(`unknown key '${key}'`);
    }
  }

  const layer: ConfigLayer = {};
  for (const key of STRING_KEYS) {
    const value = parsed[key];
    if (value === undefined || value === null) {
      continue;
    }
    if (typeof value !== "string") {
      errors.push(`${key} must be a string`);
      continue;
    }
    layer[key] = value;
  }

  for (const key of TIMESTAMP_KEYS) {
    const value = parsed[key];
    if (value === undefined || value === null) {
      continue;
    }
    if (typeof value !== "string" && typeof value !== "number") {
      errors.push(`${key} must be epoch seconds`);
      continue;
    }
    layer[key] = value;
  }

  for (const key of PARAMETER_KEYS) {
    const value = parsed[key];
    if (value === undefined || value === null) {
      continue;
    }
    if (typeof value === "string") {
      layer[key] = parseParameters(value, `${source}: ${key}`);
    } else if (isPlainObject(value)) {
      layer[key] = value;
    } else {
      errors.push(`${key} must be a mapping or a JSON object string`);
    }
  }

  if (errors.length > 0) {
    throw new ConfigParseError(source, errors.join("; "));
  }
  return layer;
}
