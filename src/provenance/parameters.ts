import { ConfigParseError } from "../errors.js";
import type { Parameters } from "./types.js";

/**
 * Parse a JSON object of build parameters. Absent or blank input is an empty
 * object; anything other than a JSON object is rejected.
 */
export function parseParameters(
  raw: string | undefined,
  source: string,
): Record<string, unknown> {
  if (raw === undefined || !raw.trim()) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw) as unknown;
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigParseError(source, `malformed JSON (${detail})`, error);
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigParseError(source, "expected a JSON object");
  }
  return parsed;
}

/**
 * The derivation path always wins over a supplied `derivation` key, then
 * every empty value is dropped.
 */
export function externalParameters(
  params: Parameters,
  derivationPath: string,
): Record<string, unknown> {
  const merged: Record<string, unknown> = {
    ...params,
    derivation: derivationPath,
  };
  return Object.fromEntries(
    Object.entries(merged).filter(([, value]) => !isEmptyValue(value)),
  );
}

export function internalParameters(params: Parameters): Record<string, unknown> {
  return { ...params };
}

export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined || value === false) {
    return true;
  }
  if (typeof value === "number") {
    return value === 0 || Number.isNaN(value);
  }
  if (typeof value === "string" || Array.isArray(value)) {
    return value.length === 0;
  }
  if (isPlainObject(value)) {
    return Object.keys(value).length === 0;
  }
  return false;
}

export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
