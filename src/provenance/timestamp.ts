import { InvalidTimestampError } from "../errors.js";

// 0001-01-01T00:00:00Z and 9999-12-31T23:59:59Z
const MIN_EPOCH_SECONDS = -62135596800;
const MAX_EPOCH_SECONDS = 253402300799;

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * Unix epoch seconds to `YYYY-MM-DDTHH:MM:SS.ffZ` (UTC, two fractional digits).
 */
export function normalizeTimestamp(
  value: number | string | null | undefined,
): string | null {
  if (value === null || value === undefined) {
    return null;
  }

  const seconds = toEpochSeconds(value);
  if (seconds < MIN_EPOCH_SECONDS || seconds > MAX_EPOCH_SECONDS) {
    throw new InvalidTimestampError(value);
  }

  const iso = new Date(seconds * 1000).toISOString();
  return `${iso.slice(0, 22)}Z`;
}

function toEpochSeconds(value: number | string): number {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new InvalidTimestampError(value);
    }
    return Math.trunc(value);
  }
  if (!INTEGER_PATTERN.test(value)) {
    throw new InvalidTimestampError(value);
  }
  return Number.parseInt(value.trim(), 10);
}
