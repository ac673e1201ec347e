import { InvalidDigestError } from "../errors.js";
import type { Digest } from "./types.js";

/**
 * Turn store hash output such as `sha256:1b8m...` into `{ sha256: "1b8m..." }`.
 * Only the first `:` separates algorithm from value.
 */
export function parseDigest(storePath: string, raw: string): Digest {
  const trimmed = raw.trim();
  const index = trimmed.indexOf(":");
  if (index <= 0 || index === trimmed.length - 1) {
    throw new InvalidDigestError(storePath, raw);
  }
  return { [trimmed.slice(0, index)]: trimmed.slice(index + 1) };
}
