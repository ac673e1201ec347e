import type { Logger } from "../logging/index.js";
import type { OutputDescriptor, StoreQuery } from "../store/types.js";
import { parseDigest } from "./digest.js";
import type { Subject } from "./types.js";

/**
 * Map derivation outputs to in-toto subjects. Outputs that are not in the
 * store (not built yet) are skipped with a warning.
 */
export async function resolveSubjects(
  store: StoreQuery,
  outputs: Readonly<Record<string, OutputDescriptor>>,
  log: Logger,
): Promise<Subject[]> {
  const subjects: Subject[] = [];

  for (const [name, output] of Object.entries(outputs)) {
    if (output.path === null) {
      log.warn(
        `Derivation output "${name}" has no known store path, assuming it was not built`,
      );
      continue;
    }

    const hash = await store.queryHash(output.path);
    if (!hash.ok) {
      log.warn(
        `Derivation output "${name}" was not found in the nix store, assuming it was not built`,
        { path: output.path },
      );
      continue;
    }

    subjects.push({
      name,
      uri: output.path,
      digest: parseDigest(output.path, hash.value),
    });
  }

  return subjects;
}
