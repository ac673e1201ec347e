import type { Logger } from "../logging/index.js";
import type { StoreQuery } from "../store/types.js";
import { parseDigest } from "./digest.js";
import type { ResourceDescriptor } from "./types.js";

export interface DependencyOptions {
  /** Walk the whole closure instead of the immediate references. */
  readonly transitive: boolean;
}

export function isDerivationPath(storePath: string): boolean {
  return storePath.endsWith(".drv");
}

/**
 * Describe every reference of a derivation, in the order the store reports
 * them. No deduplication or sorting happens here: consumers compare these
 * lists across rebuilds.
 */
export async function resolveDependencies(
  store: StoreQuery,
  derivationPath: string,
  options: DependencyOptions,
  log: Logger,
): Promise<ResourceDescriptor[]> {
  const references = await store.queryReferences(
    derivationPath,
    options.transitive,
  );
  log.debug("Resolving dependencies", {
    derivation: derivationPath,
    transitive: options.transitive,
    count: references.length,
  });

  const dependencies: ResourceDescriptor[] = [];
  for (const reference of references) {
    dependencies.push(await describeReference(store, reference));
  }
  return dependencies;
}

async function describeReference(
  store: StoreQuery,
  storePath: string,
): Promise<ResourceDescriptor> {
  const hash = await store.queryHash(storePath);
  if (!hash.ok) {
    throw hash.error;
  }
  const digest = parseDigest(storePath, hash.value);

  if (!isDerivationPath(storePath)) {
    return { uri: storePath, digest };
  }

  const unit = await store.showDerivation(storePath);
  const version = unit.environment.version;
  if (!version) {
    return { uri: storePath, digest, name: unit.name };
  }
  return { uri: storePath, digest, name: unit.name, annotations: { version } };
}
