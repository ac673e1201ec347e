import { TargetResolutionError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { BuildUnit, StoreQuery } from "../store/types.js";

export interface TargetResolver {
  resolve(reference: string): Promise<BuildUnit>;
}

/**
 * Resolves a derivation path (or any installable the store tool accepts
 * as-is) directly.
 */
export class PlainPathResolver implements TargetResolver {
  constructor(private readonly store: StoreQuery) {}

  async resolve(reference: string): Promise<BuildUnit> {
    return await this.store.showDerivation(reference);
  }
}

/**
 * Resolves `flake#attribute` references. The flake is locked first so the
 * derivation is evaluated from the same revision the metadata reports.
 */
export class FlakeReferenceResolver implements TargetResolver {
  constructor(
    private readonly store: StoreQuery,
    private readonly log: Logger,
  ) {}

  async resolve(reference: string): Promise<BuildUnit> {
    const { flakeRef, attribute } = splitFlakeReference(reference);
    const metadata = await this.store.flakeMetadata(flakeRef);
    this.log.debug("Locked flake", {
      flake: flakeRef,
      url: metadata.url,
      revision: metadata.revision ?? "dirty",
    });
    const locked = attribute ? `${metadata.url}#${attribute}` : metadata.url;
    return await this.store.showDerivation(locked);
  }
}

export function isFlakeReference(reference: string): boolean {
  return reference.includes("#");
}

export function splitFlakeReference(reference: string): {
  flakeRef: string;
  attribute: string;
} {
  const index = reference.indexOf("#");
  if (index === -1) {
    return { flakeRef: reference, attribute: "" };
  }
  return {
    flakeRef: reference.slice(0, index) || ".",
    attribute: reference.slice(index + 1),
  };
}

export function selectResolver(
  reference: string,
  store: StoreQuery,
  log: Logger,
): TargetResolver {
  return isFlakeReference(reference)
    ? new FlakeReferenceResolver(store, log)
    : new PlainPathResolver(store);
}

export async function resolveTarget(
  reference: string,
  store: StoreQuery,
  log: Logger,
): Promise<BuildUnit> {
  if (!reference.trim()) {
    throw new TargetResolutionError(reference, "empty target reference");
  }
  const resolver = selectResolver(reference, store, log);
  try {
    const unit = await resolver.resolve(reference);
    log.debug("Resolved target", { target: reference, derivation: unit.path });
    return unit;
  } catch (error) {
    throw new TargetResolutionError(reference, error);
  }
}
