import type { ExternalToolError } from "../errors.js";

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export interface OutputDescriptor {
  readonly name: string;
  /** null for a floating content-addressed output that has no path yet */
  readonly path: string | null;
}

export interface BuildUnit {
  readonly path: string;
  readonly name: string;
  readonly environment: Readonly<Record<string, string>>;
  readonly outputs: Readonly<Record<string, OutputDescriptor>>;
}

export interface FlakeMetadata {
  /** Locked URL, pinned to a revision or narHash. */
  readonly url: string;
  readonly originalUrl: string;
  readonly path?: string;
  readonly revision?: string;
}

/**
 * Read-only view of the build store. The resolvers only ever talk to this
 * interface, so tests can hand them a fake store.
 */
export interface StoreQuery {
  /**
   * Raw `algorithm:value` hash of a store path. Tolerant: a path that is not
   * in the store comes back as a failed result instead of a thrown error.
   */
  queryHash(storePath: string): Promise<Result<string, ExternalToolError>>;
  queryReferences(
    storePath: string,
    transitive: boolean,
  ): Promise<readonly string[]>;
  showDerivation(reference: string): Promise<BuildUnit>;
  /**
   * Outputs of a derivation without the rest of its metadata. A convenience
   * over showDerivation for library callers; provenance generation reads the
   * outputs from the resolved target instead.
   */
  queryOutputs(
    reference: string,
  ): Promise<Readonly<Record<string, OutputDescriptor>>>;
  flakeMetadata(flakeRef: string): Promise<FlakeMetadata>;
}

export interface CommandExecutor {
  run(command: readonly string[]): Promise<Result<string, ExternalToolError>>;
}
