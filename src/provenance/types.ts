export const STATEMENT_TYPE = "https://in-toto.io/Statement/v1";
export const PREDICATE_TYPE = "https://slsa.dev/provenance/v1";

export type Digest = Readonly<Record<string, string>>;

export type Parameters = Readonly<Record<string, unknown>>;

export interface Subject {
  readonly name: string;
  readonly uri: string;
  readonly digest: Digest;
}

export interface ResourceDescriptor {
  readonly uri: string;
  readonly digest: Digest;
  readonly name?: string;
  readonly annotations?: Readonly<Record<string, string>>;
}

export interface BuildDefinition {
  readonly buildType: string | null;
  readonly externalParameters: Parameters;
  readonly internalParameters: Parameters;
  readonly resolvedDependencies: readonly ResourceDescriptor[];
}

export interface RunDetails {
  readonly builder: {
    readonly id: string | null;
    readonly builderDependencies: readonly ResourceDescriptor[];
    readonly version: Readonly<Record<string, string>>;
  };
  readonly metadata: {
    readonly invocationId: string | null;
    readonly startedOn: string | null;
    readonly finishedOn: string | null;
  };
  readonly byproducts: readonly ResourceDescriptor[];
}

export interface ProvenanceStatement {
  readonly _type: typeof STATEMENT_TYPE;
  readonly subject: readonly Subject[];
  readonly predicateType: typeof PREDICATE_TYPE;
  readonly predicate: {
    readonly buildDefinition: BuildDefinition;
    readonly runDetails: RunDetails;
  };
}
