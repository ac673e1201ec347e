export interface ProvenanceConfig {
  readonly buildType?: string;
  readonly builderId?: string;
  readonly invocationId?: string;
  /** Unix epoch seconds, as a number or a decimal string. */
  readonly timestampBegin?: number | string;
  readonly timestampEnd?: number | string;
  readonly externalParameters: Readonly<Record<string, unknown>>;
  readonly internalParameters: Readonly<Record<string, unknown>>;
  readonly outputFile?: string;
}

/** One source of settings; unset keys fall through to lower layers. */
export type ConfigLayer = {
  -readonly [K in keyof ProvenanceConfig]?: ProvenanceConfig[K];
};

export type Environment = Readonly<Record<string, string | undefined>>;
