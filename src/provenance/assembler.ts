import type { ProvenanceConfig } from "../config/types.js";
import type { Logger } from "../logging/index.js";
import type { StoreQuery } from "../store/types.js";
import { resolveTarget } from "../target/resolver.js";
import { resolveDependencies } from "./dependencies.js";
import { externalParameters, internalParameters } from "./parameters.js";
import { resolveSubjects } from "./subjects.js";
import { normalizeTimestamp } from "./timestamp.js";
import {
  PREDICATE_TYPE,
  STATEMENT_TYPE,
  type ProvenanceStatement,
} from "./types.js";

export interface GenerateOptions {
  readonly target: string;
  readonly transitive: boolean;
  readonly config: ProvenanceConfig;
  readonly store: StoreQuery;
  readonly logger: Logger;
}

export async function generateProvenance(
  options: GenerateOptions,
): Promise<ProvenanceStatement> {
  const { config, store } = options;
  const log = options.logger.child({ target: options.target });

  // timestamps are checked before the first store query
  const startedOn = normalizeTimestamp(config.timestampBegin);
  const finishedOn = normalizeTimestamp(config.timestampEnd);

  const unit = await resolveTarget(options.target, store, log);
  const subject = await resolveSubjects(store, unit.outputs, log);
  const resolvedDependencies = await resolveDependencies(
    store,
    unit.path,
    { transitive: options.transitive },
    log,
  );

  log.info("Assembled provenance", {
    derivation: unit.path,
    subjects: subject.length,
    dependencies: resolvedDependencies.length,
  });

  return {
    _type: STATEMENT_TYPE,
    subject,
    predicateType: PREDICATE_TYPE,
    predicate: {
      buildDefinition: {
        buildType: config.buildType ?? null,
        externalParameters: externalParameters(
          config.externalParameters,
          unit.path,
        ),
        internalParameters: internalParameters(config.internalParameters),
        resolvedDependencies,
      },
      runDetails: {
        builder: {
          id: config.builderId ?? null,
          builderDependencies: [],
          version: {},
        },
        metadata: {
          invocationId: config.invocationId ?? null,
          startedOn,
          finishedOn,
        },
        byproducts: [],
      },
    },
  };
}
