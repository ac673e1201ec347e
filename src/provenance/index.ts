export { generateProvenance } from "./assembler.js";
export type { GenerateOptions } from "./assembler.js";
export { isDerivationPath, resolveDependencies } from "./dependencies.js";
export type { DependencyOptions } from "./dependencies.js";
export { parseDigest } from "./digest.js";
export {
  externalParameters,
  internalParameters,
  isEmptyValue,
  parseParameters,
} from "./parameters.js";
export { resolveSubjects } from "./subjects.js";
export { normalizeTimestamp } from "./timestamp.js";
export { serializeProvenance, writeProvenance } from "./writer.js";
export { PREDICATE_TYPE, STATEMENT_TYPE } from "./types.js";
export type {
  Digest,
  ProvenanceStatement,
  ResourceDescriptor,
  Subject,
} from "./types.js";
