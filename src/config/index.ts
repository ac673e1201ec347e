export { loadConfigFile, parseConfigDocument } from "./config-file.js";
export { ENV_KEYS, readEnvConfig } from "./env-config.js";
export { mergeConfig } from "./merge.js";
export type { ConfigLayer, Environment, ProvenanceConfig } from "./types.js";
export { loadConfig } from "./load.js";
export type { LoadConfigOptions } from "./load.js";
