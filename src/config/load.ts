import { loadConfigFile } from "./config-file.js";
import { readEnvConfig } from "./env-config.js";
import { mergeConfig } from "./merge.js";
import type { ConfigLayer, Environment, ProvenanceConfig } from "./types.js";

export interface LoadConfigOptions {
  readonly configPath?: string;
  readonly env: Environment;
  /** Highest precedence, usually from command line flags. */
  readonly overrides?: ConfigLayer;
}

export async function loadConfig(
  options: LoadConfigOptions,
): Promise<ProvenanceConfig> {
  const fileLayer = options.configPath
    ? await loadConfigFile(options.configPath)
    : {};
  const envLayer = readEnvConfig(options.env);
  return mergeConfig(fileLayer, envLayer, options.overrides ?? {});
}
