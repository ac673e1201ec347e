import { loadConfig } from "../config/load.js";
import type { Environment, ProvenanceConfig } from "../config/types.js";
import { logger as rootLogger, type Logger } from "../logging/index.js";
import { generateProvenance } from "../provenance/assembler.js";
import type { ProvenanceStatement } from "../provenance/types.js";
import { writeProvenance } from "../provenance/writer.js";
import { createProcessExecutor } from "../store/exec.js";
import { NixStore } from "../store/nix-store.js";
import type { StoreQuery } from "../store/types.js";

export interface GenerateCommandOptions {
  readonly target: string;
  readonly recursive?: boolean;
  readonly out?: string;
  readonly configPath?: string;
  readonly env?: Environment;
  readonly store?: StoreQuery;
  readonly logger?: Logger;
}

export async function runGenerateCommand(
  options: GenerateCommandOptions,
): Promise<ProvenanceStatement> {
  const config = await loadConfig({
    configPath: options.configPath,
    env: options.env ?? process.env,
    overrides: options.out ? { outputFile: options.out } : {},
  });
  return await emitProvenance(options, config);
}

/**
 * Generate the document and write it out. Shared by `generate` and `build`.
 */
export async function emitProvenance(
  options: GenerateCommandOptions,
  config: ProvenanceConfig,
): Promise<ProvenanceStatement> {
  const log = options.logger ?? rootLogger;
  const store = options.store ?? new NixStore(createProcessExecutor(log));
  const statement = await generateProvenance({
    target: options.target,
    transitive: Boolean(options.recursive),
    config,
    store,
    logger: log,
  });

  await writeProvenance(statement, config.outputFile);
  if (config.outputFile) {
    log.info(`Provenance written to ${config.outputFile}`);
  }
  return statement;
}
