import { loadConfig } from "../config/load.js";
import { logger as rootLogger } from "../logging/index.js";
import type { ProvenanceStatement } from "../provenance/types.js";
import { runAttached } from "../store/exec.js";
import {
  emitProvenance,
  type GenerateCommandOptions,
} from "./generate-command.js";

export const DEFAULT_BUILD_OUTPUT_FILE = "provenance.json";

export interface BuildCommandOptions extends GenerateCommandOptions {
  readonly buildArgs: readonly string[];
  readonly runCommand?: (command: readonly string[]) => Promise<void>;
  /** Current unix time in seconds. */
  readonly clock?: () => number;
}

/**
 * Run `nix build` for the target, timing it, then write provenance for the
 * same target. The document goes to provenance.json unless a file is set.
 */
export async function runBuildCommand(
  options: BuildCommandOptions,
): Promise<ProvenanceStatement> {
  const log = options.logger ?? rootLogger;
  const clock = options.clock ?? epochSeconds;
  const runCommand = options.runCommand ?? runAttached;

  // read config first so a broken config fails before a long build
  const config = await loadConfig({
    configPath: options.configPath,
    env: options.env ?? process.env,
    overrides: options.out ? { outputFile: options.out } : {},
  });

  const timestampBegin = clock();
  log.info("Starting nix build", { target: options.target });
  await runCommand(["nix", "build", options.target, ...options.buildArgs]);
  const timestampEnd = clock();
  log.info("Build done, generating provenance");

  return await emitProvenance(options, {
    ...config,
    timestampBegin,
    timestampEnd,
    externalParameters: {
      ...config.externalParameters,
      target: options.target,
      "build-args": options.buildArgs.join(" "),
    },
    outputFile: config.outputFile ?? DEFAULT_BUILD_OUTPUT_FILE,
  });
}

function epochSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
