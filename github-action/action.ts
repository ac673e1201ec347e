import type { InputOptions } from "@actions/core";
import { emitProvenance } from "../src/cli/generate-command.js";
import { loadConfigFile } from "../src/config/config-file.js";
import { readEnvConfig } from "../src/config/env-config.js";
import { mergeConfig } from "../src/config/merge.js";
import type { Environment } from "../src/config/types.js";
import type { Logger } from "../src/logging/index.js";
import type { ProvenanceStatement } from "../src/provenance/types.js";
import type { StoreQuery } from "../src/store/types.js";
import { inputOverrides, workflowConfig, type ActionInputs } from "./context.js";

/** The parts of @actions/core the action uses. */
export interface ActionCore {
  getInput(name: string, options?: InputOptions): string;
  setOutput(name: string, value: string): void;
  debug(message: string): void;
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}

export interface ActionDependencies {
  readonly core: ActionCore;
  readonly env: Environment;
  /** Defaults to the nix command line tools. */
  readonly store?: StoreQuery;
}

export function coreLogger(core: ActionCore): Logger {
  const logger: Logger = {
    debug: (message) => core.debug(message),
    info: (message) => core.info(message),
    warn: (message) => core.warning(message),
    error: (message) => core.error(message),
    child: () => logger,
  };
  return logger;
}

export function readActionInputs(core: ActionCore): ActionInputs {
  return {
    target: core.getInput("target", { required: true }),
    recursive: core.getInput("recursive").toLowerCase() === "true",
    outputFile: core.getInput("output-file") || "provenance.json",
    buildType: core.getInput("build-type"),
    builderId: core.getInput("builder-id"),
    invocationId: core.getInput("invocation-id"),
  };
}

/**
 * Settings are layered config file, workflow ids, PROVENANCE_* variables,
 * then explicit action inputs.
 */
export async function runAction(
  deps: ActionDependencies,
): Promise<ProvenanceStatement> {
  const { core, env } = deps;
  const inputs = readActionInputs(core);
  const configPath = core.getInput("config");

  const config = mergeConfig(
    configPath ? await loadConfigFile(configPath) : {},
    workflowConfig(env),
    readEnvConfig(env),
    inputOverrides(inputs),
  );

  const statement = await emitProvenance(
    {
      target: inputs.target,
      recursive: inputs.recursive,
      store: deps.store,
      logger: coreLogger(core),
    },
    config,
  );

  core.setOutput("provenance-file", inputs.outputFile);
  core.setOutput("subjects", String(statement.subject.length));
  return statement;
}
