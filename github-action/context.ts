import type { ConfigLayer, Environment } from "../src/config/types.js";

/**
 * Builder and invocation ids for a GitHub Actions run, from the variables the
 * runner exports. Ids are left unset when the variables are missing.
 */
export function workflowConfig(env: Environment): ConfigLayer {
  const layer: ConfigLayer = {};
  const server = env.GITHUB_SERVER_URL;

  if (server && env.GITHUB_WORKFLOW_REF) {
    layer.builderId = `${server}/${env.GITHUB_WORKFLOW_REF}`;
  }
  if (server && env.GITHUB_REPOSITORY && env.GITHUB_RUN_ID) {
    const attempt = env.GITHUB_RUN_ATTEMPT || "1";
    layer.invocationId = `${server}/${env.GITHUB_REPOSITORY}/actions/runs/${env.GITHUB_RUN_ID}/attempts/${attempt}`;
  }
  return layer;
}

export interface ActionInputs {
  readonly target: string;
  readonly recursive: boolean;
  readonly outputFile: string;
  readonly buildType: string;
  readonly builderId: string;
  readonly invocationId: string;
}

/** Explicit action inputs win over the derived workflow ids. */
export function inputOverrides(inputs: ActionInputs): ConfigLayer {
  const layer: ConfigLayer = { outputFile: inputs.outputFile };
  if (inputs.buildType) {
    layer.buildType = inputs.buildType;
  }
  if (inputs.builderId) {
    layer.builderId = inputs.builderId;
  }
  if (inputs.invocationId) {
    layer.invocationId = inputs.invocationId;
  }
  return layer;
}
