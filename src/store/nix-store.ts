import { ExternalToolError } from "../errors.js";
import type {
  BuildUnit,
  CommandExecutor,
  FlakeMetadata,
  OutputDescriptor,
  Result,
  StoreQuery,
} from "./types.js";

/**
 * StoreQuery backed by the `nix-store` and `nix` command line tools.
 */
export class NixStore implements StoreQuery {
  constructor(private readonly executor: CommandExecutor) {}

  async queryHash(
    storePath: string,
  ): Promise<Result<string, ExternalToolError>> {
    const result = await this.executor.run([
      "nix-store",
      "--query",
      "--hash",
      storePath,
    ]);
    if (!result.ok) {
      return result;
    }
    return { ok: true, value: result.value.trim() };
  }

  async queryReferences(
    storePath: string,
    transitive: boolean,
  ): Promise<readonly string[]> {
    const depth = transitive ? "--requisites" : "--references";
    const stdout = await this.runOrThrow([
      "nix-store",
      "--query",
      depth,
      storePath,
    ]);
    return stdout.split(/\s+/).filter((entry) => entry.length > 0);
  }

  async showDerivation(reference: string): Promise<BuildUnit> {
    const command = ["nix", "derivation", "show", reference];
    const parsed = parseJson(command, await this.runOrThrow(command));
    if (!isRecord(parsed)) {
      throw new ExternalToolError(command, 0, "", "did not print a JSON object");
    }

    const first = Object.entries(parsed)[0];
    if (!first) {
      throw new ExternalToolError(command, 0, "", "returned no derivation");
    }
    const [drvPath, body] = first;
    return parseBuildUnit(command, drvPath, body);
  }

  async queryOutputs(
    reference: string,
  ): Promise<Readonly<Record<string, OutputDescriptor>>> {
    const unit = await this.showDerivation(reference);
    return unit.outputs;
  }

  async flakeMetadata(flakeRef: string): Promise<FlakeMetadata> {
    const command = ["nix", "flake", "metadata", "--json", flakeRef];
    const parsed = parseJson(command, await this.runOrThrow(command));
    if (!isRecord(parsed) || typeof parsed.url !== "string") {
      throw new ExternalToolError(
        command,
        0,
        "",
        "did not report a locked flake url",
      );
    }
    return {
      url: parsed.url,
      originalUrl:
        typeof parsed.originalUrl === "string" ? parsed.originalUrl : flakeRef,
      path: typeof parsed.path === "string" ? parsed.path : undefined,
      revision:
        typeof parsed.revision === "string" ? parsed.revision : undefined,
    };
  }

  private async runOrThrow(command: readonly string[]): Promise<string> {
    const result = await this.executor.run(command);
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }
}

function parseBuildUnit(
  command: readonly string[],
  drvPath: string,
  body: unknown,
): BuildUnit {
  if (!isRecord(body) || typeof body.name !== "string") {
    throw new ExternalToolError(
      command,
      0,
      "",
      `printed a malformed derivation for ${drvPath}`,
    );
  }

  const environment: Record<string, string> = {};
  if (isRecord(body.env)) {
    for (const [key, value] of Object.entries(body.env)) {
      if (typeof value === "string") {
        environment[key] = value;
      }
    }
  }

  const outputs: Record<string, OutputDescriptor> = {};
  if (isRecord(body.outputs)) {
    for (const [name, output] of Object.entries(body.outputs)) {
      const outputPath =
        isRecord(output) && typeof output.path === "string"
          ? output.path
          : null;
      outputs[name] = { name, path: outputPath };
    }
  }

  return { path: drvPath, name: body.name, environment, outputs };
}

function parseJson(command: readonly string[], stdout: string): unknown {
  try {
    return JSON.parse(stdout) as unknown;
  } catch {
    throw new ExternalToolError(command, 0, "", "printed invalid JSON");
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
