import { Command } from "commander";
import { LogLevel, setLogLevel } from "../logging/index.js";
import { runBuildCommand } from "./build-command.js";
import { runGenerateCommand } from "./generate-command.js";

export function createProgram(toolVersion: string): Command {
  const program = new Command();

  program
    .name("nix-provenance")
    .description("Get SLSA v1.0 provenance file from nix flake or derivation")
    .version(toolVersion)
    .option("--verbose", "Log every store query")
    .option("--quiet", "Only log errors")
    .enablePositionalOptions()
    .hook("preAction", () => {
      const globals = program.opts<{ verbose?: boolean; quiet?: boolean }>();
      if (globals.verbose) {
        setLogLevel(LogLevel.Debug);
      } else if (globals.quiet) {
        setLogLevel(LogLevel.Error);
      }
    });

  program
    .command("generate", { isDefault: true })
    .description("Write provenance for an existing derivation or flake output")
    .argument("<target>", "Flake reference or derivation path")
    .option("--recursive", "Resolve every dependency recursively")
    .option("--out <file>", "Path to file where provenance should be saved")
    .option("--config <file>", "YAML file with provenance settings")
    .action(
      async (
        target: string,
        options: { recursive?: boolean; out?: string; config?: string },
      ) => {
        try {
          await runGenerateCommand({
            target,
            recursive: options.recursive,
            out: options.out,
            configPath: options.config,
          });
        } catch (error) {
          await writeError(error);
          process.exitCode = 1;
        }
      },
    );

  program
    .command("build")
    .description(
      [
        "Run nix build for the target, then write provenance (default: provenance.json).",
        "Options of build itself (--out, --recursive, --config) must come before",
        "<target>; everything after it goes to nix build:",
        "  nix-provenance build --out x.json .#hello -L",
      ].join("\n"),
    )
    .argument("<target>", "Flake reference to build")
    .argument(
      "[nixArgs...]",
      "Extra arguments passed to nix build; everything after <target> goes to nix",
    )
    .option("--recursive", "Resolve every dependency recursively")
    .option("--out <file>", "Path to file where provenance should be saved")
    .option("--config <file>", "YAML file with provenance settings")
    .passThroughOptions()
    .allowUnknownOption()
    .action(
      async (
        target: string,
        nixArgs: string[],
        options: { recursive?: boolean; out?: string; config?: string },
      ) => {
        try {
          await runBuildCommand({
            target,
            buildArgs: nixArgs,
            recursive: options.recursive,
            out: options.out,
            configPath: options.config,
          });
        } catch (error) {
          await writeError(error);
          process.exitCode = 1;
        }
      },
    );

  return program;
}

async function writeError(error: unknown): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  await new Promise<void>((resolve) => {
    process.stderr.write(message + "\n", () => resolve());
  });
}
