import { execFile, spawn } from "node:child_process";
import { promisify } from "node:util";
import { ExternalToolError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { CommandExecutor, Result } from "./types.js";

const execFileAsync = promisify(execFile);

// derivation show and --requisites on large closures print a lot
const MAX_BUFFER_BYTES = 512 * 1024 * 1024;

export function createProcessExecutor(log: Logger): CommandExecutor {
  return {
    async run(command) {
      log.debug("Running command", { command: command.join(" ") });
      return await tryRunCommand(command);
    },
  };
}

export async function tryRunCommand(
  command: readonly string[],
): Promise<Result<string, ExternalToolError>> {
  const [file, ...args] = command;
  if (!file) {
    throw new Error("Empty command");
  }
  try {
    const { stdout } = await execFileAsync(file, args, {
      encoding: "utf8",
      maxBuffer: MAX_BUFFER_BYTES,
    });
    return { ok: true, value: stdout };
  } catch (error) {
    return { ok: false, error: toToolError(command, error) };
  }
}

/**
 * Run a command with the terminal attached. The child's stdout is sent to
 * stderr so our own stdout stays reserved for the document.
 */
export async function runAttached(command: readonly string[]): Promise<void> {
  const [file, ...args] = command;
  if (!file) {
    throw new Error("Empty command");
  }
  await new Promise<void>((resolve, reject) => {
    const child = spawn(file, args, { stdio: ["inherit", 2, "inherit"] });
    child.once("error", (error) => {
      reject(
        new ExternalToolError(
          command,
          null,
          "",
          `could not be started: ${error.message}`,
        ),
      );
    });
    child.once("close", (code) => {
      if (code === 0) {
        resolve();
        return;
      }
      reject(new ExternalToolError(command, code, ""));
    });
  });
}

function toToolError(
  command: readonly string[],
  error: unknown,
): ExternalToolError {
  if (!isRecord(error)) {
    return new ExternalToolError(command, null, "", String(error));
  }
  const stderr = typeof error.stderr === "string" ? error.stderr : "";
  if (typeof error.code === "number") {
    return new ExternalToolError(command, error.code, stderr);
  }
  const message =
    typeof error.message === "string" ? error.message : "unknown failure";
  return new ExternalToolError(
    command,
    null,
    stderr,
    `could not be run: ${message}`,
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}
