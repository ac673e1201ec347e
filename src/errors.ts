/**
 * Error hierarchy for provenance generation. Every subclass is fatal: the CLI
 * prints the message and exits non-zero without writing a document.
 */
export class ProvenanceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProvenanceError";
  }
}

/**
 * A store tool invocation exited non-zero or printed output we could not read.
 */
export class ExternalToolError extends ProvenanceError {
  constructor(
    public readonly command: readonly string[],
    public readonly exitCode: number | null,
    public readonly stderr: string,
    detail?: string,
  ) {
    super(formatToolMessage(command, exitCode, stderr, detail));
    this.name = "ExternalToolError";
  }
}

export class TargetResolutionError extends ProvenanceError {
  constructor(
    public readonly reference: string,
    cause: unknown,
  ) {
    super(
      `Unable to resolve target ${reference}: ${describeCause(cause)}`,
      { cause },
    );
    this.name = "TargetResolutionError";
  }
}

export class ConfigParseError extends ProvenanceError {
  constructor(
    public readonly source: string,
    detail: string,
    cause?: unknown,
  ) {
    super(`Invalid configuration in ${source}: ${detail}`, { cause });
    this.name = "ConfigParseError";
  }
}

export class InvalidTimestampError extends ProvenanceError {
  constructor(public readonly value: unknown) {
    super(`Invalid unix timestamp: ${JSON.stringify(value)}`);
    this.name = "InvalidTimestampError";
  }
}

export class InvalidDigestError extends ProvenanceError {
  constructor(
    public readonly storePath: string,
    public readonly raw: string,
  ) {
    super(`Unexpected hash format for ${storePath}: ${JSON.stringify(raw)}`);
    this.name = "InvalidDigestError";
  }
}

function formatToolMessage(
  command: readonly string[],
  exitCode: number | null,
  stderr: string,
  detail?: string,
): string {
  const status = exitCode === null ? "failed" : `exited with ${exitCode}`;
  const lines = [`Command '${command.join(" ")}' ${detail ?? status}`];
  const trimmed = stderr.trim();
  if (trimmed) {
    lines.push(trimmed);
  }
  return lines.join("\n");
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
