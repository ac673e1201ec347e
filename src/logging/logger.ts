/**
 * Level-based logging with context fields.
 *
 * Everything goes to stderr: stdout is reserved for the provenance document.
 * Embedders (the GitHub Action, tests) swap the sink with setLogHandler().
 */

export enum LogLevel {
  Debug = "debug",
  Info = "info",
  Warn = "warn",
  Error = "error",
}

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly context: Readonly<Record<string, unknown>>;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

export const stderrLogHandler: LogHandler = (entry) => {
  const fields = Object.entries(entry.context)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(" ");
  const line = fields
    ? `${entry.level}: ${entry.message} (${fields})`
    : `${entry.level}: ${entry.message}`;
  process.stderr.write(line + "\n");
};

let currentHandler: LogHandler = stderrLogHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

function log(
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[currentMinLevel]) {
    return;
  }
  currentHandler({ level, message, context });
}

export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => log(LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => log(LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => log(LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => log(LogLevel.Error, msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }),
  };
}

function formatValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

export const logger = createLogger();
