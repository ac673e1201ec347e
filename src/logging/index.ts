export {
  createLogger,
  logger,
  LogLevel,
  setLogHandler,
  setLogLevel,
  stderrLogHandler,
} from "./logger.js";
export type { LogEntry, LogHandler, Logger } from "./logger.js";
