/**
 * Structured Logging
 *
 * ```typescript
 * import { Logger, ConsoleTransport, FileTransport } from "@live-agent/shared/logging";
 *
 * const root = new Logger({
 *   minLevel: "debug",
 *   component: "server",
 *   transports: [new ConsoleTransport(), new FileTransport({ logDir: "./logs" })],
 * });
 *
 * const sandboxLog = root.child({ component: "server.sandbox" });
 * sandboxLog.info("Query executed", { connectorId: "inventory", rowCount: 1 });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ChildContext,
  type ILogger,
} from "./types.js";

export { Logger, RingBuffer, type LogSink } from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  MemoryTransport,
  type ConsoleTransportOptions,
  type FileTransportOptions,
} from "./transports/index.js";
