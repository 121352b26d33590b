/**
 * Logging Setup for the Server
 *
 * Wires the shared structured logger to console and rotating-file
 * transports. Component loggers resolve the root lazily, so modules can
 * create theirs at import time and still pick up initServerLogging().
 */

import * as path from "path";
import * as os from "os";
import {
  ConsoleTransport,
  FileTransport,
  Logger,
  isLogLevel,
  type ChildContext,
  type ILogger,
  type LogEntry,
  type LogLevel,
  type LogTransport,
} from "@live-agent/shared/logging";

export interface LoggingOptions {
  /** Default: LOG_LEVEL, else "debug" in dev and "info" in production */
  minLevel?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Enable file output (default: true) */
  file?: boolean;
  /** Default: LOG_DIR, else ~/.live-agent/logs */
  logDir?: string;
  colors?: boolean;
  /** Extra transports (tests attach a MemoryTransport here) */
  transports?: LogTransport[];
}

let root: Logger | null = null;

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  if (process.env.NODE_ENV === "test") return "silent";
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

export function initServerLogging(options: LoggingOptions = {}): Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const minLevel = options.minLevel ?? defaultLevel();
  const transports: LogTransport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport({ minLevel, colors: options.colors, prettyPrint: isDev }));
  }

  if (options.file !== false) {
    transports.push(new FileTransport({
      minLevel: "debug",
      logDir: options.logDir ?? process.env.LOG_DIR ?? path.join(os.homedir(), ".live-agent", "logs"),
      filename: "server",
      maxSize: 10 * 1024 * 1024,
      maxFiles: 10,
    }));
  }

  transports.push(...(options.transports ?? []));

  root = new Logger({ minLevel, component: "server", transports, ringBufferSize: 2000 });
  return root;
}

/** Root server logger; console-only defaults until initServerLogging() runs. */
export function getServerLogger(): Logger {
  return root ?? initServerLogging({ file: false });
}

export async function closeServerLogging(): Promise<void> {
  await root?.close();
  root = null;
}

class ComponentLogger implements ILogger {
  constructor(private readonly context: ChildContext) {}

  private target(): ILogger {
    return getServerLogger().child(this.context);
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.target().trace(message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.target().debug(message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.target().info(message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.target().warn(message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.target().error(message, error, data);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.target().fatal(message, error, data);
  }

  child(context: ChildContext): ILogger {
    return new ComponentLogger({ ...this.context, ...context });
  }

  getRecentLogs(count?: number): LogEntry[] {
    return getServerLogger().getRecentLogs(count);
  }

  flush(): Promise<void> {
    return getServerLogger().flush();
  }
}

/** Namespaced logger, e.g. createComponentLogger("sandbox") → "server.sandbox". */
export function createComponentLogger(component: string): ILogger {
  return new ComponentLogger({ component: `server.${component}` });
}
