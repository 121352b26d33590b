/**
 * Core Logger
 *
 * Structured logging with pluggable transports. Child loggers share the
 * parent's transports and ring buffer; only component and request id differ.
 */

import {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  type ChildContext,
  type ILogger,
  type LogEntry,
  type LoggerConfig,
  type LogLevel,
  type LogTransport,
} from "./types.js";

// ============================================
// RING BUFFER
// ============================================

export class RingBuffer<T> {
  private items: T[] = [];
  private head = 0;

  constructor(private readonly capacity: number) {}

  push(item: T): void {
    if (this.items.length < this.capacity) {
      this.items.push(item);
      return;
    }
    this.items[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
  }

  /** Oldest first. */
  toArray(): T[] {
    return [...this.items.slice(this.head), ...this.items.slice(0, this.head)];
  }

  last(n: number): T[] {
    return n <= 0 ? [] : this.toArray().slice(-n);
  }
}

// ============================================
// SHARED SINK
// ============================================

export interface LogSink {
  minLevel: LogLevel;
  transports: LogTransport[];
  redactPatterns: RegExp[];
  buffer: RingBuffer<LogEntry>;
}

function describeError(error: unknown): LogEntry["error"] {
  if (error instanceof Error) {
    const code = "code" in error ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      code: typeof code === "string" ? code : undefined,
      stack: error.stack,
    };
  }
  return { name: "Unknown", message: String(error) };
}

function redact(value: unknown, patterns: RegExp[]): unknown {
  if (Array.isArray(value)) {
    return value.map(item => redact(item, patterns));
  }
  if (value && typeof value === "object" && !(value instanceof Date)) {
    return redactRecord(Object.fromEntries(Object.entries(value)), patterns);
  }
  return value;
}

function redactRecord(data: Record<string, unknown>, patterns: RegExp[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    result[key] = patterns.some(p => p.test(key)) ? "[REDACTED]" : redact(value, patterns);
  }
  return result;
}

// ============================================
// LOGGER
// ============================================

export class Logger implements ILogger {
  private readonly sink: LogSink;
  private readonly component: string;
  private readonly requestId?: string;

  /** Pass `sink` to share transports and buffer with an existing logger. */
  constructor(config: LoggerConfig, sink?: LogSink) {
    this.sink = sink ?? {
      minLevel: config.minLevel,
      transports: config.transports,
      redactPatterns: config.redactPatterns ?? DEFAULT_REDACT_PATTERNS,
      buffer: new RingBuffer<LogEntry>(config.ringBufferSize ?? 1000),
    };
    this.component = config.component;
    this.requestId = config.requestId;
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.write("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("fatal", message, data, error);
  }

  private write(level: LogLevel, message: string, data?: Record<string, unknown>, error?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.sink.minLevel]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
    };
    if (this.requestId) entry.requestId = this.requestId;
    if (data) entry.data = redactRecord(data, this.sink.redactPatterns);
    if (error !== undefined) entry.error = describeError(error);

    this.sink.buffer.push(entry);

    for (const transport of this.sink.transports) {
      if (LOG_LEVELS[level] < LOG_LEVELS[transport.minLevel]) continue;
      try {
        transport.log(entry);
      } catch (e) {
        console.error(`[Logger] Transport ${transport.name} failed:`, e);
      }
    }
  }

  child(context: ChildContext): ILogger {
    return new Logger(
      {
        minLevel: this.sink.minLevel,
        transports: this.sink.transports,
        component: context.component ?? this.component,
        requestId: context.requestId ?? this.requestId,
      },
      this.sink,
    );
  }

  getRecentLogs(count = 100): LogEntry[] {
    return this.sink.buffer.last(count);
  }

  async flush(): Promise<void> {
    await Promise.all(this.sink.transports.map(t => t.flush?.()));
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(this.sink.transports.map(t => t.close?.()));
  }
}
