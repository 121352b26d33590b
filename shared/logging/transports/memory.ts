/**
 * Memory Transport
 *
 * Keeps entries in an array. Used by tests to assert on what was logged.
 */

import type { LogEntry, LogLevel, LogTransport } from "../types.js";

export class MemoryTransport implements LogTransport {
  name = "memory";
  minLevel: LogLevel;
  readonly entries: LogEntry[] = [];

  constructor(minLevel: LogLevel = "trace") {
    this.minLevel = minLevel;
  }

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter(e => !level || e.level === level).map(e => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
