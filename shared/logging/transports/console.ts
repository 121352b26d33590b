/**
 * Console Transport
 *
 * One line per entry: time, level label, component, request id, message.
 * Data and errors follow on the same line (compact) or below it (pretty).
 */

import type { LogEntry, LogLevel, LogTransport } from "../types.js";

const ANSI = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  whiteOnRed: "\x1b[41m\x1b[37m",
};

const LEVEL_STYLE: Record<LogLevel, { label: string; color: string }> = {
  trace: { label: "TRC", color: ANSI.gray },
  debug: { label: "DBG", color: ANSI.cyan },
  info: { label: "INF", color: ANSI.blue },
  warn: { label: "WRN", color: ANSI.yellow },
  error: { label: "ERR", color: ANSI.red },
  fatal: { label: "FTL", color: ANSI.whiteOnRed },
  silent: { label: "   ", color: ANSI.reset },
};

export interface ConsoleTransportOptions {
  minLevel?: LogLevel;
  /** Default: true when stdout is a TTY */
  colors?: boolean;
  /** Multi-line JSON for data (default: false) */
  prettyPrint?: boolean;
  /** Where rendered lines go (default: console methods by level) */
  write?: (level: LogLevel, line: string) => void;
}

function writeToConsole(level: LogLevel, line: string): void {
  if (level === "error" || level === "fatal") console.error(line);
  else if (level === "warn") console.warn(line);
  else if (level === "info") console.info(line);
  else console.debug(line);
}

export class ConsoleTransport implements LogTransport {
  name = "console";
  minLevel: LogLevel;
  private colors: boolean;
  private prettyPrint: boolean;
  private write: (level: LogLevel, line: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel ?? "debug";
    this.colors = options.colors ?? process.stdout.isTTY === true;
    this.prettyPrint = options.prettyPrint ?? false;
    this.write = options.write ?? writeToConsole;
  }

  log(entry: LogEntry): void {
    this.write(entry.level, this.format(entry));
  }

  format(entry: LogEntry): string {
    const style = LEVEL_STYLE[entry.level];
    const time = entry.timestamp.slice(11, 19); // HH:MM:SS
    const parts = [
      this.paint(time, ANSI.dim),
      this.paint(style.label, style.color),
      this.paint(`[${entry.component}]`, ANSI.magenta),
    ];
    if (entry.requestId) parts.push(this.paint(`(${entry.requestId.slice(0, 8)})`, ANSI.dim));
    parts.push(entry.message);

    let line = parts.join(" ");

    if (entry.data && Object.keys(entry.data).length > 0) {
      const json = this.prettyPrint ? JSON.stringify(entry.data, null, 2) : JSON.stringify(entry.data);
      line += (this.prettyPrint ? "\n" : " ") + this.paint(json, ANSI.dim);
    }

    if (entry.error) {
      const code = entry.error.code ? ` [${entry.error.code}]` : "";
      line += "\n" + this.paint(`${entry.error.name}${code}: ${entry.error.message}`, ANSI.red);
      if (this.prettyPrint && entry.error.stack) line += "\n" + this.paint(entry.error.stack, ANSI.dim);
    }

    return line;
  }

  private paint(text: string, color: string): string {
    return this.colors ? `${color}${text}${ANSI.reset}` : text;
  }
}
