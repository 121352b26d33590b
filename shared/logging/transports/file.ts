/**
 * File Transport
 *
 * Appends JSON lines to `<logDir>/<filename>-<YYYY-MM-DD>.log`, rotating
 * to `.1`, `.2`, … when the file passes `maxSize`. Node.js only.
 */

import * as fs from "fs";
import * as path from "path";
import type { LogEntry, LogLevel, LogTransport } from "../types.js";

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename (default: "live-agent") */
  filename?: string;
  /** Bytes before rotation (default: 10MB) */
  maxSize?: number;
  /** Rotated files kept (default: 5) */
  maxFiles?: number;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private logDir: string;
  private filename: string;
  private maxSize: number;
  private maxFiles: number;
  private currentPath = "";
  private currentSize = 0;
  private stream: fs.WriteStream | null = null;
  private pending = 0;
  private drained: Array<() => void> = [];

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel ?? "info";
    this.logDir = options.logDir;
    this.filename = options.filename ?? "live-agent";
    this.maxSize = options.maxSize ?? 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;

    fs.mkdirSync(this.logDir, { recursive: true });
    this.open();
  }

  private pathForToday(): string {
    const date = new Date().toISOString().slice(0, 10);
    return path.join(this.logDir, `${this.filename}-${date}.log`);
  }

  private open(): fs.WriteStream {
    this.currentPath = this.pathForToday();
    this.currentSize = fs.existsSync(this.currentPath) ? fs.statSync(this.currentPath).size : 0;
    const stream = fs.createWriteStream(this.currentPath, { flags: "a" });
    stream.on("error", (err: Error) => {
      console.error("[FileTransport] Write error:", err);
    });
    this.stream = stream;
    return stream;
  }

  log(entry: LogEntry): void {
    const line = JSON.stringify(entry) + "\n";
    const bytes = Buffer.byteLength(line);

    if (this.currentSize + bytes > this.maxSize) this.rotate();
    if (this.pathForToday() !== this.currentPath) {
      this.stream?.end();
      this.open();
    }

    const stream = this.stream ?? this.open();
    this.pending++;
    this.currentSize += bytes;
    stream.write(line, () => {
      this.pending--;
      if (this.pending === 0) {
        for (const resolve of this.drained.splice(0)) resolve();
      }
    });
  }

  private rotate(): void {
    this.stream?.end();
    this.stream = null;

    const oldest = `${this.currentPath}.${this.maxFiles}`;
    if (fs.existsSync(oldest)) fs.unlinkSync(oldest);
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const from = `${this.currentPath}.${i}`;
      if (fs.existsSync(from)) fs.renameSync(from, `${this.currentPath}.${i + 1}`);
    }
    if (fs.existsSync(this.currentPath)) fs.renameSync(this.currentPath, `${this.currentPath}.1`);

    this.open();
  }

  flush(): Promise<void> {
    if (this.pending === 0) return Promise.resolve();
    return new Promise(resolve => this.drained.push(resolve));
  }

  async close(): Promise<void> {
    await this.flush();
    const stream = this.stream;
    this.stream = null;
    if (!stream) return;
    await new Promise<void>(resolve => stream.end(() => resolve()));
  }
}
