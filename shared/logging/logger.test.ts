/**
 * Logger Tests
 *
 * Covers:
 * - Level filtering (logger and transport)
 * - Redaction of sensitive keys, nested and inside arrays
 * - Child loggers sharing transports and ring buffer
 * - Error details (including string codes)
 * - Console line formatting
 */

import { describe, it, expect } from "vitest";
import { Logger, RingBuffer } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { MemoryTransport } from "./transports/memory.js";
import type { LogEntry } from "./types.js";

function makeLogger(minLevel: "trace" | "info" = "trace") {
  const memory = new MemoryTransport();
  const logger = new Logger({ minLevel, component: "test", transports: [memory] });
  return { logger, memory };
}

describe("RingBuffer", () => {
  it("keeps insertion order before wrapping", () => {
    const buf = new RingBuffer<number>(3);
    buf.push(1);
    buf.push(2);
    expect(buf.toArray()).toEqual([1, 2]);
  });

  it("drops the oldest entries once full", () => {
    const buf = new RingBuffer<number>(3);
    for (const n of [1, 2, 3, 4, 5]) buf.push(n);
    expect(buf.toArray()).toEqual([3, 4, 5]);
    expect(buf.last(2)).toEqual([4, 5]);
    expect(buf.last(0)).toEqual([]);
  });
});

describe("Logger", () => {
  it("skips entries below the logger's minimum level", () => {
    const { logger, memory } = makeLogger("info");
    logger.debug("hidden");
    logger.info("shown");
    expect(memory.messages()).toEqual(["shown"]);
  });

  it("skips entries below a transport's minimum level", () => {
    const loud = new MemoryTransport("warn");
    const logger = new Logger({ minLevel: "trace", component: "test", transports: [loud] });
    logger.info("quiet");
    logger.warn("loud");
    expect(loud.messages()).toEqual(["loud"]);
  });

  it("redacts sensitive keys at any depth", () => {
    const { logger, memory } = makeLogger();
    logger.info("config", {
      apiKey: "test-secret",
      nested: { password: "test-secret", port: 5432 },
      list: [{ token: "test-secret", name: "a" }],
    });
    expect(memory.entries[0].data).toEqual({
      apiKey: "[REDACTED]",
      nested: { password: "[REDACTED]", port: 5432 },
      list: [{ token: "[REDACTED]", name: "a" }],
    });
  });

  it("records error name, message and string code", () => {
    const { logger, memory } = makeLogger();
    const err = Object.assign(new Error("boom"), { code: "CONNECTION_ERROR" });
    logger.error("failed", err);
    expect(memory.entries[0].error).toMatchObject({
      name: "Error",
      message: "boom",
      code: "CONNECTION_ERROR",
    });
  });

  it("describes non-Error values", () => {
    const { logger, memory } = makeLogger();
    logger.error("failed", "plain string");
    expect(memory.entries[0].error).toEqual({ name: "Unknown", message: "plain string" });
  });

  it("child loggers override component and request id but share the buffer", () => {
    const { logger, memory } = makeLogger();
    const child = logger.child({ component: "test.child", requestId: "req-1" });
    child.info("from child");
    logger.info("from parent");

    expect(memory.entries.map(e => [e.component, e.requestId])).toEqual([
      ["test.child", "req-1"],
      ["test", undefined],
    ]);
    expect(logger.getRecentLogs(10).map(e => e.message)).toEqual(["from child", "from parent"]);
  });
});

describe("ConsoleTransport", () => {
  const entry: LogEntry = {
    timestamp: "2026-01-02T03:04:05.000Z",
    level: "info",
    component: "server.sandbox",
    message: "Query executed",
    requestId: "req-12345678-abcd",
    data: { rows: 1 },
  };

  it("formats a compact line without colors", () => {
    const transport = new ConsoleTransport({ colors: false });
    expect(transport.format(entry)).toBe('03:04:05 INF [server.sandbox] (req-1234) Query executed {"rows":1}');
  });

  it("appends the error with its code on a new line", () => {
    const transport = new ConsoleTransport({ colors: false });
    const line = transport.format({
      ...entry,
      level: "error",
      data: undefined,
      error: { name: "TimeoutError", message: "too slow", code: "TIMEOUT" },
    });
    expect(line).toBe("03:04:05 ERR [server.sandbox] (req-1234) Query executed\nTimeoutError [TIMEOUT]: too slow");
  });

  it("routes lines through the configured writer", () => {
    const lines: string[] = [];
    const transport = new ConsoleTransport({ colors: false, write: (_level, line) => lines.push(line) });
    transport.log({ ...entry, data: undefined, requestId: undefined });
    expect(lines).toEqual(["03:04:05 INF [server.sandbox] Query executed"]);
  });
});
