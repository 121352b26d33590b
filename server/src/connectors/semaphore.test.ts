/**
 * Semaphore Tests
 *
 * Covers:
 * - Permits are handed out up to the size, then callers queue
 * - Release hands the permit to the oldest waiter
 * - Releasing twice frees only one permit
 * - run() releases on rejection
 */

import { describe, it, expect } from "vitest";
import { Semaphore } from "./semaphore.js";

describe("Semaphore", () => {
  it("rejects a non-positive size", () => {
    expect(() => new Semaphore(0)).toThrow("positive integer");
    expect(() => new Semaphore(1.5)).toThrow("positive integer");
  });

  it("queues callers beyond the size and serves them in order", async () => {
    const sem = new Semaphore(1);
    const order: string[] = [];

    const releaseA = await sem.acquire();
    const b = sem.acquire().then(release => { order.push("b"); return release; });
    const c = sem.acquire().then(release => { order.push("c"); return release; });

    expect(sem.available).toBe(0);
    expect(sem.waiting).toBe(2);

    releaseA();
    const releaseB = await b;
    expect(order).toEqual(["b"]);

    releaseB();
    const releaseC = await c;
    expect(order).toEqual(["b", "c"]);

    releaseC();
    expect(sem.available).toBe(1);
  });

  it("ignores a second release of the same permit", async () => {
    const sem = new Semaphore(2);
    const release = await sem.acquire();
    release();
    release();
    expect(sem.available).toBe(2);
  });

  it("run() releases the permit when the task rejects", async () => {
    const sem = new Semaphore(1);
    await expect(sem.run(async () => { throw new Error("boom"); })).rejects.toThrow("boom");
    expect(sem.available).toBe(1);
  });
});
