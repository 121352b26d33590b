/**
 * ResilientModelClient Tests: Bounded Retries
 *
 * Covers:
 * - Retryable error detection (408, 429, 5xx, network errors, malformed output)
 * - Non-retryable errors fail on the first attempt
 * - Exponential backoff, Retry-After hints, the delay cap
 * - Exhausted retries surface as ModelCommunicationError
 * - A provider request that times out is retried like any transport failure
 * - proposeTurn retries malformed output
 * - Cancelled requests are never retried
 */

import { describe, it, expect, vi } from "vitest";
import { ResilientModelClient } from "./resilient-client.js";
import { OpenAICompatibleClient } from "../openai-compatible.js";
import { computeBackoffMs, extractRetryAfterMs, isRetryableError } from "./retry.js";
import { ModelCommunicationError } from "../../errors.js";
import type { ILLMClient, LLMMessage, LLMResponse } from "../types.js";

// ============================================
// HELPERS
// ============================================

function makeMockClient() {
  const chat = vi.fn<ILLMClient["chat"]>();
  const client: ILLMClient = { provider: "openai", chat };
  return { client, chat };
}

function ok(content: string): LLMResponse {
  return { content, model: "test-model", provider: "openai", usage: { inputTokens: 10, outputTokens: 5 } };
}

const MESSAGES: LLMMessage[] = [{ role: "user", content: "Hi" }];

function resilient(client: ILLMClient, maxRetries = 2) {
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
  return { model: new ResilientModelClient(client, { maxRetries, sleep }), sleep };
}

// ============================================
// isRetryableError
// ============================================

describe("isRetryableError", () => {
  it.each([
    "openai API error: 429 Rate limit exceeded",
    "openai API error: 503 Service Unavailable",
    "openai API error: 408 Request Timeout",
    "fetch failed",
    "read ECONNRESET",
    "socket hang up",
  ])("retries %s", (message) => {
    expect(isRetryableError(new Error(message))).toBe(true);
  });

  it.each([
    "openai API error: 401 Unauthorized",
    "openai API error: 400 model 'gpt-5000' not found (retry later)",
    "Invalid API key",
  ])("does not retry %s", (message) => {
    expect(isRetryableError(new Error(message))).toBe(false);
  });

  it("always retries malformed model output", () => {
    expect(isRetryableError(new ModelCommunicationError("empty response with no tool calls"))).toBe(true);
  });
});

// ============================================
// BACKOFF
// ============================================

describe("backoff", () => {
  it("extracts Retry-After seconds under the cap", () => {
    expect(extractRetryAfterMs(new Error("429 (retry-after: 2)"))).toBe(2000);
    expect(extractRetryAfterMs(new Error("429 (retry-after: 60)"))).toBe(0);
    expect(extractRetryAfterMs(new Error("429"))).toBe(0);
  });

  it("doubles from the base delay up to the cap", () => {
    const err = new Error("503");
    expect([1, 2, 3, 4, 5, 6].map(n => computeBackoffMs(n, err))).toEqual([500, 1000, 2000, 4000, 8000, 8000]);
  });

  it("waits at least as long as a Retry-After hint", () => {
    expect(computeBackoffMs(1, new Error("openai API error: 429 (retry-after: 3)"))).toBe(3000);
  });
});

// ============================================
// ResilientModelClient
// ============================================

describe("ResilientModelClient", () => {
  it("returns the first successful response without waiting", async () => {
    const { client, chat } = makeMockClient();
    chat.mockResolvedValueOnce(ok("Hello!"));
    const { model, sleep } = resilient(client);

    const response = await model.chat(MESSAGES);

    expect(response.content).toBe("Hello!");
    expect(chat).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("retries transient failures with growing delays", async () => {
    const { client, chat } = makeMockClient();
    chat
      .mockRejectedValueOnce(new Error("openai API error: 503 overloaded"))
      .mockRejectedValueOnce(new Error("fetch failed"))
      .mockResolvedValueOnce(ok("Recovered"));
    const { model, sleep } = resilient(client);

    const response = await model.chat(MESSAGES);

    expect(response.content).toBe("Recovered");
    expect(chat).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(c => c[0])).toEqual([500, 1000]);
  });

  it("gives up after maxRetries with a ModelCommunicationError", async () => {
    const { client, chat } = makeMockClient();
    chat.mockRejectedValue(new Error("openai API error: 503 overloaded"));
    const { model } = resilient(client, 2);

    const error = await model.chat(MESSAGES).catch((err: unknown) => err);

    expect(chat).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(ModelCommunicationError);
    expect(error).toHaveProperty("message", "Language model error: openai API error: 503 overloaded");
  });

  it("does not retry a non-retryable failure", async () => {
    const { client, chat } = makeMockClient();
    chat.mockRejectedValue(new Error("openai API error: 401 Unauthorized"));
    const { model } = resilient(client);

    await expect(model.chat(MESSAGES)).rejects.toThrow(ModelCommunicationError);
    expect(chat).toHaveBeenCalledTimes(1);
  });

  it("proposeTurn retries an empty response and returns the next answer", async () => {
    const { client, chat } = makeMockClient();
    chat.mockResolvedValueOnce(ok("")).mockResolvedValueOnce(ok("50 laptops"));
    const { model } = resilient(client);

    const turn = await model.proposeTurn(MESSAGES, {}, () => "id");

    expect(turn).toMatchObject({ kind: "answer", text: "50 laptops" });
    expect(chat).toHaveBeenCalledTimes(2);
  });

  it("proposeTurn fails once malformed output persists past the retries", async () => {
    const { client, chat } = makeMockClient();
    chat.mockResolvedValue(ok("   "));
    const { model } = resilient(client, 1);

    await expect(model.proposeTurn(MESSAGES, {}, () => "id"))
      .rejects.toThrow("Language model error: empty response with no tool calls");
    expect(chat).toHaveBeenCalledTimes(2);
  });

  it("never retries once the request is cancelled", async () => {
    const { client, chat } = makeMockClient();
    const controller = new AbortController();
    chat.mockImplementation(async () => {
      controller.abort("client went away");
      throw new Error("fetch failed");
    });
    const { model, sleep } = resilient(client);

    await expect(model.chat(MESSAGES, { signal: controller.signal })).rejects.toBe("client went away");
    expect(chat).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});

// ============================================
// TIMEOUTS
// ============================================

describe("ResilientModelClient over a provider that never answers", () => {
  it("retries the timed-out request, then fails with ModelCommunicationError", async () => {
    const fetchImpl = vi.fn<typeof fetch>(() => new Promise<Response>(() => undefined));
    const provider = new OpenAICompatibleClient("openai", "test-secret", "https://llm.test/v1", "gpt-4o", fetchImpl, 20);
    const { model, sleep } = resilient(provider, 2);

    const error = await model.chat(MESSAGES).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelCommunicationError);
    expect(error).toHaveProperty("message", "Language model error: openai request timed out after 20ms");
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });
});
