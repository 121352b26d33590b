/**
 * OpenAI-Compatible LLM Client
 *
 * Works with any provider that implements the OpenAI chat completions API.
 * OpenAI itself and Ollama's /v1 endpoint both go through here.
 *
 * Every request is bounded by timeoutMs. An expired request fails with a
 * ModelCommunicationError, which the resilient wrapper retries; a caller
 * abort rejects with the caller's reason.
 */

import { ModelCommunicationError } from "../errors.js";
import type { ILLMClient, LLMMessage, LLMProvider, LLMRequestOptions, LLMResponse, LLMToolCall } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** finish_reason values that still leave a usable message. */
const KNOWN_FINISH_REASONS = new Set(["stop", "tool_calls", "length", "function_call"]);

export const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

function formatMessagesForAPI(messages: LLMMessage[]): Record<string, unknown>[] {
  return messages.map(m => {
    const msg: Record<string, unknown> = { role: m.role, content: m.content };
    if (m.role === "assistant" && m.tool_calls?.length) msg.tool_calls = m.tool_calls;
    if (m.role === "tool" && m.tool_call_id) msg.tool_call_id = m.tool_call_id;
    return msg;
  });
}

function readToolCall(raw: unknown, index: number): LLMToolCall {
  const fn = isRecord(raw) ? raw.function : undefined;
  if (!isRecord(raw) || !isRecord(fn)) {
    throw new ModelCommunicationError(`tool call ${index} is not an object with a function`);
  }
  const args = fn.arguments;
  return {
    id: typeof raw.id === "string" ? raw.id : "",
    type: "function",
    function: {
      name: typeof fn.name === "string" ? fn.name : "",
      // Some servers send the arguments already decoded.
      arguments: typeof args === "string" ? args : args === undefined ? "" : JSON.stringify(args),
    },
  };
}

export class OpenAICompatibleClient implements ILLMClient {
  private fetchImpl: typeof fetch;

  constructor(
    readonly provider: LLMProvider,
    private readonly apiKey: string,
    private readonly baseUrl: string,
    private readonly defaultModel: string,
    fetchImpl?: typeof fetch,
    private readonly timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS,
  ) {
    this.fetchImpl = fetchImpl ?? fetch;
  }

  async chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse> {
    const model = options?.model || this.defaultModel;

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }

    const body: Record<string, unknown> = {
      model,
      messages: formatMessagesForAPI(messages),
      temperature: options?.temperature ?? 0,
      max_tokens: options?.maxTokens ?? 2048,
      stream: false,
    };
    if (options?.tools?.length) {
      body.tools = options.tools;
      body.tool_choice = "auto";
    }

    const controller = new AbortController();
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
    });
    const callerSignal = options?.signal;
    const onCallerAbort = () => controller.abort(callerSignal?.reason);
    if (callerSignal?.aborted) onCallerAbort();
    else callerSignal?.addEventListener("abort", onCallerAbort, { once: true });
    const timer = setTimeout(() => {
      controller.abort(new ModelCommunicationError(`${this.provider} request timed out after ${this.timeoutMs}ms`));
    }, this.timeoutMs);

    try {
      // Raced as well as signalled: a fetch that ignores its signal still gives up.
      return await Promise.race([this.exchange(model, headers, body, controller.signal), aborted]);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private async exchange(
    model: string,
    headers: Record<string, string>,
    body: Record<string, unknown>,
    signal: AbortSignal,
  ): Promise<LLMResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const retryAfter = response.headers.get("retry-after");
      const hint = retryAfter ? ` (retry-after: ${retryAfter})` : "";
      throw new Error(`${this.provider} API error: ${response.status}${hint} ${await response.text()}`);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (err) {
      throw new ModelCommunicationError(`${this.provider} returned a body that is not JSON`, { cause: err });
    }

    const choices = isRecord(data) ? data.choices : undefined;
    const first: unknown = Array.isArray(choices) ? choices[0] : undefined;
    const message = isRecord(first) ? first.message : undefined;
    if (!isRecord(data) || !isRecord(message)) {
      throw new ModelCommunicationError(`${this.provider} response has no choices[0].message`);
    }

    const finish = isRecord(first) ? first.finish_reason : undefined;
    if (typeof finish === "string" && !KNOWN_FINISH_REASONS.has(finish)) {
      throw new ModelCommunicationError(`${this.provider} finished with unexpected reason "${finish}"`);
    }

    const rawCalls = message.tool_calls;
    const toolCalls = Array.isArray(rawCalls) ? rawCalls.map(readToolCall) : [];
    const usage = isRecord(data.usage) ? data.usage : {};

    return {
      content: typeof message.content === "string" ? message.content : "",
      model: typeof data.model === "string" ? data.model : model,
      provider: this.provider,
      usage: {
        inputTokens: typeof usage.prompt_tokens === "number" ? usage.prompt_tokens : 0,
        outputTokens: typeof usage.completion_tokens === "number" ? usage.completion_tokens : 0,
      },
      toolCalls: toolCalls.length ? toolCalls : undefined,
    };
  }
}
