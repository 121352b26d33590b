/**
 * Resilient Model Client
 *
 * Wraps an ILLMClient with bounded retries and exponential backoff.
 * Transport failures, retryable HTTP statuses and malformed model output
 * are retried; anything else fails on the first attempt. Once retries are
 * exhausted the failure surfaces as ModelCommunicationError.
 *
 * Cancellation is never retried: an aborted signal rethrows its reason.
 */

import { createComponentLogger } from "../../logging.js";
import { ModelCommunicationError, errorMessage } from "../../errors.js";
import { parseModelTurn } from "../parse.js";
import { DEFAULT_BACKOFF, computeBackoffMs, isRetryableError, sleep, type BackoffOptions } from "./retry.js";
import type { ILLMClient, LLMMessage, LLMProvider, LLMRequestOptions, LLMResponse, ModelTurn } from "../types.js";

const log = createComponentLogger("llm.resilient");

export interface ResilientClientOptions {
  /** Retries after the first attempt (default: 2) */
  maxRetries?: number;
  backoff?: Partial<BackoffOptions>;
  /** Injected for tests; defaults to an abortable setTimeout */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class ResilientModelClient implements ILLMClient {
  readonly provider: LLMProvider;
  private maxRetries: number;
  private backoff: BackoffOptions;
  private wait: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly primary: ILLMClient,
    options: ResilientClientOptions = {},
  ) {
    this.provider = primary.provider;
    this.maxRetries = options.maxRetries ?? 2;
    this.backoff = { ...DEFAULT_BACKOFF, ...options.backoff };
    this.wait = options.sleep ?? sleep;
  }

  chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse> {
    return this.withRetries(() => this.primary.chat(messages, options), options?.signal);
  }

  /** Chat and parse in one retried unit, so malformed output gets another attempt. */
  proposeTurn(messages: LLMMessage[], options: LLMRequestOptions, makeId: () => string): Promise<ModelTurn> {
    return this.withRetries(async () => {
      const response = await this.primary.chat(messages, options);
      return parseModelTurn(response, makeId);
    }, options.signal);
  }

  private async withRetries<T>(attempt: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    for (let n = 0; ; n++) {
      try {
        return await attempt();
      } catch (error) {
        if (signal?.aborted) throw signal.reason;

        const retryable = isRetryableError(error);
        if (!retryable || n >= this.maxRetries) {
          log.warn("Model call failed", {
            provider: this.provider,
            attempts: n + 1,
            retryable,
            error: errorMessage(error).substring(0, 200),
          });
          if (error instanceof ModelCommunicationError) throw error;
          throw new ModelCommunicationError(errorMessage(error), { cause: error });
        }

        const delayMs = computeBackoffMs(n + 1, error, this.backoff);
        log.info("Retrying model call", {
          provider: this.provider,
          attempt: n + 1,
          delayMs,
          error: errorMessage(error).substring(0, 200),
        });
        await this.wait(delayMs, signal);
      }
    }
  }
}
