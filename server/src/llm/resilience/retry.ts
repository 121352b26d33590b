/**
 * Retry & Error Detection
 *
 * Decides whether a model-call failure is transient and how long to wait
 * before the next attempt.
 */

import { ModelCommunicationError } from "../../errors.js";

// ============================================
// RETRYABLE ERROR DETECTION
// ============================================

/** HTTP status codes that indicate a transient failure */
const RETRYABLE_STATUS_CODES = [408, 429, 500, 502, 503, 504];

/** Error message patterns that indicate a transient failure */
const RETRYABLE_PATTERNS = [
  "rate limit",
  "too many requests",
  "fetch failed",
  "econnrefused",
  "econnreset",
  "enotfound",
  "network",
  "timeout",
  "timed out",
  "socket hang up",
];

/**
 * Malformed or empty model output is always worth another attempt; other
 * errors only when they look like a transient transport or status failure.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ModelCommunicationError) return true;

  const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();

  const status = msg.match(/api error: (\d{3})/);
  if (status) return RETRYABLE_STATUS_CODES.includes(Number(status[1]));

  return RETRYABLE_PATTERNS.some(pattern => msg.includes(pattern));
}

/**
 * Extract a Retry-After delay from an error message.
 * Returns ms, or 0 when absent or longer than `capMs`.
 */
export function extractRetryAfterMs(error: unknown, capMs = 30_000): number {
  const msg = error instanceof Error ? error.message : String(error);
  const match = msg.match(/retry[- ]after:?\s*(\d+)/i);
  if (!match) return 0;
  const ms = parseInt(match[1], 10) * 1000;
  return ms <= capMs ? ms : 0;
}

// ============================================
// BACKOFF
// ============================================

export interface BackoffOptions {
  /** Delay before the first retry (default: 500ms) */
  baseDelayMs: number;
  /** Upper bound for any single delay (default: 8s) */
  maxDelayMs: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  baseDelayMs: 500,
  maxDelayMs: 8_000,
};

/** Delay before retry number `attempt` (1-based), honouring a Retry-After hint. */
export function computeBackoffMs(attempt: number, error: unknown, options: BackoffOptions = DEFAULT_BACKOFF): number {
  const exponential = options.baseDelayMs * 2 ** (attempt - 1);
  const hinted = extractRetryAfterMs(error, options.maxDelayMs);
  return Math.min(Math.max(exponential, hinted), options.maxDelayMs);
}

/** Resolves after `ms`, rejecting early with the signal's reason on abort. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
