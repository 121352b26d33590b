/**
 * Resilience: Barrel Export
 */

export {
  isRetryableError,
  extractRetryAfterMs,
  computeBackoffMs,
  sleep,
  DEFAULT_BACKOFF,
  type BackoffOptions,
} from "./retry.js";
export { ResilientModelClient, type ResilientClientOptions } from "./resilient-client.js";
