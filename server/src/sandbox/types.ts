/**
 * Sandbox Result Types
 */

/**
 * One successful live fetch. Frozen on construction; `resultId` is unique
 * per connector call, which is how the planner proves a result was not
 * reused for a second tool call.
 */
export interface QueryResult {
  readonly resultId: string;
  readonly success: true;
  /** Connector id the data came from */
  readonly source: string;
  readonly data: unknown;
  readonly rowCount: number;
  readonly latencyMs: number;
  /** When the store produced the value (ISO 8601) */
  readonly dataTimestamp: string;
  /** When the sandbox finished the call (ISO 8601) */
  readonly fetchedAt: string;
  /** When the returned records last changed, if the store tracks it (ISO 8601) */
  readonly modifiedAt?: string;
}

export interface ExecuteOptions {
  /** Request-level cancellation; combined with the connector timeout */
  signal?: AbortSignal;
}
