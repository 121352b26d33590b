/**
 * Connector Types
 *
 * A connector adapts one backing store to the capability set
 * {connect, query, health, close}. The sandbox and the capability registry
 * only ever see this interface.
 */

export type HealthState = "healthy" | "degraded" | "unreachable";

/** How query text and placeholders are written for this connector. */
export type QueryDialect = "sql" | "http";

export type QueryParams = Record<string, string | number | boolean | null>;

export interface ConnectorQueryOptions {
  /** The connector must not materialize more than this many rows. */
  maxRows: number;
  /** Aborted on sandbox timeout or request cancellation. */
  signal: AbortSignal;
}

export interface ConnectorQueryResult {
  /** Row sequence, mapping or scalar as produced by the store. */
  data: unknown;
  /** Rows/items in `data`; scalars count as 1. */
  rowCount: number;
  /** When the store produced the value (ISO 8601), if it can say. */
  dataTimestamp?: string;
  /**
   * When the returned records last changed (ISO 8601), if the store tracks
   * it. Reported alongside the data; the freshness bound does not apply.
   */
  modifiedAt?: string;
}

export interface Connector {
  /** Backing-store family, e.g. "sqlite" or "rest_api". */
  readonly kind: string;
  readonly dialect: QueryDialect;

  connect(): Promise<void>;
  query(text: string, params: QueryParams, options: ConnectorQueryOptions): Promise<ConnectorQueryResult>;
  health(): Promise<HealthState>;
  close(): Promise<void>;
}

/**
 * Thrown by connectors when the store cannot be reached at all
 * (as opposed to a query the store rejected).
 */
export class ConnectorUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectorUnavailableError";
  }
}

// ============================================
// POLICY
// ============================================

export interface ConnectorPolicy {
  /** Reject mutation statements (default: true) */
  readOnly: boolean;
  /** Results with more rows fail instead of truncating */
  maxRows: number;
  timeoutMs: number;
  /** Concurrent sandbox calls allowed against this connector */
  maxConcurrency: number;
  /** Connector-reported timestamps older than this (relative to call start) are stale */
  maxStalenessMs: number;
}

export const DEFAULT_CONNECTOR_POLICY: ConnectorPolicy = {
  readOnly: true,
  maxRows: 500,
  timeoutMs: 30_000,
  maxConcurrency: 4,
  maxStalenessMs: 60_000,
};
