/**
 * Execution Sandbox
 *
 * The single chokepoint for store access. Order of operations per call:
 *   1. resolve the connector handle (UnknownConnectorError)
 *   2. static validation (UnsafeQueryError), no network yet
 *   3. cached health: unreachable → ConnectionError, no query
 *   4. take a concurrency permit, run the query under timeout + caller abort;
 *      the permit is held until the connector call itself settles
 *   5. enforce the elapsed-time budget, the row cap and the freshness bound,
 *      then stamp and freeze the result
 *
 * Connector-specific failures never leave this module: callers only see
 * the typed errors from ../errors.js.
 */

import { nanoid } from "nanoid";
import { createComponentLogger } from "../logging.js";
import {
  ConnectionError,
  LiveAgentError,
  QueryCancelledError,
  QueryExecutionError,
  ResultTooLargeError,
  StaleDataError,
  TimeoutError,
  errorMessage,
} from "../errors.js";
import { ConnectorUnavailableError, type ConnectorQueryResult, type QueryParams } from "../connectors/types.js";
import type { CapabilityRegistry, ConnectorHandle } from "../connectors/registry.js";
import { validateQuery } from "./validate.js";
import type { ExecuteOptions, QueryResult } from "./types.js";

const log = createComponentLogger("sandbox");

export interface SandboxOptions {
  now?: () => number;
}

type AbortCause = { kind: "timeout" } | { kind: "cancelled"; reason: string };

function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason.message;
  return typeof reason === "string" && reason ? reason : "request cancelled";
}

export class ExecutionSandbox {
  private now: () => number;

  constructor(
    private readonly capabilities: CapabilityRegistry,
    options: SandboxOptions = {},
  ) {
    this.now = options.now ?? Date.now;
  }

  async execute(
    connectorId: string,
    query: string,
    params: QueryParams = {},
    options: ExecuteOptions = {},
  ): Promise<QueryResult> {
    const handle = this.capabilities.getHandle(connectorId);

    try {
      validateQuery(handle.connector.dialect, query, params, handle.policy.readOnly);
    } catch (err) {
      log.warn("Query rejected by validation", { connectorId, error: errorMessage(err) });
      throw err;
    }

    if (options.signal?.aborted) {
      throw new QueryCancelledError(connectorId, abortReason(options.signal));
    }

    const health = await this.capabilities.healthCheck(connectorId);
    if (health === "unreachable") {
      log.warn("Refusing query against unreachable connector", { connectorId });
      throw new ConnectionError(connectorId, "health check reports the source unreachable");
    }

    return this.run(handle, query, params, options.signal);
  }

  private async run(
    handle: ConnectorHandle,
    query: string,
    params: QueryParams,
    callerSignal: AbortSignal | undefined,
  ): Promise<QueryResult> {
    const { id, connector, policy } = handle;

    const release = await this.capabilities.acquirePermit(id);
    if (callerSignal?.aborted) {
      release();
      throw this.classify(handle, undefined, { kind: "cancelled", reason: abortReason(callerSignal) });
    }

    const startedAt = this.now();
    const controller = new AbortController();
    const state: { cause: AbortCause | null } = { cause: null };

    const abort = (next: AbortCause): void => {
      if (state.cause) return;
      state.cause = next;
      controller.abort(next.kind === "timeout" ? "timeout" : next.reason);
    };

    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
    });
    // The race below may settle first; keep the loser from surfacing as unhandled.
    aborted.catch(() => undefined);

    const timer = setTimeout(() => abort({ kind: "timeout" }), policy.timeoutMs);
    const onCallerAbort = (): void => {
      if (callerSignal) abort({ kind: "cancelled", reason: abortReason(callerSignal) });
    };
    callerSignal?.addEventListener("abort", onCallerAbort, { once: true });

    let pending: Promise<ConnectorQueryResult>;
    try {
      pending = connector.query(query, params, { maxRows: policy.maxRows, signal: controller.signal });
    } catch (err) {
      pending = Promise.reject(err);
    }
    // The permit follows the connector call, not the caller: a query that
    // ignores its signal keeps counting against maxConcurrency until it settles.
    void pending.then(release, release);

    let raw: ConnectorQueryResult;
    try {
      raw = await Promise.race([pending, aborted]);
    } catch (err) {
      throw this.classify(handle, err, state.cause);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener("abort", onCallerAbort);
    }

    // A result that lands after cancellation is discarded.
    if (state.cause) throw this.classify(handle, undefined, state.cause);

    // A connector that blocks the event loop keeps the timer from firing.
    const completedAt = this.now();
    if (completedAt - startedAt > policy.timeoutMs) {
      throw this.classify(handle, undefined, { kind: "timeout" });
    }

    if (raw.rowCount > policy.maxRows) {
      log.warn("Result exceeds row cap", { connectorId: id, rowCount: raw.rowCount, maxRows: policy.maxRows });
      throw new ResultTooLargeError(id, policy.maxRows);
    }

    const dataTimestamp = this.stamp(handle, raw.dataTimestamp, startedAt, completedAt);
    const modifiedAt = raw.modifiedAt === undefined ? undefined : this.parseTime(handle, raw.modifiedAt, "modification time");

    const result: QueryResult = Object.freeze({
      resultId: nanoid(),
      success: true,
      source: id,
      data: raw.data,
      rowCount: raw.rowCount,
      latencyMs: completedAt - startedAt,
      dataTimestamp,
      fetchedAt: new Date(completedAt).toISOString(),
      ...(modifiedAt === undefined ? {} : { modifiedAt }),
    });

    log.info("Query executed", {
      connectorId: id,
      resultId: result.resultId,
      rowCount: result.rowCount,
      latencyMs: result.latencyMs,
    });
    return result;
  }

  private stamp(handle: ConnectorHandle, reported: string | undefined, startedAt: number, completedAt: number): string {
    if (reported === undefined) return new Date(completedAt).toISOString();

    const iso = this.parseTime(handle, reported, "data timestamp");
    if (startedAt - Date.parse(iso) > handle.policy.maxStalenessMs) {
      throw new StaleDataError(handle.id, reported, handle.policy.maxStalenessMs);
    }
    return iso;
  }

  private parseTime(handle: ConnectorHandle, reported: string, what: string): string {
    const ms = Date.parse(reported);
    if (Number.isNaN(ms)) {
      throw new QueryExecutionError(handle.id, `connector reported an invalid ${what} "${reported}"`);
    }
    return new Date(ms).toISOString();
  }

  private classify(handle: ConnectorHandle, err: unknown, cause: AbortCause | null): LiveAgentError {
    const { id, policy } = handle;

    if (cause?.kind === "timeout") {
      log.warn("Query timed out", { connectorId: id, timeoutMs: policy.timeoutMs });
      return new TimeoutError(id, policy.timeoutMs);
    }
    if (cause?.kind === "cancelled") {
      log.info("Query cancelled", { connectorId: id, reason: cause.reason });
      return new QueryCancelledError(id, cause.reason);
    }
    if (err instanceof LiveAgentError) return err;
    if (err instanceof ConnectorUnavailableError) {
      this.capabilities.markHealth(id, "unreachable");
      log.warn("Connector unavailable during query", { connectorId: id, error: err.message });
      return new ConnectionError(id, err.message, { cause: err });
    }

    log.warn("Query failed", { connectorId: id, error: errorMessage(err) });
    return new QueryExecutionError(id, errorMessage(err), { cause: err });
  }
}
