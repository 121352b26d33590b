/**
 * Error Taxonomy
 *
 * Every failure the core can produce is one of these classes. `code` is
 * stable and is what the model and HTTP callers see; messages are for humans.
 */

export type ErrorCode =
  | "UNKNOWN_TOOL"
  | "DUPLICATE_TOOL"
  | "REGISTRY_FROZEN"
  | "UNKNOWN_CONNECTOR"
  | "DUPLICATE_CONNECTOR"
  | "INVALID_TOOL_ARGUMENTS"
  | "UNSAFE_QUERY"
  | "CONNECTION_ERROR"
  | "QUERY_EXECUTION_ERROR"
  | "STALE_DATA"
  | "TIMEOUT"
  | "CANCELLED"
  | "RESULT_TOO_LARGE"
  | "MODEL_COMMUNICATION_ERROR"
  | "BUDGET_EXCEEDED"
  | "INTERNAL_ERROR";

export class LiveAgentError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LiveAgentError";
    this.code = code;
  }
}

// ============================================
// REGISTRIES
// ============================================

export class UnknownToolError extends LiveAgentError {
  constructor(public readonly toolName: string) {
    super("UNKNOWN_TOOL", `Unknown tool: ${toolName}`);
    this.name = "UnknownToolError";
  }
}

export class DuplicateToolError extends LiveAgentError {
  constructor(public readonly toolName: string) {
    super("DUPLICATE_TOOL", `Tool already registered: ${toolName}`);
    this.name = "DuplicateToolError";
  }
}

export class RegistryFrozenError extends LiveAgentError {
  constructor(registry: string, entry: string) {
    super("REGISTRY_FROZEN", `${registry} is frozen; cannot register ${entry}`);
    this.name = "RegistryFrozenError";
  }
}

export class UnknownConnectorError extends LiveAgentError {
  constructor(public readonly connectorId: string) {
    super("UNKNOWN_CONNECTOR", `Unknown connector: ${connectorId}`);
    this.name = "UnknownConnectorError";
  }
}

export class DuplicateConnectorError extends LiveAgentError {
  constructor(public readonly connectorId: string) {
    super("DUPLICATE_CONNECTOR", `Connector already registered: ${connectorId}`);
    this.name = "DuplicateConnectorError";
  }
}

// ============================================
// TOOL ARGUMENTS
// ============================================

export class InvalidToolArgumentsError extends LiveAgentError {
  constructor(
    public readonly toolName: string,
    public readonly problems: string[],
  ) {
    super("INVALID_TOOL_ARGUMENTS", `Invalid arguments for ${toolName}: ${problems.join("; ")}`);
    this.name = "InvalidToolArgumentsError";
  }
}

// ============================================
// SANDBOX
// ============================================

/** Blocked mutation or unparameterized input. Never retried with relaxed validation. */
export class UnsafeQueryError extends LiveAgentError {
  constructor(public readonly reason: string) {
    super("UNSAFE_QUERY", `Unsafe query rejected: ${reason}`);
    this.name = "UnsafeQueryError";
  }
}

export class ConnectionError extends LiveAgentError {
  constructor(
    public readonly connectorId: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super("CONNECTION_ERROR", `Cannot reach data source "${connectorId}": ${detail}`, options);
    this.name = "ConnectionError";
  }
}

export class QueryExecutionError extends LiveAgentError {
  constructor(
    public readonly connectorId: string,
    detail: string,
    options?: { cause?: unknown; code?: ErrorCode },
  ) {
    super(options?.code ?? "QUERY_EXECUTION_ERROR", `Query failed on "${connectorId}": ${detail}`, options);
    this.name = "QueryExecutionError";
  }
}

export class StaleDataError extends QueryExecutionError {
  constructor(connectorId: string, dataTimestamp: string, maxStalenessMs: number) {
    super(connectorId, `data timestamp ${dataTimestamp} is older than the ${maxStalenessMs}ms freshness bound`, {
      code: "STALE_DATA",
    });
    this.name = "StaleDataError";
  }
}

export class TimeoutError extends LiveAgentError {
  constructor(
    public readonly connectorId: string,
    public readonly timeoutMs: number,
    code: ErrorCode = "TIMEOUT",
    message = `Query on "${connectorId}" timed out after ${timeoutMs}ms`,
  ) {
    super(code, message);
    this.name = "TimeoutError";
  }
}

/** The caller abandoned the request while the query was in flight. */
export class QueryCancelledError extends TimeoutError {
  constructor(connectorId: string, public readonly reason: string) {
    super(connectorId, 0, "CANCELLED", `Query on "${connectorId}" cancelled: ${reason}`);
    this.name = "QueryCancelledError";
  }
}

export class ResultTooLargeError extends LiveAgentError {
  constructor(
    public readonly connectorId: string,
    public readonly maxRows: number,
  ) {
    super("RESULT_TOO_LARGE", `Query on "${connectorId}" returned more than ${maxRows} rows; narrow the query`);
    this.name = "ResultTooLargeError";
  }
}

// ============================================
// PLANNER
// ============================================

export class ModelCommunicationError extends LiveAgentError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super("MODEL_COMMUNICATION_ERROR", `Language model error: ${detail}`, options);
    this.name = "ModelCommunicationError";
  }
}

export class BudgetExceededError extends LiveAgentError {
  constructor(public readonly maxIterations: number) {
    super("BUDGET_EXCEEDED", `No answer within ${maxIterations} planning steps`);
    this.name = "BudgetExceededError";
  }
}

/** The inbound request was cancelled while the brain was waiting. */
export class RequestCancelledError extends LiveAgentError {
  constructor(public readonly reason: string) {
    super("CANCELLED", `Request cancelled: ${reason}`);
    this.name = "RequestCancelledError";
  }
}

// ============================================
// HELPERS
// ============================================

export interface ErrorObservation {
  code: ErrorCode;
  message: string;
}

/** Shape an error for the model or an HTTP caller. */
export function toObservation(error: unknown): ErrorObservation {
  if (error instanceof LiveAgentError) {
    return { code: error.code, message: error.message };
  }
  return {
    code: "INTERNAL_ERROR",
    message: error instanceof Error ? error.message : String(error),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
