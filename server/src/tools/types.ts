/**
 * Tool Types
 *
 * A tool is a named, schema-described capability the planner may invoke.
 * Handlers receive validated arguments and must route every store access
 * through the sandbox they are handed.
 */

import type { ILogger } from "@live-agent/shared/logging";
import type { CapabilityRegistry } from "../connectors/registry.js";
import type { ExecutionSandbox } from "../sandbox/sandbox.js";
import type { QueryResult } from "../sandbox/types.js";

export type ParameterType = "string" | "number" | "integer" | "boolean";

export type ArgumentValue = string | number | boolean;

export type ToolArguments = Record<string, ArgumentValue>;

export interface ParameterSpec {
  type: ParameterType;
  description: string;
  required?: boolean;
  default?: ArgumentValue;
  /** Allowed values (strings only) */
  enum?: readonly string[];
}

export interface ToolContext {
  sandbox: ExecutionSandbox;
  capabilities: CapabilityRegistry;
  /** Aborted when the inbound request is cancelled */
  signal: AbortSignal;
  requestId: string;
  log: ILogger;
}

export type ToolHandler = (args: ToolArguments, ctx: ToolContext) => Promise<QueryResult>;

export interface ToolDefinition {
  name: string;
  /** Shown to the model; decides when the tool gets picked */
  description: string;
  parameters: Record<string, ParameterSpec>;
  handler: ToolHandler;
  /**
   * Dynamic entity types this tool serves (e.g. "inventory", "stock").
   * Questions mentioning them need a live fetch before they can be answered.
   */
  entities?: readonly string[];
}

/** What the model sees for one tool: JSON-Schema shaped parameters. */
export interface ToolSchema {
  name: string;
  description: string;
  parameters: {
    type: "object";
    properties: Record<string, {
      type: ParameterType;
      description: string;
      default?: ArgumentValue;
      enum?: string[];
    }>;
    required: string[];
  };
}
