/**
 * Convert registry schemas to the native function-calling format.
 */

import type { LLMToolDefinition } from "../llm/index.js";
import type { ToolSchema } from "./types.js";

export function toNativeTools(schemas: ToolSchema[]): LLMToolDefinition[] {
  return schemas.map(schema => ({
    type: "function" as const,
    function: {
      name: schema.name,
      description: schema.description,
      parameters: schema.parameters,
    },
  }));
}
