/**
 * Tool Registry
 *
 * Name → ToolDefinition. Populated at startup, frozen before the first
 * request, read-only afterwards. A second registration under an existing
 * name fails with DuplicateToolError; nothing is ever overwritten.
 */

import { createComponentLogger } from "../logging.js";
import { DuplicateToolError, RegistryFrozenError, UnknownToolError } from "../errors.js";
import type { ToolDefinition, ToolSchema } from "./types.js";

const log = createComponentLogger("tools");

/** Function-calling APIs accept letters, digits, "_" and "-", up to 64 chars. */
const TOOL_NAME = /^[a-zA-Z0-9_-]{1,64}$/;

export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();
  private frozen = false;

  register(tool: ToolDefinition): void {
    if (this.frozen) throw new RegistryFrozenError("Tool registry", `tool "${tool.name}"`);
    if (!TOOL_NAME.test(tool.name)) {
      throw new Error(`Invalid tool name "${tool.name}": use letters, digits, "_" or "-" (max 64)`);
    }
    if (!tool.description.trim()) {
      throw new Error(`Tool "${tool.name}" needs a description`);
    }
    if (this.tools.has(tool.name)) throw new DuplicateToolError(tool.name);

    const frozenTool: ToolDefinition = Object.freeze({
      ...tool,
      parameters: Object.freeze(Object.fromEntries(
        Object.entries(tool.parameters).map(([name, spec]) => [name, Object.freeze({ ...spec })]),
      )),
      entities: tool.entities ? Object.freeze([...tool.entities]) : undefined,
    });
    this.tools.set(tool.name, frozenTool);

    log.debug("Tool registered", { name: tool.name, parameters: Object.keys(tool.parameters) });
  }

  resolve(name: string): ToolDefinition {
    const tool = this.tools.get(name);
    if (!tool) throw new UnknownToolError(name);
    return tool;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  /** Schemas in registration order, ready to hand to the model verbatim. */
  listSchemas(): ToolSchema[] {
    return [...this.tools.values()].map(tool => ({
      name: tool.name,
      description: tool.description,
      parameters: {
        type: "object",
        properties: Object.fromEntries(
          Object.entries(tool.parameters).map(([name, spec]) => [name, {
            type: spec.type,
            description: spec.description,
            ...(spec.default !== undefined ? { default: spec.default } : {}),
            ...(spec.enum ? { enum: [...spec.enum] } : {}),
          }]),
        ),
        required: Object.entries(tool.parameters)
          .filter(([, spec]) => spec.required)
          .map(([name]) => name),
      },
    }));
  }

  /** Union of every registered tool's dynamic entity types, lower-cased. */
  dynamicEntities(): string[] {
    const entities = new Set<string>();
    for (const tool of this.tools.values()) {
      for (const entity of tool.entities ?? []) entities.add(entity.toLowerCase());
    }
    return [...entities];
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }
}
