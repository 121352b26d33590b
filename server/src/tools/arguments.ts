/**
 * Tool Argument Validation
 *
 * Checks raw model-proposed arguments against a tool's parameter specs.
 * Every problem is collected so the model sees them all in one observation.
 */

import { InvalidToolArgumentsError } from "../errors.js";
import type { ArgumentValue, ParameterSpec, ToolArguments, ToolDefinition } from "./types.js";

const NUMERIC = /^-?\d+(\.\d+)?$/;

function coerce(name: string, spec: ParameterSpec, value: unknown, problems: string[]): ArgumentValue | undefined {
  switch (spec.type) {
    case "string":
      if (typeof value !== "string") {
        problems.push(`"${name}" must be a string`);
        return undefined;
      }
      if (spec.required && value.trim() === "") {
        problems.push(`"${name}" must not be empty`);
        return undefined;
      }
      if (spec.enum && !spec.enum.includes(value)) {
        problems.push(`"${name}" must be one of ${spec.enum.join(", ")}`);
        return undefined;
      }
      return value;

    case "number":
    case "integer": {
      // Models sometimes quote numbers.
      const n = typeof value === "string" && NUMERIC.test(value.trim()) ? Number(value) : value;
      if (typeof n !== "number" || !Number.isFinite(n)) {
        problems.push(`"${name}" must be a ${spec.type}`);
        return undefined;
      }
      if (spec.type === "integer" && !Number.isInteger(n)) {
        problems.push(`"${name}" must be an integer`);
        return undefined;
      }
      return n;
    }

    case "boolean":
      if (typeof value !== "boolean") {
        problems.push(`"${name}" must be a boolean`);
        return undefined;
      }
      return value;
  }
}

/**
 * Validate `raw` against `tool.parameters`. Applies defaults and drops keys
 * the tool does not declare. Throws InvalidToolArgumentsError listing every
 * problem found.
 */
export function validateArguments(tool: ToolDefinition, raw: Record<string, unknown>): ToolArguments {
  const problems: string[] = [];
  const args: ToolArguments = {};

  for (const [name, spec] of Object.entries(tool.parameters)) {
    const value = raw[name];

    if (value === undefined || value === null) {
      if (spec.default !== undefined) args[name] = spec.default;
      else if (spec.required) problems.push(`missing required parameter "${name}"`);
      continue;
    }

    const coerced = coerce(name, spec, value, problems);
    if (coerced !== undefined) args[name] = coerced;
  }

  if (problems.length > 0) throw new InvalidToolArgumentsError(tool.name, problems);
  return args;
}
