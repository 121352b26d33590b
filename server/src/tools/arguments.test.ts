/**
 * Tool Argument Validation Tests
 *
 * Covers:
 * - Defaults applied, undeclared keys dropped
 * - Missing required parameter reported
 * - Type checks, quoted-number coercion, integer and enum checks
 * - Every problem reported in one error
 */

import { describe, it, expect, vi } from "vitest";
import { validateArguments } from "./arguments.js";
import type { ToolDefinition } from "./types.js";
import { InvalidToolArgumentsError } from "../errors.js";

const tool: ToolDefinition = {
  name: "search",
  description: "Search",
  parameters: {
    query: { type: "string", description: "Text", required: true },
    threshold: { type: "integer", description: "Limit", default: 10 },
    ratio: { type: "number", description: "Ratio" },
    exact: { type: "boolean", description: "Exact match" },
    order: { type: "string", description: "Order", enum: ["asc", "desc"] },
  },
  handler: vi.fn(),
};

function problems(raw: Record<string, unknown>): string[] {
  try {
    validateArguments(tool, raw);
  } catch (err) {
    if (err instanceof InvalidToolArgumentsError) return err.problems;
    throw err;
  }
  return [];
}

describe("validateArguments", () => {
  it("applies defaults and drops undeclared keys", () => {
    expect(validateArguments(tool, { query: "laptop", extra: "ignored" })).toEqual({ query: "laptop", threshold: 10 });
  });

  it("coerces quoted numbers", () => {
    expect(validateArguments(tool, { query: "x", threshold: "5", ratio: "0.5" })).toEqual({
      query: "x",
      threshold: 5,
      ratio: 0.5,
    });
  });

  it("reports a missing required parameter", () => {
    expect(problems({})).toEqual(['missing required parameter "query"']);
  });

  it("treats null as missing", () => {
    expect(problems({ query: null })).toEqual(['missing required parameter "query"']);
  });

  it("collects every problem in one error", () => {
    expect(problems({ query: "", threshold: 1.5, ratio: "abc", exact: "yes", order: "up" })).toEqual([
      '"query" must not be empty',
      '"threshold" must be an integer',
      '"ratio" must be a number',
      '"exact" must be a boolean',
      '"order" must be one of asc, desc',
    ]);
  });

  it("names the tool in the error message", () => {
    expect(() => validateArguments(tool, {})).toThrow('Invalid arguments for search: missing required parameter "query"');
  });
});
