/**
 * Inventory Scenario Tests
 *
 * Runs the inventory tools through the real registries, sandbox and brain
 * against an in-memory SQLite database. Only the model is scripted.
 *
 * Covers:
 * - "How many laptops do we have in stock?" → parameterized name lookup → answer citing 50
 * - Lookup by product_id, full listing, low-stock threshold and its default
 * - Product names are bound, never spliced into the SQL
 * - Unreachable database → ConnectionError surfaced, never a number
 * - Same call twice → equal data, distinct results
 * - Freshness tracker records each product returned
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import Database from "better-sqlite3";
import { createInventoryTools, DEFAULT_LOW_STOCK_THRESHOLD } from "./tools.js";
import { ToolRegistry } from "../tools/registry.js";
import { CapabilityRegistry } from "../connectors/registry.js";
import { SqliteConnector } from "../connectors/sqlite.js";
import { ExecutionSandbox } from "../sandbox/sandbox.js";
import { AgentBrain } from "../agent/brain.js";
import { createComponentLogger } from "../logging.js";
import type { ModelGateway } from "../agent/types.js";
import type { LLMMessage, ModelTurn } from "../llm/types.js";
import type { ToolContext } from "../tools/types.js";
import type { QueryResult } from "../sandbox/types.js";

// ============================================
// HELPERS
// ============================================

const SCHEMA = readFileSync(fileURLToPath(new URL("../../sql/inventory.sql", import.meta.url)), "utf8");

function seededDatabase(): Database.Database {
  const db = new Database(":memory:");
  db.exec(SCHEMA);
  const insert = db.prepare(
    "INSERT INTO inventory (product_id, product_name, quantity, warehouse, last_updated) VALUES (?, ?, ?, ?, ?)",
  );
  const now = new Date().toISOString();
  insert.run("P001", "Laptop", 50, "main", now);
  insert.run("P002", "Wireless Mouse", 8, "main", now);
  insert.run("P003", "USB-C Dock", 0, "east", now);
  insert.run("P004", "Laptop Stand", 12, "east", now);
  return db;
}

const RAW = { content: "", model: "test-model", provider: "openai" as const };

function scripted(turns: Array<(seen: LLMMessage[]) => ModelTurn>) {
  let step = 0;
  return vi.fn<ModelGateway["proposeTurn"]>(async (messages) => turns[Math.min(step++, turns.length - 1)](messages));
}

let db: Database.Database;
let capabilities: CapabilityRegistry;
let tools: ToolRegistry;
let sandbox: ExecutionSandbox;

beforeEach(async () => {
  db = seededDatabase();
  capabilities = new CapabilityRegistry();
  capabilities.registerConnector("inventory_db", new SqliteConnector({ filename: ":memory:", database: db }));
  await capabilities.connectAll();

  sandbox = new ExecutionSandbox(capabilities);
  tools = new ToolRegistry();
  for (const tool of createInventoryTools({ connectorId: "inventory_db" })) tools.register(tool);
  tools.freeze();
  capabilities.freeze();
});

function context(): ToolContext {
  return {
    sandbox,
    capabilities,
    signal: new AbortController().signal,
    requestId: "req-1",
    log: createComponentLogger("test"),
  };
}

function rows(result: QueryResult): Record<string, unknown>[] {
  if (!Array.isArray(result.data)) throw new Error("expected row data");
  return result.data.filter((row): row is Record<string, unknown> => typeof row === "object" && row !== null);
}

// ============================================
// TOOLS DIRECTLY
// ============================================

describe("inventory tools", () => {
  it("looks up one product by id", async () => {
    const result = await tools.resolve("get_product_inventory").handler({ product_id: "P003" }, context());
    expect(result.data).toEqual([
      { product_id: "P003", product_name: "USB-C Dock", quantity: 0, warehouse: "east", last_updated: expect.any(String) },
    ]);
  });

  it("matches product names partially and case-insensitively", async () => {
    const result = await tools.resolve("get_product_inventory").handler({ product_name: "LAPTOP" }, context());
    expect(result.rowCount).toBe(2);
    expect(rows(result)).toEqual([
      expect.objectContaining({ product_id: "P001", quantity: 50 }),
      expect.objectContaining({ product_id: "P004", quantity: 12 }),
    ]);
  });

  it("treats quotes in a product name as data", async () => {
    const result = await tools.resolve("get_product_inventory").handler({ product_name: "x' OR '1'='1" }, context());
    expect(result.rowCount).toBe(0);
  });

  it("lists every product by name when no filter is given", async () => {
    const result = await tools.resolve("get_product_inventory").handler({}, context());
    expect(result.rowCount).toBe(4);
    expect(rows(result).map(r => r.product_name)).toEqual([
      "Laptop",
      "Laptop Stand",
      "USB-C Dock",
      "Wireless Mouse",
    ]);
  });

  it("returns low-stock items lowest first", async () => {
    const result = await tools.resolve("get_low_stock_items").handler({ threshold: 8 }, context());
    expect(rows(result).map(r => [r.product_id, r.quantity])).toEqual([
      ["P003", 0],
      ["P002", 8],
    ]);
  });

  it("declares the default low-stock threshold in its schema", () => {
    const schema = tools.listSchemas().find(s => s.name === "get_low_stock_items");
    expect(schema?.parameters.properties.threshold).toEqual({
      type: "integer",
      description: `Stock threshold (default ${DEFAULT_LOW_STOCK_THRESHOLD})`,
      default: DEFAULT_LOW_STOCK_THRESHOLD,
    });
  });

  it("gives the same call twice equal data but distinct results", async () => {
    const tool = tools.resolve("get_product_inventory");
    const a = await tool.handler({ product_id: "P001" }, context());
    const b = await tool.handler({ product_id: "P001" }, context());

    expect(a.data).toEqual(b.data);
    expect(a.resultId).not.toBe(b.resultId);
  });

  it("records every returned product in the freshness tracker", async () => {
    await tools.resolve("get_product_inventory").handler({ product_name: "laptop" }, context());

    expect(capabilities.freshness.list().map(e => [e.entityType, e.entityId, e.connectorId])).toEqual([
      ["product", "P001", "inventory_db"],
      ["product", "P004", "inventory_db"],
    ]);
  });
});

// ============================================
// END-TO-END THROUGH THE BRAIN
// ============================================

describe("inventory questions through the brain", () => {
  it("answers the laptop question from live data", async () => {
    const proposeTurn = scripted([
      () => ({
        kind: "tool_calls",
        content: "",
        calls: [{ id: "call_1", name: "get_product_inventory", arguments: { product_name: "laptop" } }],
        raw: RAW,
      }),
      (seen) => {
        const observation = JSON.parse(seen[seen.length - 1].content);
        const laptop = observation.data.find((r: { product_id: string }) => r.product_id === "P001");
        return { kind: "answer", text: `We have ${laptop.quantity} laptops in stock.`, raw: RAW };
      },
    ]);
    const brain = new AgentBrain({ model: { proposeTurn }, tools, capabilities, sandbox });

    const response = await brain.answer("How many laptops do we have in stock?");

    expect(response).toMatchObject({
      status: "ANSWERED",
      answer: "We have 50 laptops in stock.",
      provenance: "live_data",
      toolsUsed: ["get_product_inventory"],
      sources: ["inventory_db"],
    });
    expect(response.dataTimestamp).not.toBeNull();
  });

  it("surfaces an unreachable database as a failure, never a number", async () => {
    capabilities.markHealth("inventory_db", "unreachable");
    const proposeTurn = scripted([
      () => ({
        kind: "tool_calls",
        content: "",
        calls: [{ id: "call_1", name: "get_product_inventory", arguments: { product_name: "laptop" } }],
        raw: RAW,
      }),
      () => ({ kind: "answer", text: "We have 50 laptops in stock.", raw: RAW }),
    ]);
    const brain = new AgentBrain({ model: { proposeTurn }, tools, capabilities, sandbox });

    const response = await brain.answer("How many laptops do we have in stock?");

    expect(response.status).toBe("FAILED");
    expect(response.error?.code).toBe("CONNECTION_ERROR");
    expect(response.answer).not.toMatch(/\d+ laptops/);
    expect(response.provenance).toBe("none");
  });
});
