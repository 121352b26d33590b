/**
 * Inventory Tools
 *
 * Live stock lookups against the inventory table. Every read goes through
 * the sandbox with bound parameters; product names are matched with a
 * bound LIKE pattern, never spliced into the SQL.
 */

import type { QueryParams } from "../connectors/types.js";
import type { QueryResult } from "../sandbox/types.js";
import type { ToolContext, ToolDefinition } from "../tools/types.js";

/** Entity types these tools serve; questions mentioning them need a live fetch. */
export const INVENTORY_ENTITIES = ["inventory", "stock", "product", "quantity", "warehouse"] as const;

export const LIST_LIMIT = 100;

export const DEFAULT_LOW_STOCK_THRESHOLD = 10;

const COLUMNS = "product_id, product_name, quantity, warehouse, last_updated";

export interface InventoryToolOptions {
  /** Capability-registry id of the SQL connector holding the inventory table */
  connectorId: string;
}

/** Record each returned product in the freshness tracker. */
function track(result: QueryResult, ctx: ToolContext): void {
  if (!Array.isArray(result.data)) return;
  for (const row of result.data) {
    if (typeof row === "object" && row !== null && "product_id" in row) {
      ctx.capabilities.freshness.markAccessed("product", String(row.product_id), result.source);
    }
  }
}

export function createInventoryTools(options: InventoryToolOptions): ToolDefinition[] {
  const { connectorId } = options;

  const getProductInventory: ToolDefinition = {
    name: "get_product_inventory",
    description:
      "Get live inventory data for products. Use this for ANY question about stock, inventory, or product availability. " +
      `Pass product_id for one product, product_name for a partial name match, or neither to list up to ${LIST_LIMIT} products.`,
    parameters: {
      product_id: { type: "string", description: "Exact product ID to look up" },
      product_name: { type: "string", description: "Product name to search for (partial, case-insensitive)" },
    },
    entities: INVENTORY_ENTITIES,
    handler: async (args, ctx) => {
      let sql: string;
      let params: QueryParams;

      if (typeof args.product_id === "string" && args.product_id.trim()) {
        sql = `SELECT ${COLUMNS} FROM inventory WHERE product_id = @product_id`;
        params = { product_id: args.product_id.trim() };
      } else if (typeof args.product_name === "string" && args.product_name.trim()) {
        sql = `SELECT ${COLUMNS} FROM inventory WHERE LOWER(product_name) LIKE LOWER(@pattern) ORDER BY product_name`;
        params = { pattern: `%${args.product_name.trim()}%` };
      } else {
        sql = `SELECT ${COLUMNS} FROM inventory ORDER BY product_name LIMIT ${LIST_LIMIT}`;
        params = {};
      }

      const result = await ctx.sandbox.execute(connectorId, sql, params, { signal: ctx.signal });
      track(result, ctx);
      ctx.log.debug("Inventory lookup", { rowCount: result.rowCount, by: Object.keys(params)[0] ?? "all" });
      return result;
    },
  };

  const getLowStockItems: ToolDefinition = {
    name: "get_low_stock_items",
    description:
      "Get products whose stock is at or below a threshold, lowest first. " +
      "Use for questions about low stock, reorder needs, or stock alerts.",
    parameters: {
      threshold: {
        type: "integer",
        description: `Stock threshold (default ${DEFAULT_LOW_STOCK_THRESHOLD})`,
        default: DEFAULT_LOW_STOCK_THRESHOLD,
      },
    },
    entities: INVENTORY_ENTITIES,
    handler: async (args, ctx) => {
      const threshold = typeof args.threshold === "number" ? args.threshold : DEFAULT_LOW_STOCK_THRESHOLD;
      const result = await ctx.sandbox.execute(
        connectorId,
        `SELECT ${COLUMNS} FROM inventory WHERE quantity <= @threshold ORDER BY quantity ASC`,
        { threshold },
        { signal: ctx.signal },
      );
      track(result, ctx);
      return result;
    },
  };

  return [getProductInventory, getLowStockItems];
}
