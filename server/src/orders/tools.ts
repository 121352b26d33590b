/**
 * Order Tools
 *
 * Order lookups against an HTTP order service through the REST connector.
 */

import type { ToolDefinition } from "../tools/types.js";

export const ORDER_ENTITIES = ["order", "shipment", "delivery"] as const;

export interface OrderToolOptions {
  /** Capability-registry id of the REST connector fronting the order service */
  connectorId: string;
}

export function createOrderTools(options: OrderToolOptions): ToolDefinition[] {
  return [
    {
      name: "get_order_status",
      description: "Get the live status of one customer order by its order ID.",
      parameters: {
        order_id: { type: "string", description: "Order ID", required: true },
      },
      entities: ORDER_ENTITIES,
      handler: async (args, ctx) => {
        const result = await ctx.sandbox.execute(
          options.connectorId,
          "GET /orders/{order_id}",
          { order_id: String(args.order_id) },
          { signal: ctx.signal },
        );
        ctx.capabilities.freshness.markAccessed("order", String(args.order_id), result.source);
        return result;
      },
    },
  ];
}
