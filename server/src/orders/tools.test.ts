/**
 * Order Tool Tests
 *
 * Covers:
 * - get_order_status fills the path placeholder URL-encoded and returns the body
 * - The order is recorded in the freshness tracker
 */

import { describe, it, expect, vi } from "vitest";
import { createOrderTools } from "./tools.js";
import { CapabilityRegistry } from "../connectors/registry.js";
import { RestApiConnector } from "../connectors/rest-api.js";
import { ExecutionSandbox } from "../sandbox/sandbox.js";
import { createComponentLogger } from "../logging.js";

describe("get_order_status", () => {
  it("fetches one order through the REST connector", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(JSON.stringify({ order_id: "A/17", status: "shipped" })));
    const capabilities = new CapabilityRegistry();
    capabilities.registerConnector("orders_api", new RestApiConnector({ baseUrl: "http://orders.test", fetch: fetchImpl }));
    await capabilities.connectAll();
    const [tool] = createOrderTools({ connectorId: "orders_api" });

    const result = await tool.handler({ order_id: "A/17" }, {
      sandbox: new ExecutionSandbox(capabilities),
      capabilities,
      signal: new AbortController().signal,
      requestId: "req-1",
      log: createComponentLogger("test"),
    });

    expect(String(fetchImpl.mock.calls[0][0])).toBe("http://orders.test/orders/A%2F17");
    expect(result.data).toEqual({ order_id: "A/17", status: "shipped" });
    expect(result.rowCount).toBe(1);
    expect(capabilities.freshness.get("order", "A/17")?.connectorId).toBe("orders_api");
  });
});
