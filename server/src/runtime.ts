/**
 * Runtime Assembly
 *
 * Builds the registries, sandbox, model client and brain from an AppConfig.
 * Connectors and tools are registered here, then both registries are
 * frozen; nothing registers after start().
 */

import { createComponentLogger } from "./logging.js";
import { CapabilityRegistry } from "./connectors/registry.js";
import { SqliteConnector } from "./connectors/sqlite.js";
import { RestApiConnector } from "./connectors/rest-api.js";
import { ExecutionSandbox } from "./sandbox/sandbox.js";
import { ToolRegistry } from "./tools/registry.js";
import { createInventoryTools } from "./inventory/tools.js";
import { createOrderTools } from "./orders/tools.js";
import { createModelClient } from "./llm/index.js";
import { AgentBrain } from "./agent/brain.js";
import type { ModelGateway } from "./agent/types.js";
import type { Connector } from "./connectors/types.js";
import type { AppConfig } from "./config.js";

const log = createComponentLogger("runtime");

export const INVENTORY_CONNECTOR = "inventory_db";
export const ORDERS_CONNECTOR = "orders_api";

export interface RuntimeOverrides {
  /** Replaces the configured model client */
  model?: ModelGateway;
  /** Extra or replacement connectors, keyed by id */
  connectors?: Record<string, Connector>;
  fetch?: typeof fetch;
}

export interface Runtime {
  tools: ToolRegistry;
  capabilities: CapabilityRegistry;
  sandbox: ExecutionSandbox;
  brain: AgentBrain;
  start(): Promise<void>;
  close(): Promise<void>;
}

export function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  const capabilities = new CapabilityRegistry({
    healthTimeoutMs: config.health.timeoutMs,
    healthCacheMs: config.health.cacheMs,
  });
  const tools = new ToolRegistry();
  const sandbox = new ExecutionSandbox(capabilities);

  const connectors: Record<string, Connector> = {};
  if (config.sqlite.path) {
    connectors[INVENTORY_CONNECTOR] = new SqliteConnector({
      filename: config.sqlite.path,
      timestampColumn: config.sqlite.timestampColumn,
    });
  }
  if (config.rest.baseUrl) {
    connectors[ORDERS_CONNECTOR] = new RestApiConnector({ baseUrl: config.rest.baseUrl, fetch: overrides.fetch });
  }
  Object.assign(connectors, overrides.connectors);

  for (const [id, connector] of Object.entries(connectors)) {
    capabilities.registerConnector(id, connector, config.policy);
  }

  if (connectors[INVENTORY_CONNECTOR]) {
    for (const tool of createInventoryTools({ connectorId: INVENTORY_CONNECTOR })) tools.register(tool);
  }
  if (connectors[ORDERS_CONNECTOR]) {
    for (const tool of createOrderTools({ connectorId: ORDERS_CONNECTOR })) tools.register(tool);
  }

  const model = overrides.model ?? createModelClient(
    {
      provider: config.llm.provider,
      apiKey: config.llm.apiKey,
      baseUrl: config.llm.baseUrl,
      model: config.llm.model,
      timeoutMs: config.llm.timeoutMs,
      fetch: overrides.fetch,
    },
    {
      maxRetries: config.llm.maxRetries,
      backoff: { baseDelayMs: config.llm.backoffBaseMs, maxDelayMs: config.llm.backoffMaxMs },
    },
  );

  const brain = new AgentBrain(
    { model, tools, capabilities, sandbox },
    {
      maxIterations: config.agent.maxIterations,
      requireLiveData: config.agent.requireLiveData,
      model: config.llm.model,
    },
  );

  return {
    tools,
    capabilities,
    sandbox,
    brain,
    async start() {
      tools.freeze();
      capabilities.freeze();
      if (tools.size === 0) log.warn("No tools registered; set SQLITE_PATH or ORDERS_API_URL");
      await capabilities.connectAll();
      log.info("Runtime started", {
        connectors: capabilities.ids(),
        tools: tools.listSchemas().map(t => t.name),
        provider: config.llm.provider,
        model: config.llm.model,
      });
    },
    async close() {
      await capabilities.closeAll();
    },
  };
}
