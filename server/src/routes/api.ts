/**
 * API Routes
 *
 * POST /query: run one question through the brain
 * GET  /health: aggregated connector health
 * GET  /: service descriptor
 */

import type { Context, Hono } from "hono";
import { createComponentLogger } from "../logging.js";
import type { Runtime } from "../runtime.js";
import type { TerminalState } from "../agent/types.js";

const log = createComponentLogger("api");

export const SERVICE_NAME = "Live Data Agent";
export const SERVICE_VERSION = "0.1.0";

const STATUS_CODES = {
  ANSWERED: 200,
  BUDGET_EXCEEDED: 422,
  FAILED: 502,
} as const satisfies Record<TerminalState, number>;

async function readQuestion(c: Context): Promise<string | null> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return null;
  }
  if (typeof body !== "object" || body === null || !("question" in body)) return null;
  const { question } = body;
  return typeof question === "string" && question.trim() ? question.trim() : null;
}

export function registerApiRoutes(app: Hono, runtime: Runtime): void {
  app.get("/", (c) => c.json({
    name: SERVICE_NAME,
    version: SERVICE_VERSION,
    endpoints: {
      "POST /query": "Answer a question from live data",
      "GET /health": "Connector health",
    },
    tools: runtime.tools.listSchemas().map(t => t.name),
  }));

  app.get("/health", async (c) => {
    const report = await runtime.capabilities.healthCheckAll();
    return c.json(report, report.status === "healthy" ? 200 : 503);
  });

  app.post("/query", async (c) => {
    const question = await readQuestion(c);
    if (!question) {
      return c.json({ error: { code: "BAD_REQUEST", message: "Body must be JSON with a non-empty \"question\" string" } }, 400);
    }

    const response = await runtime.brain.answer(question, { signal: c.req.raw.signal });
    log.info("Query answered", { requestId: response.requestId, status: response.status });
    return c.json(response, STATUS_CODES[response.status]);
  });
}
