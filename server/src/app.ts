/**
 * HTTP App
 *
 * Hono app with the API routes mounted. Separate from index.ts so tests
 * can drive it through app.request() without binding a port.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { createComponentLogger } from "./logging.js";
import { toObservation } from "./errors.js";
import { registerApiRoutes } from "./routes/api.js";
import type { Runtime } from "./runtime.js";

const log = createComponentLogger("http");

export function createApp(runtime: Runtime): Hono {
  const app = new Hono();
  app.use("*", cors());

  app.onError((err, c) => {
    log.error("Unhandled route error", err, { path: c.req.path });
    return c.json({ error: toObservation(err) }, 500);
  });

  registerApiRoutes(app, runtime);
  return app;
}
