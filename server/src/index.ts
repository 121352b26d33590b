/**
 * Live Data Agent Server: Main Entry Point
 *
 * Loads .env, builds the runtime, connects every data source and serves
 * the HTTP API until SIGINT/SIGTERM.
 */

import { serve } from "@hono/node-server";
import { loadConfig, loadEnvFile } from "./config.js";
import { closeServerLogging, createComponentLogger, initServerLogging } from "./logging.js";
import { createRuntime } from "./runtime.js";
import { createApp } from "./app.js";

loadEnvFile();

const config = loadConfig();
initServerLogging({ minLevel: config.logLevel, logDir: config.logDir });

const log = createComponentLogger("main");
for (const warning of config.warnings) log.warn(warning);

const runtime = createRuntime(config);
await runtime.start();

const app = createApp(runtime);
const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  log.info(`HTTP API running on http://localhost:${info.port}`);
});

async function shutdown(signal: string): Promise<void> {
  log.info("Shutting down", { signal });
  server.close();
  await runtime.close();
  await closeServerLogging();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      log.fatal("Shutdown failed", err);
      process.exit(1);
    });
  });
}
