#!/usr/bin/env node
import "dotenv/config";
import { parseArgs } from "util";
import { loadProspectorConfig } from "../pipeline/config.js";
import { ConfigError } from "../pipeline/errors.js";
import { initializeEventEmitter } from "../pipeline/events.js";
import { createProspectorServices } from "../pipeline/factory.js";
import { Logger } from "../pipeline/logger.js";
import { createApp } from "../server/app.js";

async function main(): Promise<void> {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      port: { type: "string" },
      verbose: { type: "boolean" },
    },
  });

  const config = loadProspectorConfig();
  const port = values.port !== undefined ? Number.parseInt(values.port, 10) : config.port;
  if (!Number.isInteger(port) || port <= 0 || port > 65_535) {
    throw new ConfigError(`--port must be a TCP port, got: ${values.port ?? String(config.port)}`);
  }

  initializeEventEmitter({
    runId: "server",
    format: config.log.format,
    verbose: values.verbose ?? config.log.verbose,
    agentLogs: config.log.agentLogs,
  });
  const logger = new Logger({ eventType: "server.request" });

  const services = createProspectorServices(config);
  const app = createApp(services);
  const server = app.listen(port, () => {
    logger.info(`Prospector API listening on :${port}`, { phase: "start", port });
  });

  let closing = false;
  const shutdown = (signal: string) => {
    if (closing) {
      return;
    }
    closing = true;
    logger.info("Shutting down", { phase: "end", signal });
    server.close();
    services.pipeline.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("Shutdown failed", { phase: "fail", errorMessage: String(error) });
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error("Server failed to start:", error instanceof Error ? error.message : error);
  process.exit(1);
});
