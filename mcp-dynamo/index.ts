#!/usr/bin/env node
import dotenv from "dotenv";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfigFromEnv } from "./src/config/index.js";
import { ConsoleLogger } from "./src/observability/index.js";
import { ALL_TOOLS, SERVER_NAME, SERVER_VERSION, createServer } from "./src/server/index.js";
import { createSimulator } from "./src/simulator.js";

dotenv.config();

async function runServer() {
  const settings = loadConfigFromEnv();
  const logger = new ConsoleLogger(settings.logLevel);
  const { dispatcher, config } = createSimulator({ config: settings.overrides, logger });
  const server = createServer(dispatcher, logger);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Logs go to stderr so they don't interfere with MCP communication
  logger.info(`${SERVER_NAME} v${SERVER_VERSION} running on stdio transport`, {
    logLevel: settings.logLevel,
  });
  logger.info(`Available tools: ${ALL_TOOLS.length}`, { tools: ALL_TOOLS.map((tool) => tool.name) });
  logger.info("Effective configuration", {
    indexAdvisor: config.indexAdvisor,
    partitionKeyOptimizer: config.partitionKeyOptimizer,
    capacityPlanner: config.capacityPlanner,
    batch: config.batch,
  });
}

process.on("SIGINT", () => {
  console.error("Received SIGINT, shutting down gracefully...");
  process.exit(0);
});

process.on("SIGTERM", () => {
  console.error("Received SIGTERM, shutting down gracefully...");
  process.exit(0);
});

process.on("unhandledRejection", (reason, promise) => {
  console.error("Unhandled Rejection at:", promise, "reason:", reason);
});

process.on("uncaughtException", (error) => {
  console.error("Uncaught Exception:", error);
  process.exit(1);
});

runServer().catch((error: unknown) => {
  console.error("Fatal error running server:", error);
  process.exit(1);
});
