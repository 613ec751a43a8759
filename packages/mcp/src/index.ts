#!/usr/bin/env tsx
import { createRequire } from "node:module";
import { loadConfig } from "@corpus/core/config";
import { createLogger } from "@corpus/core/logger";
import { startStdioServer } from "./stdio.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

async function main(): Promise<void> {
  const config = await loadConfig();

  // Logger writes to stderr so stdout stays clean for MCP protocol
  const logger = createLogger(config.logging, { stderr: true });

  const server = await startStdioServer({
    config,
    logger,
    version: pkg.version,
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "MCP server shutting down");
    server
      .close()
      .catch((err: unknown) => {
        logger.error({ err }, "Failed to close MCP server");
      })
      .finally(() => process.exit(0));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("MCP server failed:", err);
  process.exit(1);
});
