#!/usr/bin/env tsx
import { loadConfig } from "@corpus/core/config";
import { startServer } from "./listen.js";

async function main(): Promise<void> {
  const config = await loadConfig();
  const server = await startServer(config);
  const { logger } = server.context;

  function shutdown(signal: string): void {
    logger.info({ signal }, "Shutdown signal received, draining connections");
    server
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
  }

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
