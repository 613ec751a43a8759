import { serve } from "@hono/node-server";
import type { Logger } from "@corpus/core/logger";
import type { CorpusConfig } from "@corpus/core/schemas";
import { createServer, type ServerContext } from "./bootstrap.js";

const DRAIN_TIMEOUT_MS = 5_000;

export interface RunningServer {
  context: ServerContext;
  /** Stop accepting connections, drain, and close the catalog */
  close(): Promise<void>;
}

export async function startServer(
  config: CorpusConfig,
  options?: { rootPath?: string; logger?: Logger },
): Promise<RunningServer> {
  const context = await createServer(config, options);
  const { app, logger, version, catalog } = context;

  const server = serve(
    { fetch: app.fetch, hostname: config.server.host, port: config.server.port },
    (info) => {
      logger.info(
        {
          host: config.server.host,
          port: info.port,
          version,
          collections: catalog.list().length,
        },
        "HTTP server started",
      );
    },
  );

  const close = () =>
    new Promise<void>((resolve) => {
      // Force close after drain timeout
      const timer = setTimeout(() => {
        logger.warn("Drain timeout exceeded, closing remaining connections");
        if ("closeAllConnections" in server) server.closeAllConnections();
      }, DRAIN_TIMEOUT_MS).unref();

      server.close(() => {
        clearTimeout(timer);
        context.cleanup();
        logger.info("Server stopped");
        resolve();
      });
    });

  return { context, close };
}
