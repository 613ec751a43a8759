import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { openCatalog, type CatalogStore } from "@corpus/core/catalog";
import type { Logger } from "@corpus/core/logger";
import { createRetrievalService } from "@corpus/core/retrieval";
import type { CorpusConfig } from "@corpus/core/schemas";
import { createMcpServer } from "./server.js";

export interface StdioServerOptions {
  config: CorpusConfig;
  /** Must not write to stdout */
  logger: Logger;
  version: string;
  rootPath?: string;
}

export interface RunningStdioServer {
  catalog: CatalogStore;
  close(): Promise<void>;
}

/** Serve the catalog's retrieval tools over stdin/stdout. */
export async function startStdioServer(
  options: StdioServerOptions,
): Promise<RunningStdioServer> {
  const { config, logger } = options;
  const catalog = await openCatalog(options.rootPath);
  const retrieval = createRetrievalService({
    catalog,
    logger,
    limits: config.search,
    timeoutMs: config.io.timeoutMs,
    exclude: config.pack.defaultExcludes,
  });

  const mcpServer = createMcpServer({
    retrieval,
    logger,
    version: options.version,
  });

  try {
    await mcpServer.connect(new StdioServerTransport());
  } catch (err) {
    catalog.close();
    throw err;
  }
  logger.info(
    { collections: catalog.list().length },
    "MCP server connected via stdio",
  );

  return {
    catalog,
    close: async () => {
      try {
        await mcpServer.close();
      } finally {
        catalog.close();
      }
    },
  };
}
