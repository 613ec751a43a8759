import { createRequire } from "node:module";
import type { Hono } from "hono";
import type { CorpusConfig } from "@corpus/core/schemas";
import { openCatalog, type CatalogStore } from "@corpus/core/catalog";
import { createLogger, type Logger } from "@corpus/core/logger";
import {
  createRetrievalService,
  type RetrievalService,
} from "@corpus/core/retrieval";
import { createApp } from "./app.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export interface ServerContext {
  app: Hono;
  logger: Logger;
  config: CorpusConfig;
  startedAt: Date;
  version: string;
  catalog: CatalogStore;
  retrieval: RetrievalService;
  cleanup: () => void;
}

export interface CreateServerOptions {
  rootPath?: string;
  /** Use this catalog instead of opening the one under rootPath */
  catalog?: CatalogStore;
  logger?: Logger;
}

export async function createServer(
  config: CorpusConfig,
  options?: CreateServerOptions,
): Promise<ServerContext> {
  const logger = options?.logger ?? createLogger(config.logging);
  const startedAt = new Date();

  const catalog = options?.catalog ?? (await openCatalog(options?.rootPath));
  const retrieval = createRetrievalService({
    catalog,
    logger,
    limits: config.search,
    timeoutMs: config.io.timeoutMs,
    exclude: config.pack.defaultExcludes,
  });

  const app = createApp({
    logger,
    version: pkg.version,
    startedAt,
    retrieval,
  });

  return {
    app,
    logger,
    config,
    startedAt,
    version: pkg.version,
    catalog,
    retrieval,
    cleanup: () => catalog.close(),
  };
}
