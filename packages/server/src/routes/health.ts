import { Hono } from "hono";
import type { RetrievalService } from "@corpus/core/retrieval";

export interface HealthDeps {
  version: string;
  startedAt: Date;
  retrieval: RetrievalService;
}

export function healthRoute(deps: HealthDeps): Hono {
  const app = new Hono();

  app.get("/health", (c) => {
    const uptimeMs = Date.now() - deps.startedAt.getTime();

    return c.json({
      status: "healthy",
      version: deps.version,
      uptime: Math.floor(uptimeMs / 1000),
      collections: deps.retrieval.listCollections().length,
    });
  });

  return app;
}
