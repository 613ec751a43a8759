import { Hono } from "hono";
import { cors } from "hono/cors";
import { CorpusError } from "@corpus/core/errors";
import type { RetrievalService } from "@corpus/core/retrieval";
import type { Logger } from "pino";
import { healthRoute } from "./routes/health.js";
import { collectionsRoutes } from "./routes/collections.js";
import { mcpRoute } from "./routes/mcp.js";

export interface AppDeps {
  logger: Logger;
  version: string;
  startedAt: Date;
  retrieval: RetrievalService;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  // CORS: any origin, for browser-based MCP clients
  app.use(
    "*",
    cors({
      origin: "*",
      allowHeaders: ["Content-Type", "Accept", "Mcp-Session-Id"],
      allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
      maxAge: 86400,
    }),
  );

  // Mount health route
  app.route(
    "/",
    healthRoute({
      version: deps.version,
      startedAt: deps.startedAt,
      retrieval: deps.retrieval,
    }),
  );

  // Mount retrieval routes
  app.route("/v1/collections", collectionsRoutes({ retrieval: deps.retrieval }));

  // Mount MCP over streamable HTTP
  app.route(
    "/mcp",
    mcpRoute({
      mcpContext: {
        retrieval: deps.retrieval,
        logger: deps.logger,
        version: deps.version,
      },
    }),
  );

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof CorpusError) {
      if (err.code >= 500) {
        deps.logger.error({ err, path: c.req.path }, err.message);
      } else {
        deps.logger.warn({ errorCode: err.errorCode, path: c.req.path }, err.message);
      }
      return Response.json(err.toJSON(), { status: err.code });
    }

    deps.logger.error({ err }, "Unhandled error");
    return c.json(
      {
        error: {
          code: 500,
          errorCode: "INTERNAL_ERROR",
          message: "Internal server error",
        },
      },
      500,
    );
  });

  // 404 fallback
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 404,
          errorCode: "NOT_FOUND",
          message: "Not found",
        },
      },
      404,
    );
  });

  return app;
}
