import { Hono } from "hono";
import { WebStandardStreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/webStandardStreamableHttp.js";
import { createMcpServer } from "@corpus/mcp";
import type { McpContext } from "@corpus/mcp";
import {
  createBodyLimit,
  MCP_MAX_BODY_SIZE,
} from "../middleware/body-limit.js";

export interface McpRouteDeps {
  mcpContext: McpContext;
}

export function mcpRoute(deps: McpRouteDeps): Hono {
  const app = new Hono();

  // Stateless: one server and transport per request
  app.all("/", createBodyLimit(MCP_MAX_BODY_SIZE), async (c) => {
    const transport = new WebStandardStreamableHTTPServerTransport();
    const server = createMcpServer(deps.mcpContext);
    await server.connect(transport);
    return transport.handleRequest(c.req.raw);
  });

  return app;
}
