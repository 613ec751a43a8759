import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpContext } from "./types.js";
import { registerCollectionsResource } from "./resources/collections.js";
import { registerListCollectionsTool } from "./tools/list-collections.js";
import { registerListFilesTool } from "./tools/list-files.js";
import { registerGetFileTool } from "./tools/get-file.js";
import { registerSearchTool } from "./tools/search.js";

export function createMcpServer(ctx: McpContext): McpServer {
  const server = new McpServer({
    name: "corpus",
    version: ctx.version,
  });

  // Resources
  registerCollectionsResource(server, ctx);

  // Tools
  registerListCollectionsTool(server, ctx);
  registerListFilesTool(server, ctx);
  registerGetFileTool(server, ctx);
  registerSearchTool(server, ctx);

  return server;
}

export type { McpContext } from "./types.js";
