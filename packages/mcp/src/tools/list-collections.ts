import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpContext } from "../types.js";
import { runTool } from "./result.js";

export function registerListCollectionsTool(
  server: McpServer,
  ctx: McpContext,
): void {
  server.registerTool(
    "list_collections",
    {
      title: "List Collections",
      description:
        "List every registered collection with its id, kind (directory or bundle) and source path.",
      annotations: { readOnlyHint: true },
    },
    async () =>
      runTool("list_collections", ctx.logger, async () => ({
        collections: ctx.retrieval.listCollections(),
      })),
  );
}
