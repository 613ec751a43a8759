import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpContext } from "../types.js";
import { runTool } from "./result.js";

export function registerListFilesTool(
  server: McpServer,
  ctx: McpContext,
): void {
  server.registerTool(
    "list_files",
    {
      title: "List Files",
      description:
        "List the relative paths of all files in a collection, sorted by path.",
      inputSchema: {
        collection: z.string().describe("Collection id (see list_collections)"),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ collection }) =>
      runTool("list_files", ctx.logger, async () => ({
        collection,
        files: await ctx.retrieval.listFiles(collection),
      })),
  );
}
