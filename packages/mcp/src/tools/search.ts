import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpContext } from "../types.js";
import { runTool } from "./result.js";

export function registerSearchTool(server: McpServer, ctx: McpContext): void {
  server.registerTool(
    "search",
    {
      title: "Search",
      description:
        "Keyword search over the lines of a collection. Lines containing the whole query rank above lines matching only some terms. Returns path, line number, snippet and score per hit.",
      inputSchema: {
        collection: z.string().describe("Collection id"),
        query: z.string().describe("Keywords to look for"),
        top_k: z
          .number()
          .int()
          .optional()
          .describe("Maximum number of results (default 50, at most 500)"),
        case_sensitive: z
          .boolean()
          .optional()
          .describe("Match letter case exactly (default false)"),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ collection, query, top_k, case_sensitive }) =>
      runTool("search", ctx.logger, async () => ({
        collection,
        query,
        results: await ctx.retrieval.search(collection, query, {
          topK: top_k,
          caseSensitive: case_sensitive,
        }),
      })),
  );
}
