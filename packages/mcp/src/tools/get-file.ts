import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpContext } from "../types.js";
import { runTool } from "./result.js";

export function registerGetFileTool(server: McpServer, ctx: McpContext): void {
  server.registerTool(
    "get_file",
    {
      title: "Get File",
      description:
        "Read a file from a collection, optionally limited to an inclusive 1-based line range. Out-of-range bounds are clamped to the file.",
      inputSchema: {
        collection: z.string().describe("Collection id"),
        path: z.string().describe("File path relative to the collection root"),
        start: z
          .number()
          .int()
          .optional()
          .describe("First line to return (1-based, default 1)"),
        end: z
          .number()
          .int()
          .optional()
          .describe("Last line to return (inclusive, default last line)"),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ collection, path, start, end }) =>
      runTool("get_file", ctx.logger, () =>
        ctx.retrieval.getFile(collection, path, { start, end }),
      ),
  );
}
