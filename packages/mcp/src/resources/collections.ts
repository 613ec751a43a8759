import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpContext } from "../types.js";

export function registerCollectionsResource(
  server: McpServer,
  ctx: McpContext,
): void {
  server.registerResource(
    "collections",
    "corpus://collections",
    {
      title: "Collections",
      description: "Registered collections with their names, tags and sources",
      mimeType: "application/json",
    },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: "application/json",
          text: JSON.stringify(ctx.retrieval.describeCollections(), null, 2),
        },
      ],
    }),
  );
}
