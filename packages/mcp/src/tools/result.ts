import { CorpusError } from "@corpus/core/errors";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { Logger } from "pino";

export function jsonResult(value: unknown): CallToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
  };
}

/**
 * Run a tool body, turning corpus errors into an error result the client can
 * show. Anything else propagates to the SDK.
 */
export async function runTool(
  tool: string,
  logger: Logger,
  body: () => Promise<unknown>,
): Promise<CallToolResult> {
  try {
    return jsonResult(await body());
  } catch (err) {
    if (err instanceof CorpusError) {
      logger.warn({ tool, errorCode: err.errorCode }, err.message);
      return {
        content: [
          { type: "text" as const, text: `${err.errorCode}: ${err.message}` },
        ],
        isError: true,
      };
    }
    throw err;
  }
}
