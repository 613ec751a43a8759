import type { RetrievalService } from "@corpus/core/retrieval";
import type { Logger } from "pino";

export interface McpContext {
  retrieval: RetrievalService;
  logger: Logger;
  version: string;
}
