import type { CatalogStore } from '@corpus/core/catalog'
import type { Logger } from '@corpus/core/logger'
import type { CorpusConfig } from '@corpus/core/schemas'

export interface CliContext {
  /** Command output, one line per call */
  out(line: string): void
  /** Diagnostics for the user */
  err(line: string): void
  logger: Logger
  config: CorpusConfig
  version: string
  /** Resolved corpus home; holds config.json and the catalog */
  rootPath: string
  /** Caller closes the store when done */
  openCatalog(): Promise<CatalogStore>
  /** Fires on SIGINT/SIGTERM */
  signal: AbortSignal
}

export type Command = (args: string[], ctx: CliContext) => Promise<number>
