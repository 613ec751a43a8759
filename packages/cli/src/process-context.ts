import { openCatalog } from '@corpus/core/catalog'
import { loadConfig, resolveRootPath } from '@corpus/core/config'
import { createLogger } from '@corpus/core/logger'
import type { CliContext } from './context.js'

export interface ProcessContextOptions {
  version: string
  signal: AbortSignal
  /** Defaults to CORPUS_HOME, then ~/.local/share/corpus */
  rootPath?: string
  out?: (line: string) => void
  err?: (line: string) => void
}

/** The context of a real CLI run: config, catalog and servers all share one home. */
export async function createProcessContext(options: ProcessContextOptions): Promise<CliContext> {
  const rootPath = resolveRootPath(options.rootPath)
  const config = await loadConfig({ rootPath })

  return {
    out: options.out ?? ((line) => void process.stdout.write(line + '\n')),
    err: options.err ?? ((line) => void process.stderr.write(line + '\n')),
    // stdout carries command output (and the MCP protocol under `corpus mcp`)
    logger: createLogger(config.logging, { stderr: true }),
    config,
    version: options.version,
    rootPath,
    openCatalog: () => openCatalog(rootPath),
    signal: options.signal,
  }
}
