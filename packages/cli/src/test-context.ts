import { join } from 'node:path'
import { createCatalogStore, initializeCatalogDatabase } from '@corpus/core/catalog'
import { createSilentLogger } from '@corpus/core/logger'
import { CorpusConfigSchema, type CorpusConfig } from '@corpus/core/schemas'
import type { CliContext } from './context.js'

export interface TestContext extends CliContext {
  stdout: string[]
  stderr: string[]
  controller: AbortController
}

/**
 * A CliContext that records output and keeps its catalog in `home`.
 * Each openCatalog() call opens the same database file afresh.
 */
export function createTestContext(home: string, config?: Partial<CorpusConfig>): TestContext {
  const stdout: string[] = []
  const stderr: string[] = []
  const controller = new AbortController()
  const dbPath = join(home, 'catalog.db')

  return {
    stdout,
    stderr,
    controller,
    out: (line) => void stdout.push(line),
    err: (line) => void stderr.push(line),
    logger: createSilentLogger(),
    config: CorpusConfigSchema.parse(config ?? {}),
    version: '0.0.0-test',
    rootPath: home,
    openCatalog: async () => createCatalogStore(initializeCatalogDatabase(dbPath)),
    signal: controller.signal,
  }
}
