import { mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import { resolveCatalogPath } from '../config/paths.js'
import { toCorpusError } from '../errors/fs.js'
import { initializeCatalogDatabase } from './schema.js'
import { createCatalogStore, type CatalogStore } from './store.js'

/** Open the catalog under the corpus home directory, creating it on first use. */
export async function openCatalog(rootPath?: string): Promise<CatalogStore> {
  const dbPath = resolveCatalogPath(rootPath)
  try {
    await mkdir(dirname(dbPath), { recursive: true })
  } catch (err) {
    throw toCorpusError(err, dirname(dbPath), 'Create catalog directory')
  }
  return createCatalogStore(initializeCatalogDatabase(dbPath))
}
