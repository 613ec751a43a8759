import { stat } from 'node:fs/promises'
import type { Stats } from 'node:fs'
import { resolve } from 'node:path'
import { ValidationError } from '../errors/catalog.js'
import { toCorpusError } from '../errors/fs.js'
import type { CatalogStore } from './store.js'
import type { Collection, CollectionKind } from './types.js'

export interface RegisterCollectionInput {
  source: string
  id?: string
  kind?: CollectionKind
  name?: string
  tags?: string[]
  replace?: boolean
}

/** Directory sources are directories; anything else is read as a bundle file. */
export async function detectCollectionKind(source: string): Promise<CollectionKind> {
  let stats: Stats
  try {
    stats = await stat(source)
  } catch (err) {
    throw toCorpusError(err, source, 'Inspect collection source')
  }
  if (stats.isDirectory()) return 'directory'
  if (stats.isFile()) return 'bundle'
  throw new ValidationError(`Collection source is neither a file nor a directory: ${source}`, {
    source,
  })
}

/**
 * Register a bundle or directory. The source is stored as an absolute path
 * and its kind is detected from the filesystem unless given.
 */
export async function registerCollection(
  store: CatalogStore,
  input: RegisterCollectionInput,
): Promise<Collection> {
  const source = resolve(input.source)
  const kind = input.kind ?? (await detectCollectionKind(source))
  return store.add({
    source,
    kind,
    id: input.id,
    name: input.name,
    tags: input.tags,
    replace: input.replace,
  })
}
