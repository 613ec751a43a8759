import type { CatalogStore } from '../catalog/store.js'
import type { Collection, CollectionKind } from '../catalog/types.js'
import type { Logger } from '../logger/index.js'
import { DEFAULT_SEARCH_LIMITS, resolveTopK, searchFiles } from '../search/engine.js'
import type { SearchLimits, SearchOptions, SearchResult } from '../search/types.js'
import { sliceLines, validateLineRange } from '../sources/lines.js'
import { openSource } from '../sources/open.js'
import type { CollectionSource } from '../sources/types.js'

export interface CollectionSummary {
  id: string
  kind: CollectionKind
  source: string
}

export interface FileSlice {
  collection: string
  path: string
  start: number
  end: number
  content: string
}

export interface LineRange {
  start?: number
  end?: number
}

/**
 * One opened collection. Content is decoded once when the session opens and
 * every read after that is served from it.
 */
export interface CollectionSession {
  readonly collection: Collection
  listFiles(): string[]
  getFile(path: string, range?: LineRange): FileSlice
  search(query: string, options?: SearchOptions): SearchResult[]
}

export interface RetrievalService {
  listCollections(): CollectionSummary[]
  /** Full catalog records, including name and tags */
  describeCollections(): Collection[]
  listFiles(collectionId: string): Promise<string[]>
  getFile(collectionId: string, path: string, range?: LineRange): Promise<FileSlice>
  search(collectionId: string, query: string, options?: SearchOptions): Promise<SearchResult[]>
  /** Open a collection once and reuse its content across several reads */
  openCollection(collectionId: string): Promise<CollectionSession>
}

export interface RetrievalServiceDeps {
  catalog: CatalogStore
  logger: Logger
  limits?: SearchLimits
  /** Deadline for opening one collection */
  timeoutMs?: number
  /** Exclude globs for directory collections */
  exclude?: string[]
}

/**
 * Transport-neutral retrieval API over the catalog. Every one-shot call opens
 * the collection afresh, so edits to a directory or a re-packed bundle are
 * seen by the next call; openCollection() keeps one snapshot for a session.
 */
export function createRetrievalService(deps: RetrievalServiceDeps): RetrievalService {
  const { catalog, logger } = deps
  const limits = deps.limits ?? DEFAULT_SEARCH_LIMITS

  async function open(collectionId: string): Promise<CollectionSource> {
    const collection = catalog.get(collectionId)
    const started = Date.now()
    const source = await openSource(collection, {
      exclude: deps.exclude,
      signal: deps.timeoutMs ? AbortSignal.timeout(deps.timeoutMs) : undefined,
    })
    logger.debug(
      { collection: collectionId, kind: collection.kind, ms: Date.now() - started },
      'Collection opened',
    )
    return source
  }

  function sessionOf(source: CollectionSource): CollectionSession {
    const collectionId = source.collection.id
    return {
      collection: source.collection,

      listFiles: () => source.listFiles(),

      getFile(path, range) {
        validateLineRange(range?.start, range?.end)
        const slice = sliceLines(source.readFile(path), range?.start, range?.end)
        return { collection: collectionId, path, ...slice }
      },

      search(query, options) {
        const results = searchFiles(collectionId, source.files(), query, options, limits)
        logger.debug(
          { collection: collectionId, query, results: results.length },
          'Search complete',
        )
        return results
      },
    }
  }

  const openCollection = async (collectionId: string) => sessionOf(await open(collectionId))

  return {
    listCollections() {
      return catalog.list().map(({ id, kind, source }) => ({ id, kind, source }))
    },

    describeCollections() {
      return catalog.list()
    },

    async listFiles(collectionId) {
      return (await openCollection(collectionId)).listFiles()
    },

    async getFile(collectionId, path, range) {
      validateLineRange(range?.start, range?.end)
      return (await openCollection(collectionId)).getFile(path, range)
    },

    async search(collectionId, query, options) {
      resolveTopK(options?.topK, limits)
      return (await openCollection(collectionId)).search(query, options)
    },

    openCollection,
  }
}
