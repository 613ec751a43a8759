import { access } from 'node:fs/promises'
import { readBundle } from '../bundle/read.js'
import type { Collection } from '../catalog/types.js'
import type { BundleFile } from '../encoder/types.js'
import { NotFoundError } from '../errors/catalog.js'
import { DEFAULT_EXCLUDES } from '../schemas/corpus-config.js'
import { selectFiles, textFilesOf } from '../selector/select.js'
import type { CollectionSource, OpenSourceOptions } from './types.js'

class InMemorySource implements CollectionSource {
  private readonly byPath = new Map<string, string>()

  constructor(
    readonly collection: Collection,
    private readonly entries: readonly BundleFile[],
  ) {
    for (const file of entries) {
      if (!this.byPath.has(file.path)) this.byPath.set(file.path, file.content)
    }
  }

  listFiles(): string[] {
    return [...this.byPath.keys()]
  }

  readFile(path: string): string {
    const content = this.byPath.get(path)
    if (content === undefined) {
      throw new NotFoundError(`File not found in collection ${this.collection.id}: ${path}`, {
        collection: this.collection.id,
        path,
      })
    }
    return content
  }

  files(): readonly BundleFile[] {
    return this.entries
  }
}

async function ensureAvailable(collection: Collection): Promise<void> {
  try {
    await access(collection.source)
  } catch {
    throw new NotFoundError(
      `Source of collection ${collection.id} is unavailable: ${collection.source}`,
      { collection: collection.id, source: collection.source, reason: 'unavailable' },
    )
  }
}

/**
 * Open a collection for reading. Bundles are decoded in whatever encoding
 * they were packed with; directories are walked with the default excludes
 * and only text files are kept.
 */
export async function openSource(
  collection: Collection,
  options?: OpenSourceOptions,
): Promise<CollectionSource> {
  await ensureAvailable(collection)

  if (collection.kind === 'bundle') {
    const bundle = await readBundle(collection.source, { signal: options?.signal })
    return new InMemorySource(collection, bundle.files)
  }

  const selection = await selectFiles(collection.source, {
    exclude: options?.exclude ?? DEFAULT_EXCLUDES,
    signal: options?.signal,
  })
  const { files } = textFilesOf(selection)
  return new InMemorySource(
    collection,
    files.map((file) => ({ path: file.entry.path, content: file.content ?? '' })),
  )
}
