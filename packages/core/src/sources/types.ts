import type { Collection } from '../catalog/types.js'
import type { BundleFile } from '../encoder/types.js'

/**
 * An opened collection. Content is read once when the source is opened and
 * kept for the lifetime of this object.
 */
export interface CollectionSource {
  readonly collection: Collection
  /** Relative paths in bundle (or path) order */
  listFiles(): string[]
  /** NotFoundError when the path is not part of the collection */
  readFile(path: string): string
  files(): readonly BundleFile[]
}

export interface OpenSourceOptions {
  /** Exclude globs for directory collections */
  exclude?: string[]
  signal?: AbortSignal
}
