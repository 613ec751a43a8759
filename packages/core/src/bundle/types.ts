import type { Logger } from '../logger/index.js'
import type { Encoding } from '../encoder/types.js'
import type { BundleManifest, BundleRoot } from '../schemas/manifest.js'
import type { SelectionWarning } from '../selector/types.js'

export type IndexStyle = 'flat' | 'tree'

export interface PackOptions {
  /** Directory to pack */
  root: string
  /** Bundle path */
  output: string
  include?: string[]
  exclude?: string[]
  /** Applied in addition to `exclude`; defaults to the built-in list */
  defaultExcludes?: string[]
  encoding: Encoding
  /** Prepend the human index header (default true) */
  writeIndex?: boolean
  /** Header layout (default flat) */
  indexStyle?: IndexStyle
  /** Levels shown by the tree header; all when omitted */
  indexDepth?: number
  /** Write the header only, without file contents */
  indexOnly?: boolean
  /** Also write the JSON manifest here */
  indexOutput?: string
  /** Root description recorded in the manifest; defaults to the local directory */
  bundleRoot?: BundleRoot
  generatedAt?: Date
}

export interface PackContext {
  logger: Logger
  signal?: AbortSignal
}

export interface PackStats {
  bundleSize: number
  filesProcessed: number
  filesSkipped: number
  /** Raw size of the packed files */
  totalBytes: number
  /** bundleSize / totalBytes to two decimals; 0 for an empty pack */
  compressionRatio: number
}

export interface PackResult {
  output: string
  manifestPath?: string
  manifest: BundleManifest
  stats: PackStats
  warnings: SelectionWarning[]
}
