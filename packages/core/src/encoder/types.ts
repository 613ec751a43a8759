import type { TextMode } from '../schemas/manifest.js'

export type { TextMode } from '../schemas/manifest.js'

/**
 * How a bundle is encoded. Text modes apply per file; gzip and base64 wrap the
 * whole textual bundle produced by one of the text modes.
 */
export type Encoding =
  | { kind: 'plain' }
  | { kind: 'compressed' }
  | { kind: 'max-compressed' }
  | { kind: 'gzip'; text: TextMode }
  | { kind: 'base64'; text: TextMode }

export type EncodingKind = Encoding['kind']

export interface EncodingFlags {
  compress?: boolean
  maxCompress?: boolean
  gzip?: boolean
  base64?: boolean
}

/** A file as it appears inside a bundle body */
export interface BundleFile {
  path: string
  content: string
}
