import { readFile } from 'node:fs/promises'
import { parseBundleBody } from '../encoder/format.js'
import { decodeTransport, type TransportKind } from '../encoder/transport.js'
import type { BundleFile } from '../encoder/types.js'
import { throwIfAborted, toCorpusError } from '../errors/fs.js'
import { splitHumanIndex, type HumanIndexEntry } from '../indexer/human-index.js'

export interface DecodedBundleFile {
  transport: TransportKind
  /** Human index rows, or null when the bundle was packed without a header */
  index: HumanIndexEntry[] | null
  files: BundleFile[]
}

/** Decode the textual bundle: strip the header and split file blocks. */
export function parseBundleText(text: string): Omit<DecodedBundleFile, 'transport'> {
  const { index, body } = splitHumanIndex(text)
  return { index, files: parseBundleBody(body) }
}

/**
 * Read a bundle from disk in any encoding.
 */
export async function readBundle(
  path: string,
  options?: { signal?: AbortSignal },
): Promise<DecodedBundleFile> {
  let bytes: Buffer
  try {
    bytes = await readFile(path, { signal: options?.signal })
  } catch (err) {
    throw toCorpusError(err, path, 'Read bundle')
  }
  throwIfAborted(options?.signal, `Read bundle ${path}`)

  const { text, transport } = await decodeTransport(bytes)
  return { transport, ...parseBundleText(text) }
}
