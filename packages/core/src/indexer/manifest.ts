import { extname } from 'node:path'
import { DecodeError } from '../errors/catalog.js'
import {
  BundleManifestSchema,
  MANIFEST_SCHEMA,
  type BundleManifest,
  type BundleRoot,
} from '../schemas/manifest.js'
import type { Encoding } from '../encoder/types.js'
import { textModeOf } from '../encoder/resolve.js'
import type { FileEntry } from '../selector/types.js'

export interface BuildManifestInput {
  files: readonly FileEntry[]
  root: BundleRoot
  encoding: Encoding
  generatedAt?: Date
}

function extensionKey(path: string): string {
  const ext = extname(path).toLowerCase()
  return ext === '' ? '(none)' : ext.slice(1)
}

/**
 * Machine-readable index for a pack. Built from the same entries as the
 * human header, in the same order.
 */
export function buildManifest(input: BuildManifestInput): BundleManifest {
  const byExt: Record<string, number> = {}
  let bytes = 0
  for (const file of input.files) {
    bytes += file.size
    const key = extensionKey(file.path)
    byExt[key] = (byExt[key] ?? 0) + 1
  }

  return {
    schema: MANIFEST_SCHEMA,
    generatedAt: (input.generatedAt ?? new Date()).toISOString(),
    root: input.root,
    encoding: input.encoding.kind,
    textMode: textModeOf(input.encoding),
    files: input.files.map((file) => ({
      path: file.path,
      size: file.size,
      lines: file.lines,
      hash: file.hash,
    })),
    totals: { files: input.files.length, bytes, byExt },
  }
}

export function serializeManifest(manifest: BundleManifest): string {
  return `${JSON.stringify(manifest, null, 2)}\n`
}

export function parseManifest(text: string): BundleManifest {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    throw new DecodeError('Manifest is not valid JSON', {
      reason: err instanceof Error ? err.message : String(err),
    })
  }

  const result = BundleManifestSchema.safeParse(raw)
  if (!result.success) {
    throw new DecodeError('Manifest does not match the corpus/v1 schema', {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.map(String).join('.'),
        message: issue.message,
      })),
    })
  }
  return result.data
}
