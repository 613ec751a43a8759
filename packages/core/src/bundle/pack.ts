import { relative, resolve, sep } from 'node:path'
import { renderBundleBody } from '../encoder/format.js'
import { textModeOf } from '../encoder/resolve.js'
import { encodeTransport } from '../encoder/transport.js'
import { ValidationError } from '../errors/catalog.js'
import { buildHumanIndex } from '../indexer/human-index.js'
import { buildTreeIndex } from '../indexer/tree-index.js'
import { buildManifest, serializeManifest } from '../indexer/manifest.js'
import { DEFAULT_EXCLUDES } from '../schemas/corpus-config.js'
import { selectFiles, textFilesOf } from '../selector/select.js'
import type { SelectedFile, SelectionWarning } from '../selector/types.js'
import { writeFilesAtomic, type AtomicWriteEntry } from '../storage/atomic.js'
import type { HumanIndexEntry } from '../indexer/human-index.js'
import type { PackContext, PackOptions, PackResult, PackStats } from './types.js'

/** Path of `target` relative to `root` when it lies inside it */
function pathInside(root: string, target: string): string | undefined {
  const rel = relative(root, target)
  if (rel === '' || rel.startsWith('..') || resolve(root, rel) !== target) return undefined
  return rel.split(sep).join('/')
}

function compressionRatio(bundleSize: number, totalBytes: number): number {
  return totalBytes > 0 ? Math.round((bundleSize / totalBytes) * 100) / 100 : 0
}

function renderHeader(entries: readonly HumanIndexEntry[], options: PackOptions): string {
  if (options.writeIndex === false && !options.indexOnly) return ''
  if (options.indexStyle === 'tree') return buildTreeIndex(entries, { depth: options.indexDepth })
  return buildHumanIndex(entries)
}

/**
 * Pack a directory into one bundle.
 *
 * The selected file set is computed once and feeds the human header, the
 * bundle body and the JSON manifest, so all three list the same files in the
 * same order. Nothing is written unless every step succeeds.
 */
export async function packCorpus(options: PackOptions, ctx: PackContext): Promise<PackResult> {
  const { logger, signal } = ctx
  if (
    options.indexDepth !== undefined &&
    (!Number.isInteger(options.indexDepth) || options.indexDepth < 1)
  ) {
    throw new ValidationError('Index depth must be a positive integer', {
      indexDepth: options.indexDepth,
    })
  }
  const root = resolve(options.root)
  const output = resolve(options.output)
  const indexOutput = options.indexOutput ? resolve(options.indexOutput) : undefined

  const selection = await selectFiles(root, {
    include: options.include,
    exclude: [...(options.defaultExcludes ?? DEFAULT_EXCLUDES), ...(options.exclude ?? [])],
    signal,
  })

  // Earlier outputs of this pack must not end up inside the next bundle
  const ownOutputs = new Set(
    [output, indexOutput].flatMap((path) => {
      const rel = path ? pathInside(root, path) : undefined
      return rel ? [rel] : []
    }),
  )
  const { files: textFiles, warnings: binaryWarnings } = textFilesOf({
    ...selection,
    files: selection.files.filter((file) => !ownOutputs.has(file.entry.path)),
  })
  const warnings: SelectionWarning[] = [...selection.warnings, ...binaryWarnings]

  for (const warning of warnings) {
    logger.warn({ path: warning.path, kind: warning.kind }, warning.message)
  }

  const entries = textFiles.map((file) => file.entry)
  const header = renderHeader(entries, options)
  const body = options.indexOnly
    ? ''
    : renderBundleBody(textFiles.map(toBundleFile), textModeOf(options.encoding))

  const bytes = await encodeTransport(header + body, options.encoding)
  const manifest = buildManifest({
    files: entries,
    root: options.bundleRoot ?? { kind: 'directory', source: root },
    encoding: options.encoding,
    generatedAt: options.generatedAt,
  })

  // Bundle and sidecar land together or not at all
  const writes: AtomicWriteEntry[] = [{ path: output, data: bytes }]
  if (indexOutput) writes.push({ path: indexOutput, data: serializeManifest(manifest) })
  const [written] = await writeFilesAtomic(writes, { signal })

  const totalBytes = entries.reduce((sum, entry) => sum + entry.size, 0)
  const stats: PackStats = {
    bundleSize: written.sizeBytes,
    filesProcessed: entries.length,
    filesSkipped: warnings.filter((w) => w.kind !== 'symlink-cycle').length,
    totalBytes,
    compressionRatio: compressionRatio(written.sizeBytes, totalBytes),
  }

  logger.info(
    { output, encoding: options.encoding.kind, ...stats },
    `Packed ${stats.filesProcessed} files into ${output}`,
  )

  return {
    output,
    ...(indexOutput ? { manifestPath: indexOutput } : {}),
    manifest,
    stats,
    warnings,
  }
}

function toBundleFile(file: SelectedFile): { path: string; content: string } {
  return { path: file.entry.path, content: file.content ?? '' }
}
