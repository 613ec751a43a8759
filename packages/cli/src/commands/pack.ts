import { resolve } from 'node:path'
import {
  findPackPreset,
  loadPackPreset,
  packCorpus,
  type IndexStyle,
  type PackResult,
} from '@corpus/core/bundle'
import { registerCollection, slugify } from '@corpus/core/catalog'
import { resolveEncoding, type Encoding } from '@corpus/core/encoder'
import { ValidationError } from '@corpus/core/errors'
import { withRepoCheckout } from '@corpus/core/remote'
import type { BundleRoot, PackPreset } from '@corpus/core/schemas'
import { parseCommandArgs, parseInteger, splitList } from '../args.js'
import type { CliContext } from '../context.js'
import { formatPackStats } from '../format.js'

export const ENCODING_OPTIONS = {
  compress: { type: 'boolean', short: 'c' },
  'max-compress': { type: 'boolean', short: 'm' },
  gzip: { type: 'boolean', short: 'z' },
  base64: { type: 'boolean', short: 'b' },
  include: { type: 'string', short: 'i', multiple: true },
  exclude: { type: 'string', short: 'x', multiple: true },
  'no-index': { type: 'boolean' },
  'index-style': { type: 'string' },
  'index-depth': { type: 'string' },
} as const

const PACK_OPTIONS = {
  ...ENCODING_OPTIONS,
  repo: { type: 'string' },
  ref: { type: 'string' },
  output: { type: 'string', short: 'o' },
  'index-only': { type: 'boolean' },
  'index-output': { type: 'string' },
  config: { type: 'string' },
  'register-id': { type: 'string' },
  'register-name': { type: 'string' },
  'register-tags': { type: 'string' },
  stats: { type: 'boolean' },
} as const

interface PackFlags {
  compress?: boolean
  'max-compress'?: boolean
  gzip?: boolean
  base64?: boolean
  include?: string[]
  exclude?: string[]
  'no-index'?: boolean
  'index-style'?: string
  'index-depth'?: string
  output?: string
  'index-only'?: boolean
  'index-output'?: string
}

export interface PackSettings {
  output: string
  include: string[]
  exclude: string[]
  encoding: Encoding
  writeIndex: boolean
  indexStyle: IndexStyle
  indexDepth?: number
  indexOnly: boolean
  indexOutput?: string
}

function isIndexStyle(value: string): value is IndexStyle {
  return value === 'flat' || value === 'tree'
}

function resolveIndexStyle(flag: string | undefined, preset: PackPreset | undefined): IndexStyle {
  if (flag === undefined) return preset?.indexStyle ?? 'flat'
  if (!isIndexStyle(flag)) {
    throw new ValidationError(`--index-style must be flat or tree, got "${flag}"`, { indexStyle: flag })
  }
  return flag
}

/**
 * Combine command-line flags with a cpack preset. Flags given on the
 * command line win; list options replace the preset's list when non-empty.
 */
export function resolvePackSettings(
  flags: PackFlags,
  preset: PackPreset | undefined,
  defaultOutput: string,
): PackSettings {
  const encoding = resolveEncoding({
    compress: flags.compress || preset?.compress === true,
    maxCompress: flags['max-compress'] || preset?.maxCompress === true,
    gzip: flags.gzip || preset?.gzip === true,
    base64: flags.base64 || preset?.base64 === true,
  })
  const indexOutput = flags['index-output'] ?? preset?.indexOutput
  const indexDepth = parseInteger('index-depth', flags['index-depth']) ?? preset?.indexDepth
  if (indexDepth !== undefined && indexDepth < 1) {
    throw new ValidationError('--index-depth must be at least 1', { indexDepth })
  }

  return {
    output: resolve(flags.output ?? preset?.output ?? defaultOutput),
    include: flags.include?.length ? flags.include : (preset?.include ?? []),
    exclude: flags.exclude?.length ? flags.exclude : (preset?.exclude ?? []),
    encoding,
    writeIndex: flags['no-index'] ? false : (preset?.writeIndex ?? true),
    indexStyle: resolveIndexStyle(flags['index-style'], preset),
    indexDepth,
    indexOnly: flags['index-only'] || preset?.indexOnly === true,
    indexOutput: indexOutput ? resolve(indexOutput) : undefined,
  }
}

async function register(
  result: PackResult,
  flags: { 'register-id'?: string; 'register-name'?: string; 'register-tags'?: string },
  ctx: CliContext,
): Promise<void> {
  const name = flags['register-name']?.trim() || undefined
  const id = flags['register-id'] ?? (name ? slugify(name) : undefined)
  if (!id) return

  try {
    const catalog = await ctx.openCatalog()
    try {
      const collection = await registerCollection(catalog, {
        source: result.output,
        kind: 'bundle',
        id,
        name,
        tags: splitList(flags['register-tags']),
        replace: true,
      })
      ctx.out(`registered: ${collection.id}`)
    } finally {
      catalog.close()
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    ctx.logger.debug({ err }, 'Catalog registration failed')
    ctx.err(`Warning: failed to register in catalog: ${message}`)
  }
}

export async function packCommand(args: string[], ctx: CliContext): Promise<number> {
  const { values, positionals } = parseCommandArgs('pack', {
    args,
    options: PACK_OPTIONS,
    allowPositionals: true,
    strict: true,
  })

  if (positionals.length > 1) {
    throw new ValidationError(`pack takes one directory, got ${positionals.length}`)
  }
  if (values.repo && positionals.length > 0) {
    throw new ValidationError('Pass either a directory or --repo, not both')
  }
  if (values.ref && !values.repo) {
    throw new ValidationError('--ref needs --repo')
  }

  const explicitPreset = values.config ? await loadPackPreset(values.config) : undefined
  const defaultOutput = ctx.config.pack.output

  const packRoot = (root: string, settings: PackSettings, bundleRoot?: BundleRoot) =>
    packCorpus(
      {
        root,
        output: settings.output,
        include: settings.include,
        exclude: settings.exclude,
        defaultExcludes: ctx.config.pack.defaultExcludes,
        encoding: settings.encoding,
        writeIndex: settings.writeIndex,
        indexStyle: settings.indexStyle,
        indexDepth: settings.indexDepth,
        indexOnly: settings.indexOnly,
        indexOutput: settings.indexOutput,
        bundleRoot,
      },
      { logger: ctx.logger, signal: ctx.signal },
    )

  let result: PackResult
  const repo = values.repo
  if (repo) {
    // Encoding errors surface before anything is downloaded
    resolvePackSettings(values, explicitPreset, defaultOutput)
    result = await withRepoCheckout(
      repo,
      {
        ref: values.ref,
        timeoutMs: ctx.config.io.fetchTimeoutMs,
        logger: ctx.logger,
        signal: ctx.signal,
      },
      async (checkout) => {
        const preset = explicitPreset ?? (await findPackPreset(checkout.root))
        return packRoot(checkout.root, resolvePackSettings(values, preset, defaultOutput), {
          kind: 'repo',
          source: repo,
          ref: checkout.ref,
          subdir: checkout.subdir,
        })
      },
    )
  } else {
    const root = resolve(positionals[0] ?? '.')
    const preset = explicitPreset ?? (await findPackPreset(root))
    result = await packRoot(root, resolvePackSettings(values, preset, defaultOutput))
  }

  ctx.out(result.output)
  if (result.manifestPath) ctx.out(result.manifestPath)

  if (values.stats && result.stats.filesProcessed > 0) {
    ctx.out(formatPackStats(result.stats))
    if (result.stats.filesSkipped > 0) {
      ctx.out(`Skipped: ${result.stats.filesSkipped} files`)
    }
  }

  await register(result, values, ctx)
  return 0
}
