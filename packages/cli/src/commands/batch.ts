import { readFile } from 'node:fs/promises'
import { basename, join, resolve } from 'node:path'
import { runBatch, type BatchOutcome } from '@corpus/core/batch'
import { packCorpus, type PackOptions, type PackResult } from '@corpus/core/bundle'
import { slugify, uniqueSlug } from '@corpus/core/catalog'
import type { Encoding } from '@corpus/core/encoder'
import { ValidationError, toCorpusError } from '@corpus/core/errors'
import { parseGitHubUrl, withRepoCheckout } from '@corpus/core/remote'
import { parseCommandArgs, parseInteger } from '../args.js'
import type { CliContext } from '../context.js'
import { ENCODING_OPTIONS, resolvePackSettings } from './pack.js'

const BATCH_OPTIONS = {
  ...ENCODING_OPTIONS,
  file: { type: 'string', short: 'f' },
  'out-dir': { type: 'string', short: 'd' },
  concurrency: { type: 'string' },
  'fail-fast': { type: 'boolean' },
  json: { type: 'boolean' },
} as const

export interface BatchJob {
  source: string
  remote: boolean
  output: string
}

function isRemoteSource(source: string): boolean {
  return /^https?:\/\//i.test(source)
}

function extensionFor(encoding: Encoding): string {
  switch (encoding.kind) {
    case 'gzip':
      return '.txt.gz'
    case 'base64':
      return '.txt.b64'
    default:
      return '.txt'
  }
}

/** Bundle name for one source; owner-repo[-subdir] for GitHub URLs */
function bundleBase(source: string): string {
  if (!isRemoteSource(source)) return slugify(basename(resolve(source)))
  const { owner, repo, subdir } = parseGitHubUrl(source)
  return slugify([owner, repo, subdir].filter(Boolean).join('-'))
}

/**
 * One job per source, each writing to its own file under `outDir`. Sources
 * that would share a name get -2, -3, ... suffixes.
 */
export function planBatchJobs(sources: readonly string[], outDir: string, encoding: Encoding): BatchJob[] {
  const taken = new Set<string>()
  return sources.map((source) => {
    const name = uniqueSlug(bundleBase(source), (candidate) => taken.has(candidate))
    taken.add(name)
    return {
      source,
      remote: isRemoteSource(source),
      output: join(resolve(outDir), name + extensionFor(encoding)),
    }
  })
}

async function readSourceList(path: string): Promise<string[]> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (err) {
    throw toCorpusError(err, path, 'Read source list')
  }
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'))
}

export async function batchCommand(args: string[], ctx: CliContext): Promise<number> {
  const { values, positionals } = parseCommandArgs('batch', {
    args,
    options: BATCH_OPTIONS,
    allowPositionals: true,
    strict: true,
  })

  const sources = [...positionals, ...(values.file ? await readSourceList(values.file) : [])]
  if (sources.length === 0) {
    throw new ValidationError('No sources given: pass directories or repository URLs, or --file')
  }
  const concurrency = parseInteger('concurrency', values.concurrency) ?? ctx.config.batch.concurrency
  if (concurrency < 1) {
    throw new ValidationError('--concurrency must be at least 1', { concurrency })
  }

  const settings = resolvePackSettings(values, undefined, ctx.config.pack.output)
  const jobs = planBatchJobs(sources, values['out-dir'] ?? '.', settings.encoding)

  const baseOptions: Omit<PackOptions, 'root' | 'output'> = {
    include: settings.include,
    exclude: settings.exclude,
    defaultExcludes: ctx.config.pack.defaultExcludes,
    encoding: settings.encoding,
    writeIndex: settings.writeIndex,
    indexStyle: settings.indexStyle,
    indexDepth: settings.indexDepth,
  }

  const packJob = (job: BatchJob, signal: AbortSignal): Promise<PackResult> => {
    const packCtx = { logger: ctx.logger.child({ source: job.source }), signal }
    if (!job.remote) {
      return packCorpus({ ...baseOptions, root: job.source, output: job.output }, packCtx)
    }
    return withRepoCheckout(
      job.source,
      { timeoutMs: ctx.config.io.fetchTimeoutMs, logger: packCtx.logger, signal },
      (checkout) =>
        packCorpus(
          {
            ...baseOptions,
            root: checkout.root,
            output: job.output,
            bundleRoot: { kind: 'repo', source: job.source, ref: checkout.ref, subdir: checkout.subdir },
          },
          packCtx,
        ),
    )
  }

  const report = (outcome: BatchOutcome<BatchJob, PackResult>) => {
    const { source } = outcome.item
    if (values.json) {
      ctx.out(
        JSON.stringify(
          outcome.ok
            ? {
                source,
                output: outcome.value.output,
                files: outcome.value.stats.filesProcessed,
                bytes: outcome.value.stats.bundleSize,
              }
            : { source, error: outcome.error.message },
        ),
      )
    } else if (outcome.ok) {
      ctx.out(`ok    ${source} -> ${outcome.value.output} (${outcome.value.stats.filesProcessed} files)`)
    } else {
      ctx.out(`fail  ${source}: ${outcome.error.message}`)
    }
  }

  const outcomes = await runBatch(jobs, packJob, {
    concurrency,
    failFast: values['fail-fast'],
    signal: ctx.signal,
    onSettled: report,
  })

  const failed = outcomes.filter((outcome) => !outcome.ok).length
  if (failed > 0) {
    ctx.err(`${failed} of ${outcomes.length} packs failed`)
    return 1
  }
  return 0
}
