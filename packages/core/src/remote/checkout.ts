import { createWriteStream } from 'node:fs'
import { mkdir, mkdtemp, readdir, rm, stat } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { pipeline } from 'node:stream/promises'
import { Readable } from 'node:stream'
import { execFile } from 'node:child_process'
import { promisify } from 'node:util'
import type { Logger } from '../logger/index.js'
import { CorpusError, IOError, NotFoundError } from '../errors/catalog.js'
import { isAbort, throwIfAborted, toCorpusError } from '../errors/fs.js'
import { cloneUrl, parseGitHubUrl, tarballUrl, type GitHubRepoRef } from './github.js'

const execFileAsync = promisify(execFile)

export type CheckoutMethod = 'tarball' | 'git'

export interface RepoCheckout extends GitHubRepoRef {
  url: string
  /** Directory to pack: the checkout root, or the subdir within it */
  root: string
  method: CheckoutMethod
  /** Remove everything the checkout wrote */
  cleanup(): Promise<void>
}

export interface FetchRepoOptions {
  ref?: string
  timeoutMs: number
  logger: Logger
  signal?: AbortSignal
  /** Bearer token for the GitHub API; defaults to GH_TOKEN / GITHUB_TOKEN */
  token?: string
  /** Fall back to `git clone --depth 1` when the tarball download fails (default true) */
  gitFallback?: boolean
}

function deadline(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs)
  return signal ? AbortSignal.any([timeout, signal]) : timeout
}

/**
 * Download the repository tarball into `workDir` and extract it.
 * Returns the single top-level directory GitHub puts in the archive.
 */
async function downloadTarball(
  target: GitHubRepoRef,
  workDir: string,
  token: string | undefined,
  signal: AbortSignal,
): Promise<string> {
  const url = tarballUrl(target)
  const response = await fetch(url, {
    headers: {
      'User-Agent': 'corpus-packer',
      Accept: 'application/vnd.github+json',
      ...(token ? { Authorization: `Bearer ${token}` } : {}),
    },
    signal,
  })
  if (!response.ok) {
    throw new IOError(`Tarball download failed: HTTP ${response.status} from ${url}`, {
      url,
      status: response.status,
    })
  }
  if (!response.body) {
    throw new IOError('No response body received', { url })
  }

  const archive = join(workDir, 'repo.tar.gz')
  const extractDir = join(workDir, 'extract')
  await pipeline(
    Readable.fromWeb(response.body as Parameters<typeof Readable.fromWeb>[0]),
    createWriteStream(archive),
    { signal },
  )
  await mkdir(extractDir, { recursive: true })
  await execFileAsync('tar', ['-xzf', archive, '-C', extractDir], { signal })

  const entries = await readdir(extractDir, { withFileTypes: true })
  const top = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort()[0]
  if (top === undefined) {
    throw new IOError('Repository tarball contained no directory', { url })
  }
  return join(extractDir, top)
}

async function cloneRepository(
  target: GitHubRepoRef,
  workDir: string,
  signal: AbortSignal,
): Promise<string> {
  const dest = join(workDir, 'clone')
  const args = ['clone', '--depth', '1']
  if (target.ref) args.push('--branch', target.ref)
  args.push(cloneUrl(target), dest)
  await execFileAsync('git', args, { signal })
  return dest
}

function asCorpusError(err: unknown, url: string, operation: string): CorpusError {
  if (err instanceof CorpusError || isAbort(err)) return toCorpusError(err, url, operation)
  const message = err instanceof Error ? err.message : String(err)
  return new IOError(`${operation} failed: ${message}`, { url })
}

/**
 * Materialize a GitHub repository (or a subdirectory of it) in a temporary
 * directory: tarball first, shallow git clone as the fallback. Call
 * `cleanup()` when done; `withRepoCheckout` does that for you.
 */
export async function fetchRepoCheckout(
  repoUrl: string,
  options: FetchRepoOptions,
): Promise<RepoCheckout> {
  const target = parseGitHubUrl(repoUrl, options.ref)
  const { logger } = options
  const token = options.token ?? (process.env.GH_TOKEN || process.env.GITHUB_TOKEN || undefined)
  const signal = deadline(options.timeoutMs, options.signal)

  const workDir = await mkdtemp(join(tmpdir(), 'corpus-repo-'))
  const cleanup = () => rm(workDir, { recursive: true, force: true })

  try {
    let checkoutDir: string
    let method: CheckoutMethod
    try {
      logger.info({ owner: target.owner, repo: target.repo, ref: target.ref }, 'Downloading tarball')
      checkoutDir = await downloadTarball(target, workDir, token, signal)
      method = 'tarball'
    } catch (err) {
      throwIfAborted(signal, `Fetch ${repoUrl}`)
      if (options.gitFallback === false) throw asCorpusError(err, repoUrl, 'Tarball download')
      logger.warn(
        { err: err instanceof Error ? err.message : String(err) },
        'Tarball download failed, falling back to git clone',
      )
      try {
        checkoutDir = await cloneRepository(target, workDir, signal)
      } catch (cloneErr) {
        throwIfAborted(signal, `Fetch ${repoUrl}`)
        throw asCorpusError(cloneErr, repoUrl, 'git clone')
      }
      method = 'git'
    }

    const root = target.subdir ? join(checkoutDir, target.subdir) : checkoutDir
    const rootStats = await stat(root).catch(() => undefined)
    if (!rootStats?.isDirectory()) {
      throw new NotFoundError(`Subdirectory not found in repository: ${target.subdir}`, {
        url: repoUrl,
        subdir: target.subdir,
      })
    }

    logger.info({ root, method }, 'Repository checkout ready')
    return { ...target, url: repoUrl, root, method, cleanup }
  } catch (err) {
    await cleanup()
    throw err
  }
}

/** Run `fn` against a fresh checkout and always remove the checkout after. */
export async function withRepoCheckout<T>(
  repoUrl: string,
  options: FetchRepoOptions,
  fn: (checkout: RepoCheckout) => Promise<T>,
): Promise<T> {
  const checkout = await fetchRepoCheckout(repoUrl, options)
  try {
    return await fn(checkout)
  } finally {
    await checkout.cleanup()
  }
}
