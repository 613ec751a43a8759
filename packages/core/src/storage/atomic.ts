import { mkdir, writeFile, rename, rm, stat } from 'node:fs/promises'
import { dirname } from 'node:path'
import { randomUUID } from 'node:crypto'
import { isErrnoException, throwIfAborted, toCorpusError } from '../errors/fs.js'

export interface AtomicWriteOptions {
  signal?: AbortSignal
}

export interface AtomicWriteResult {
  path: string
  sizeBytes: number
}

export interface AtomicWriteEntry {
  path: string
  data: string | Uint8Array
}

/** rm -f that also tolerates a parent path that is not a directory */
async function removeIfPresent(path: string): Promise<void> {
  try {
    await rm(path, { force: true })
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOTDIR') return
    throw err
  }
}

/**
 * Atomic write: mkdir -p, write temp file beside the target, rename.
 * The temp file is removed on any failure, so the target path only ever holds
 * a complete file.
 */
export async function writeFileAtomic(
  filePath: string,
  data: string | Uint8Array,
  options?: AtomicWriteOptions,
): Promise<AtomicWriteResult> {
  const [result] = await writeFilesAtomic([{ path: filePath, data }], options)
  return result
}

/**
 * Write several files as one unit. Every temp file is written before any is
 * renamed into place; when a write or rename fails, the temp files and any
 * targets already renamed are removed.
 */
export async function writeFilesAtomic(
  entries: readonly AtomicWriteEntry[],
  options?: AtomicWriteOptions,
): Promise<AtomicWriteResult[]> {
  const staged = entries.map((entry) => ({
    ...entry,
    tempPath: entry.path + '.tmp.' + randomUUID(),
  }))
  const renamed: string[] = []
  let current = staged[0]?.path ?? ''

  try {
    for (const entry of staged) {
      current = entry.path
      await mkdir(dirname(entry.path), { recursive: true })
      throwIfAborted(options?.signal, `Write ${entry.path}`)
      await writeFile(entry.tempPath, entry.data, { signal: options?.signal })
    }
    for (const entry of staged) {
      current = entry.path
      throwIfAborted(options?.signal, `Write ${entry.path}`)
      await rename(entry.tempPath, entry.path)
      renamed.push(entry.path)
    }
  } catch (err) {
    await Promise.all([
      ...staged.map((entry) => removeIfPresent(entry.tempPath)),
      ...renamed.map((path) => removeIfPresent(path)),
    ])
    throw toCorpusError(err, current, 'Write')
  }

  return Promise.all(
    staged.map(async (entry) => ({ path: entry.path, sizeBytes: (await stat(entry.path)).size })),
  )
}
