import { readdir, readFile, realpath, stat } from 'node:fs/promises'
import type { Dirent, Stats } from 'node:fs'
import { createHash } from 'node:crypto'
import { join, resolve } from 'node:path'
import { ValidationError } from '../errors/catalog.js'
import { isErrnoException, throwIfAborted, toCorpusError } from '../errors/fs.js'
import { buildSelectionRules, type SelectionRules } from './glob.js'
import type {
  FileEntry,
  SelectedFile,
  SelectionResult,
  SelectionWarning,
  SelectOptions,
} from './types.js'

const BINARY_SNIFF_BYTES = 8000

/** Newline count, plus one for a final unterminated line */
export function countLines(content: string): number {
  if (content.length === 0) return 0
  let count = 0
  for (let i = 0; i < content.length; i++) {
    if (content.charCodeAt(i) === 10) count++
  }
  return content.endsWith('\n') ? count : count + 1
}

export function isBinary(bytes: Uint8Array): boolean {
  return bytes.subarray(0, BINARY_SNIFF_BYTES).includes(0)
}

/** Code-unit order, independent of locale */
export function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

function isPermissionError(err: unknown): boolean {
  return isErrnoException(err) && (err.code === 'EACCES' || err.code === 'EPERM')
}

interface WalkState {
  rules: SelectionRules
  signal?: AbortSignal
  files: SelectedFile[]
  warnings: SelectionWarning[]
}

async function readSelectedFile(
  absolutePath: string,
  relativePath: string,
  state: WalkState,
): Promise<void> {
  let bytes: Buffer
  try {
    bytes = await readFile(absolutePath, { signal: state.signal })
  } catch (err) {
    if (isPermissionError(err)) {
      state.warnings.push({
        kind: 'permission-denied',
        path: relativePath,
        message: `Permission denied reading ${relativePath}`,
      })
      return
    }
    if (isErrnoException(err)) {
      state.warnings.push({
        kind: 'unreadable',
        path: relativePath,
        message: `Could not read ${relativePath}: ${err.message}`,
      })
      return
    }
    throw toCorpusError(err, absolutePath, 'Read')
  }

  const binary = isBinary(bytes)
  const content = binary ? null : bytes.toString('utf-8')
  const entry: FileEntry = {
    path: relativePath,
    size: bytes.length,
    lines: content === null ? 0 : countLines(content),
    hash: createHash('sha256').update(bytes).digest('hex'),
    type: binary ? 'binary' : 'text',
  }
  state.files.push({ entry, absolutePath, content })
}

async function walk(
  dir: string,
  relativeDir: string,
  ancestors: ReadonlySet<string>,
  state: WalkState,
): Promise<void> {
  throwIfAborted(state.signal, 'File selection')

  let entries: Dirent[]
  try {
    entries = await readdir(dir, { withFileTypes: true })
  } catch (err) {
    if (isPermissionError(err)) {
      state.warnings.push({
        kind: 'permission-denied',
        path: relativeDir || '.',
        message: `Permission denied listing ${relativeDir || '.'}`,
      })
      return
    }
    throw toCorpusError(err, dir, 'List directory')
  }

  entries.sort((a, b) => comparePaths(a.name, b.name))

  for (const dirent of entries) {
    throwIfAborted(state.signal, 'File selection')

    const absolutePath = join(dir, dirent.name)
    const relativePath = relativeDir ? `${relativeDir}/${dirent.name}` : dirent.name

    let isDirectory = dirent.isDirectory()
    let isFile = dirent.isFile()

    if (dirent.isSymbolicLink()) {
      try {
        const target = await stat(absolutePath)
        isDirectory = target.isDirectory()
        isFile = target.isFile()
      } catch (err) {
        if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ELOOP')) {
          state.warnings.push({
            kind: err.code === 'ELOOP' ? 'symlink-cycle' : 'broken-symlink',
            path: relativePath,
            message: `Skipping unresolvable symlink ${relativePath}`,
          })
          continue
        }
        if (isPermissionError(err)) {
          state.warnings.push({
            kind: 'permission-denied',
            path: relativePath,
            message: `Permission denied resolving ${relativePath}`,
          })
          continue
        }
        throw toCorpusError(err, absolutePath, 'Stat')
      }
    }

    if (isDirectory) {
      if (state.rules.excludesDirectory(relativePath)) continue

      const real = await realpath(absolutePath)
      if (ancestors.has(real)) {
        state.warnings.push({
          kind: 'symlink-cycle',
          path: relativePath,
          message: `Skipping symlink cycle at ${relativePath}`,
        })
        continue
      }
      const nextAncestors = new Set(ancestors)
      nextAncestors.add(real)
      await walk(absolutePath, relativePath, nextAncestors, state)
    } else if (isFile && state.rules.includesFile(relativePath)) {
      await readSelectedFile(absolutePath, relativePath, state)
    }
  }
}

/**
 * Walk `root` and return every file matching the include/exclude rules,
 * sorted by relative path. Unreadable entries and symlink cycles become
 * warnings; anything else aborts the selection.
 */
export async function selectFiles(
  root: string,
  options?: SelectOptions,
): Promise<SelectionResult> {
  const rules = buildSelectionRules(options?.include ?? [], options?.exclude ?? [])
  const absoluteRoot = resolve(root)

  let rootStats: Stats
  try {
    rootStats = await stat(absoluteRoot)
  } catch (err) {
    throw toCorpusError(err, absoluteRoot, 'Open pack root')
  }
  if (!rootStats.isDirectory()) {
    throw new ValidationError(`Pack root is not a directory: ${absoluteRoot}`, {
      path: absoluteRoot,
    })
  }

  const state: WalkState = {
    rules,
    signal: options?.signal,
    files: [],
    warnings: [],
  }
  const realRoot = await realpath(absoluteRoot)
  await walk(absoluteRoot, '', new Set([realRoot]), state)

  state.files.sort((a, b) => comparePaths(a.entry.path, b.entry.path))

  return { root: absoluteRoot, files: state.files, warnings: state.warnings }
}

/**
 * Split a selection into the text files that go into a bundle and warnings
 * for the binary files left out.
 */
export function textFilesOf(selection: SelectionResult): {
  files: SelectedFile[]
  warnings: SelectionWarning[]
} {
  const files: SelectedFile[] = []
  const warnings: SelectionWarning[] = []
  for (const file of selection.files) {
    if (file.entry.type === 'text') {
      files.push(file)
    } else {
      warnings.push({
        kind: 'binary-skipped',
        path: file.entry.path,
        message: `Skipping binary file ${file.entry.path}`,
      })
    }
  }
  return { files, warnings }
}
