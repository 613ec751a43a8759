import { DecodeError } from '../errors/catalog.js'
import { applyTextMode } from './text.js'
import type { BundleFile, TextMode } from './types.js'

const START_PREFIX = '--- START OF FILE: '
const END_PREFIX = '--- END OF FILE: '
const MARKER_SUFFIX = ' ---'

export function fileStartMarker(path: string): string {
  return `${START_PREFIX}${path}${MARKER_SUFFIX}`
}

export function fileEndMarker(path: string): string {
  return `${END_PREFIX}${path}${MARKER_SUFFIX}`
}

export function renderFileBlock(file: BundleFile): string {
  return `${fileStartMarker(file.path)}\n${file.content}\n${fileEndMarker(file.path)}\n\n`
}

/**
 * Render the bundle body: one delimited block per file, in the given order,
 * with each file's content passed through the text mode.
 */
export function renderBundleBody(files: readonly BundleFile[], mode: TextMode): string {
  let body = ''
  for (const file of files) {
    body += renderFileBlock({
      path: file.path,
      content: applyTextMode(file.content, file.path, mode),
    })
  }
  return body
}

function startMarkerPath(line: string): string | undefined {
  if (line.startsWith(START_PREFIX) && line.endsWith(MARKER_SUFFIX)) {
    return line.slice(START_PREFIX.length, line.length - MARKER_SUFFIX.length)
  }
  return undefined
}

function isLineEnd(text: string, index: number): boolean {
  return index === text.length || text[index] === '\n'
}

/**
 * Parse a bundle body back into files. Text outside file blocks is ignored.
 * An END marker only closes the block whose path it names, so content that
 * happens to contain another file's markers survives.
 */
export function parseBundleBody(body: string): BundleFile[] {
  const files: BundleFile[] = []
  let pos = 0

  while (pos < body.length) {
    const lineEnd = body.indexOf('\n', pos)
    const line = body.slice(pos, lineEnd === -1 ? body.length : lineEnd)
    const path = startMarkerPath(line)

    if (path === undefined || lineEnd === -1) {
      if (path !== undefined) {
        throw new DecodeError(`Bundle ends inside file block: ${path}`, { path })
      }
      pos = lineEnd === -1 ? body.length : lineEnd + 1
      continue
    }

    const contentStart = lineEnd + 1
    const terminator = `\n${fileEndMarker(path)}`
    let closeAt = body.indexOf(terminator, contentStart - 1)
    while (closeAt !== -1 && !isLineEnd(body, closeAt + terminator.length)) {
      closeAt = body.indexOf(terminator, closeAt + 1)
    }
    if (closeAt === -1) {
      throw new DecodeError(`Missing end marker for file: ${path}`, { path })
    }

    files.push({
      path,
      content: closeAt < contentStart ? '' : body.slice(contentStart, closeAt),
    })
    pos = closeAt + terminator.length
    if (body[pos] === '\n') pos++
  }

  return files
}
