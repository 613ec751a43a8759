import { DecodeError } from '../errors/catalog.js'
import { TREE_END, TREE_START } from './tree-index.js'

export const INDEX_START = '--- FILE INDEX START ---'
export const INDEX_END = '--- FILE INDEX END ---'

export interface HumanIndexEntry {
  path: string
  size: number
  lines: number
}

/**
 * Header prepended to a bundle: one `<path>\t<size>\t<lines>` row per file,
 * then the end marker and a blank separator line.
 */
export function buildHumanIndex(entries: readonly HumanIndexEntry[]): string {
  let header = `${INDEX_START}\n`
  for (const entry of entries) {
    header += `${entry.path}\t${entry.size}\t${entry.lines}\n`
  }
  return `${header}${INDEX_END}\n\n`
}

function parseRow(row: string): HumanIndexEntry {
  const linesTab = row.lastIndexOf('\t')
  const sizeTab = linesTab > 0 ? row.lastIndexOf('\t', linesTab - 1) : -1
  const path = row.slice(0, sizeTab)
  const size = Number(row.slice(sizeTab + 1, linesTab))
  const lines = Number(row.slice(linesTab + 1))

  if (sizeTab <= 0 || !Number.isInteger(size) || !Number.isInteger(lines)) {
    throw new DecodeError(`Malformed file index row: ${row}`, { row })
  }
  return { path, size, lines }
}

export interface SplitBundle {
  /** Rows of the flat index, or null when the bundle has no flat header */
  index: HumanIndexEntry[] | null
  body: string
}

/** Rows between `start` and `end`, and the text after the blank separator */
function splitHeader(text: string, start: string, end: string): { rowsText: string; body: string } {
  const endMarker = `\n${end}\n`
  const endAt = text.indexOf(endMarker, start.length)
  if (endAt === -1) {
    throw new DecodeError('File index header is not terminated')
  }

  let bodyStart = endAt + endMarker.length
  if (text[bodyStart] === '\n') bodyStart++
  return { rowsText: text.slice(start.length + 1, endAt), body: text.slice(bodyStart) }
}

/** Separate the human index header (flat or tree) from the bundle body. */
export function splitHumanIndex(text: string): SplitBundle {
  if (text.startsWith(`${TREE_START}\n`)) {
    return { index: null, body: splitHeader(text, TREE_START, TREE_END).body }
  }
  if (!text.startsWith(`${INDEX_START}\n`)) {
    return { index: null, body: text }
  }

  const { rowsText, body } = splitHeader(text, INDEX_START, INDEX_END)
  const index = rowsText === '' ? [] : rowsText.split('\n').map(parseRow)
  return { index, body }
}

/** Bundle text with the human index removed. */
export function stripHumanIndex(text: string): string {
  return splitHumanIndex(text).body
}
