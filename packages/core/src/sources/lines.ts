import { ValidationError } from '../errors/catalog.js'
import { countLines } from '../selector/select.js'

export interface LineSlice {
  content: string
  /** First returned line, 1-based; 0 for an empty file */
  start: number
  /** Last returned line, inclusive; 0 for an empty file */
  end: number
}

function checkLineNumber(name: string, value: number | undefined): void {
  if (value !== undefined && !Number.isInteger(value)) {
    throw new ValidationError(`${name} must be an integer`, { [name]: value })
  }
}

/** Reject fractional line numbers and an end before the start. */
export function validateLineRange(start?: number, end?: number): void {
  checkLineNumber('start', start)
  checkLineNumber('end', end)
  if (start !== undefined && end !== undefined && end < start) {
    throw new ValidationError(`end (${end}) is before start (${start})`, { start, end })
  }
}

/**
 * Restrict content to an inclusive 1-based line range. Values outside the
 * file are clamped; an end before the start is rejected.
 */
export function sliceLines(content: string, start?: number, end?: number): LineSlice {
  validateLineRange(start, end)

  const lineCount = countLines(content)
  if (lineCount === 0) return { content: '', start: 0, end: 0 }
  if (start === undefined && end === undefined) {
    return { content, start: 1, end: lineCount }
  }

  const from = Math.min(Math.max(start ?? 1, 1), lineCount)
  const to = Math.max(Math.min(end ?? lineCount, lineCount), from)

  const lines = content.split('\n')
  let sliced = lines.slice(from - 1, to).join('\n')
  if (to === lineCount && content.endsWith('\n')) sliced += '\n'
  return { content: sliced, start: from, end: to }
}
