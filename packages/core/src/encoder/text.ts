import { stripComments } from './comments.js'
import type { TextMode } from './types.js'

/**
 * Collapse redundant whitespace without touching tokens: CRLF becomes LF,
 * trailing spaces and tabs go, blank-line runs shrink to one, and leading or
 * trailing blank lines are dropped.
 */
export function compressWhitespace(content: string): string {
  const out: string[] = []
  let previousBlank = false
  for (const raw of content.replace(/\r\n/g, '\n').split('\n')) {
    const line = raw.replace(/[ \t]+$/, '')
    if (line === '') {
      if (!previousBlank && out.length > 0) out.push('')
      previousBlank = true
    } else {
      out.push(line)
      previousBlank = false
    }
  }
  while (out.length > 0 && out[out.length - 1] === '') out.pop()
  return out.join('\n')
}

export function applyTextMode(content: string, path: string, mode: TextMode): string {
  switch (mode) {
    case 'plain':
      return content
    case 'compressed':
      return compressWhitespace(content)
    case 'max-compressed':
      return compressWhitespace(stripComments(content, path))
  }
}
