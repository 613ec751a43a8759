/** Window, in characters, within which distinct terms earn a proximity bonus */
export const PROXIMITY_WINDOW = 40
const MAX_PROXIMITY = 49
const OCCURRENCE_CAP = 19

export interface Query {
  terms: string[]
  /** Whole query, whitespace-normalized, for the exact-match bonus */
  phrase: string
  caseSensitive: boolean
}

/**
 * Split a query into distinct terms on anything that is not a letter or
 * digit. Terms are lowercased unless the search is case-sensitive.
 */
export function parseQuery(query: string, caseSensitive = false): Query {
  const fold = (s: string) => (caseSensitive ? s : s.toLowerCase())
  const terms = [...new Set(query.split(/[^\p{L}\p{N}]+/u).filter(Boolean).map(fold))]
  return { terms, phrase: fold(query.trim().replace(/\s+/g, ' ')), caseSensitive }
}

function positionsOf(haystack: string, needle: string): number[] {
  const positions: number[] = []
  let at = haystack.indexOf(needle)
  while (at !== -1) {
    positions.push(at)
    at = haystack.indexOf(needle, at + needle.length)
  }
  return positions
}

/** Smallest |p - q| over two ascending position lists, in one merge pass */
export function closestGap(left: readonly number[], right: readonly number[]): number {
  let best = Infinity
  let i = 0
  let j = 0
  while (i < left.length && j < right.length) {
    const gap = left[i] - right[j]
    best = Math.min(best, Math.abs(gap))
    if (best === 0) break
    if (gap < 0) i++
    else j++
  }
  return best
}

export interface LineScore {
  score: number
  /** Offset of the earliest term match, for snippets */
  firstMatch: number
}

/**
 * Score one line, or return undefined when it contains no query term.
 *
 *   distinct terms × 100
 *   + min(occurrences, 19) × 5
 *   + proximity (0..49, closest pair of distinct terms within 40 chars)
 *   + (terms + 2) × 100 when the line contains the whole query
 *
 * The last bonus exceeds any score a line without the full query can reach.
 */
export function scoreLine(line: string, query: Query): LineScore | undefined {
  const haystack = query.caseSensitive ? line : line.toLowerCase()

  const matches: number[][] = []
  let occurrences = 0
  for (const term of query.terms) {
    const positions = positionsOf(haystack, term)
    if (positions.length > 0) {
      matches.push(positions)
      occurrences += positions.length
    }
  }
  if (matches.length === 0) return undefined

  let closest = Infinity
  for (let a = 0; a < matches.length; a++) {
    for (let b = a + 1; b < matches.length; b++) {
      closest = Math.min(closest, closestGap(matches[a], matches[b]))
    }
  }
  const proximity =
    closest <= PROXIMITY_WINDOW
      ? Math.floor(((PROXIMITY_WINDOW - closest) * MAX_PROXIMITY) / PROXIMITY_WINDOW)
      : 0

  let score = matches.length * 100 + Math.min(occurrences, OCCURRENCE_CAP) * 5 + proximity
  if (query.phrase !== '' && haystack.includes(query.phrase)) {
    score += (query.terms.length + 2) * 100
  }

  return { score, firstMatch: Math.min(...matches.map((positions) => positions[0])) }
}

const SNIPPET_LENGTH = 200
const SNIPPET_LEAD = 80

/** The trimmed line, clipped around the first match when it is long */
export function makeSnippet(line: string, firstMatch: number): string {
  const leading = line.length - line.trimStart().length
  const text = line.trim()
  if (text.length <= SNIPPET_LENGTH) return text

  const anchor = Math.max(0, firstMatch - leading)
  const start = Math.max(0, Math.min(anchor - SNIPPET_LEAD, text.length - SNIPPET_LENGTH))
  const end = Math.min(text.length, start + SNIPPET_LENGTH)
  return `${start > 0 ? '...' : ''}${text.slice(start, end)}${end < text.length ? '...' : ''}`
}
