import type { BundleFile } from '../encoder/types.js'
import { ValidationError } from '../errors/catalog.js'
import { comparePaths } from '../selector/select.js'
import { makeSnippet, parseQuery, scoreLine } from './score.js'
import type { SearchLimits, SearchOptions, SearchResult } from './types.js'

export const DEFAULT_SEARCH_LIMITS: SearchLimits = { defaultTopK: 50, maxTopK: 500 }

export function resolveTopK(topK: number | undefined, limits: SearchLimits): number {
  if (topK === undefined) return limits.defaultTopK
  if (!Number.isInteger(topK) || topK < 1 || topK > limits.maxTopK) {
    throw new ValidationError(`top_k must be an integer between 1 and ${limits.maxTopK}`, {
      top_k: topK,
      max: limits.maxTopK,
    })
  }
  return topK
}

export function compareResults(a: SearchResult, b: SearchResult): number {
  return b.score - a.score || comparePaths(a.path, b.path) || a.line - b.line
}

/**
 * Rank every line of `files` against `query`, best first, capped at top_k.
 * An empty query (no letters or digits) returns no results.
 */
export function searchFiles(
  collectionId: string,
  files: readonly BundleFile[],
  query: string,
  options?: SearchOptions,
  limits: SearchLimits = DEFAULT_SEARCH_LIMITS,
): SearchResult[] {
  const topK = resolveTopK(options?.topK, limits)
  const parsed = parseQuery(query, options?.caseSensitive ?? false)
  if (parsed.terms.length === 0) return []

  const results: SearchResult[] = []
  for (const file of files) {
    const lines = file.content.split('\n')
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].replace(/\r$/, '')
      const scored = scoreLine(line, parsed)
      if (!scored) continue
      results.push({
        collectionId,
        path: file.path,
        line: i + 1,
        snippet: makeSnippet(line, scored.firstMatch),
        score: scored.score,
      })
    }
  }

  return results.sort(compareResults).slice(0, topK)
}
