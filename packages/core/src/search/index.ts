export { compareResults, DEFAULT_SEARCH_LIMITS, resolveTopK, searchFiles } from './engine.js'
export { closestGap, makeSnippet, parseQuery, PROXIMITY_WINDOW, scoreLine } from './score.js'
export type { LineScore, Query } from './score.js'
export type { SearchLimits, SearchOptions, SearchResult } from './types.js'
