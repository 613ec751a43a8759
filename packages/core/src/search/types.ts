export interface SearchResult {
  collectionId: string
  path: string
  /** 1-based */
  line: number
  snippet: string
  score: number
}

export interface SearchOptions {
  topK?: number
  caseSensitive?: boolean
}

export interface SearchLimits {
  defaultTopK: number
  maxTopK: number
}
