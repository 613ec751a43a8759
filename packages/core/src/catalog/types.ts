export type CollectionKind = 'bundle' | 'directory'

export interface Collection {
  id: string
  kind: CollectionKind
  /** Absolute path of the bundle file or directory */
  source: string
  name: string
  tags: string[]
  addedAt: string
}

export interface AddCollectionInput {
  /** Derived from name or source when omitted */
  id?: string
  kind: CollectionKind
  source: string
  name?: string
  tags?: string[]
  /** Overwrite an existing collection with the same id */
  replace?: boolean
}
