import type Database from 'better-sqlite3'
import { basename } from 'node:path'
import { z } from 'zod'
import { ConflictError, NotFoundError, ValidationError } from '../errors/catalog.js'
import { slugBase, slugify, uniqueSlug } from './slug.js'
import type { AddCollectionInput, Collection, CollectionKind } from './types.js'

export interface CatalogStore {
  /** Register a collection; duplicate ids are a ConflictError unless `replace` is set */
  add(input: AddCollectionInput): Collection
  /** NotFoundError when the id is unknown */
  remove(id: string): void
  /** NotFoundError when the id is unknown */
  get(id: string): Collection
  find(id: string): Collection | undefined
  /** Collections in registration order */
  list(): Collection[]
  close(): void
}

interface CollectionRow {
  seq: number
  id: string
  kind: CollectionKind
  source: string
  name: string
  tags: string
  added_at: string
}

const TagsSchema = z.array(z.string())

function rowToCollection(row: CollectionRow): Collection {
  return {
    id: row.id,
    kind: row.kind,
    source: row.source,
    name: row.name,
    tags: TagsSchema.parse(JSON.parse(row.tags)),
    addedAt: row.added_at,
  }
}

function normalizeTags(tags: readonly string[] | undefined): string[] {
  return [...new Set((tags ?? []).map((tag) => tag.trim()).filter(Boolean))]
}

export function createCatalogStore(db: Database.Database): CatalogStore {
  const findStmt = db.prepare<{ id: string }, CollectionRow>(
    'SELECT * FROM collections WHERE id = @id',
  )
  const listStmt = db.prepare<[], CollectionRow>('SELECT * FROM collections ORDER BY seq')
  const insertStmt = db.prepare<{
    id: string
    kind: CollectionKind
    source: string
    name: string
    tags: string
  }>(
    `INSERT INTO collections (id, kind, source, name, tags)
     VALUES (@id, @kind, @source, @name, @tags)`,
  )
  const replaceStmt = db.prepare<{
    id: string
    kind: CollectionKind
    source: string
    name: string
    tags: string
  }>(
    `UPDATE collections
     SET kind = @kind, source = @source, name = @name, tags = @tags,
         added_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
     WHERE id = @id`,
  )
  const deleteStmt = db.prepare<{ id: string }>('DELETE FROM collections WHERE id = @id')

  const find = (id: string): Collection | undefined => {
    const row = findStmt.get({ id })
    return row ? rowToCollection(row) : undefined
  }

  const addTx = db.transaction((input: AddCollectionInput): Collection => {
    let id: string
    if (input.id !== undefined) {
      id = input.id.trim()
      if (id !== slugify(id)) {
        throw new ValidationError(`Invalid collection id: ${input.id}`, {
          id: input.id,
          hint: 'Use lowercase letters, digits, "-" and "_"',
        })
      }
    } else {
      id = uniqueSlug(slugBase(input.source, input.kind, input.name), (candidate) =>
        Boolean(findStmt.get({ id: candidate })),
      )
    }

    const params = {
      id,
      kind: input.kind,
      source: input.source,
      name: input.name?.trim() || basename(input.source) || id,
      tags: JSON.stringify(normalizeTags(input.tags)),
    }

    if (findStmt.get({ id })) {
      if (!input.replace) {
        throw new ConflictError(`Collection already exists: ${id}`, { id })
      }
      replaceStmt.run(params)
    } else {
      insertStmt.run(params)
    }

    const stored = find(id)
    if (!stored) throw new NotFoundError(`Collection not found: ${id}`, { id })
    return stored
  })

  const removeTx = db.transaction((id: string): void => {
    if (deleteStmt.run({ id }).changes === 0) {
      throw new NotFoundError(`Collection not found: ${id}`, { id })
    }
  })

  return {
    add(input) {
      return addTx.immediate(input)
    },

    remove(id) {
      removeTx.immediate(id)
    },

    get(id) {
      const collection = find(id)
      if (!collection) {
        throw new NotFoundError(`Collection not found: ${id}`, { id })
      }
      return collection
    },

    find,

    list() {
      return listStmt.all().map(rowToCollection)
    },

    close() {
      db.close()
    },
  }
}
