import { basename, extname } from 'node:path'
import type { CollectionKind } from './types.js'

export const FALLBACK_SLUG = 'collection'

export function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9_-]/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '')
  return slug || FALLBACK_SLUG
}

const BUNDLE_SUFFIXES = ['.txt.gz', '.txt.b64', '.txt'] as const

function bundleStem(base: string): string {
  const lower = base.toLowerCase()
  const suffix = BUNDLE_SUFFIXES.find((s) => lower.endsWith(s) && lower.length > s.length)
  if (suffix) return base.slice(0, base.length - suffix.length)
  return base.slice(0, base.length - extname(base).length)
}

/** Slug base for a collection: the name, else the source's basename */
export function slugBase(source: string, kind: CollectionKind, name?: string): string {
  if (name?.trim()) return slugify(name)
  const base = basename(source)
  return slugify(kind === 'bundle' ? bundleStem(base) : base)
}

/** `base`, or `base-2`, `base-3`, ... whichever is free first */
export function uniqueSlug(base: string, taken: (id: string) => boolean): string {
  if (!taken(base)) return base
  let counter = 2
  while (taken(`${base}-${counter}`)) counter++
  return `${base}-${counter}`
}
