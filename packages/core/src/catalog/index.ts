export { createCatalogStore, type CatalogStore } from './store.js'
export { initializeCatalogDatabase } from './schema.js'
export { openCatalog } from './open.js'
export { detectCollectionKind, registerCollection } from './register.js'
export type { RegisterCollectionInput } from './register.js'
export { FALLBACK_SLUG, slugBase, slugify, uniqueSlug } from './slug.js'
export type { AddCollectionInput, Collection, CollectionKind } from './types.js'
