export {
  buildHumanIndex,
  splitHumanIndex,
  stripHumanIndex,
  INDEX_END,
  INDEX_START,
} from './human-index.js'
export type { HumanIndexEntry, SplitBundle } from './human-index.js'
export { buildTreeIndex, TREE_END, TREE_START } from './tree-index.js'
export { buildManifest, parseManifest, serializeManifest } from './manifest.js'
export type { BuildManifestInput } from './manifest.js'
