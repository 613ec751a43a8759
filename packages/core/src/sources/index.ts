export { openSource } from './open.js'
export { sliceLines, validateLineRange, type LineSlice } from './lines.js'
export type { CollectionSource, OpenSourceOptions } from './types.js'
