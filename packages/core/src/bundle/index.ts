export { packCorpus } from './pack.js'
export { findPackPreset, loadPackPreset } from './preset.js'
export { parseBundleText, readBundle } from './read.js'
export type { DecodedBundleFile } from './read.js'
export type { IndexStyle, PackContext, PackOptions, PackResult, PackStats } from './types.js'
