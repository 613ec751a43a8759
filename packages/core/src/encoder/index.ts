export { resolveEncoding, textModeOf } from './resolve.js'
export { applyTextMode, compressWhitespace } from './text.js'
export { commentSyntaxFor, stripComments } from './comments.js'
export {
  fileEndMarker,
  fileStartMarker,
  parseBundleBody,
  renderBundleBody,
  renderFileBlock,
} from './format.js'
export { decodeTransport, encodeTransport } from './transport.js'
export type { DecodedBundle, TransportKind } from './transport.js'
export type { BundleFile, Encoding, EncodingFlags, EncodingKind, TextMode } from './types.js'
