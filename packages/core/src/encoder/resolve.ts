import { ValidationError } from '../errors/catalog.js'
import type { Encoding, EncodingFlags, TextMode } from './types.js'

const TEXT_ENCODINGS: Record<TextMode, Encoding> = {
  plain: { kind: 'plain' },
  compressed: { kind: 'compressed' },
  'max-compressed': { kind: 'max-compressed' },
}

/**
 * Turn pack flags into an encoding. maxCompress implies compress. base64 is
 * only accepted on top of gzip.
 */
export function resolveEncoding(flags: EncodingFlags): Encoding {
  const text: TextMode = flags.maxCompress
    ? 'max-compressed'
    : flags.compress
      ? 'compressed'
      : 'plain'

  if (flags.base64 && !flags.gzip) {
    throw new ValidationError('base64 encoding requires gzip', {
      gzip: false,
      base64: true,
    })
  }
  if (flags.base64) return { kind: 'base64', text }
  if (flags.gzip) return { kind: 'gzip', text }
  return TEXT_ENCODINGS[text]
}

export function textModeOf(encoding: Encoding): TextMode {
  switch (encoding.kind) {
    case 'gzip':
    case 'base64':
      return encoding.text
    default:
      return encoding.kind
  }
}
