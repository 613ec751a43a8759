import { gzip, gunzip } from 'node:zlib'
import { promisify } from 'node:util'
import { DecodeError } from '../errors/catalog.js'
import type { Encoding } from './types.js'

const gzipAsync = promisify(gzip)
const gunzipAsync = promisify(gunzip)

const GZIP_MAGIC = [0x1f, 0x8b] as const
/** base64 of the gzip magic plus deflate method byte */
const BASE64_GZIP_PREFIX = 'H4sI'
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/

export type TransportKind = 'text' | 'gzip' | 'base64'

export interface DecodedBundle {
  text: string
  transport: TransportKind
}

/**
 * Wrap the textual bundle for storage. Text modes are written as UTF-8;
 * gzip compresses it; base64 is the gzip bytes in base64.
 */
export async function encodeTransport(text: string, encoding: Encoding): Promise<Buffer> {
  const utf8 = Buffer.from(text, 'utf-8')
  switch (encoding.kind) {
    case 'gzip':
      return gzipAsync(utf8)
    case 'base64': {
      const compressed = await gzipAsync(utf8)
      return Buffer.from(compressed.toString('base64'), 'ascii')
    }
    default:
      return utf8
  }
}

function isGzip(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1]
}

function decodeUtf8(bytes: Uint8Array, what: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
  } catch (err) {
    throw new DecodeError(`${what} is not valid UTF-8`, {
      reason: err instanceof Error ? err.message : String(err),
    })
  }
}

async function gunzipText(bytes: Uint8Array, transport: TransportKind): Promise<DecodedBundle> {
  let inflated: Buffer
  try {
    inflated = await gunzipAsync(bytes)
  } catch (err) {
    throw new DecodeError('Bundle gzip stream is corrupt', {
      transport,
      reason: err instanceof Error ? err.message : String(err),
    })
  }
  return { text: decodeUtf8(inflated, 'Decompressed bundle'), transport }
}

/**
 * Recover the textual bundle from stored bytes, detecting gzip by its magic
 * number and base64-of-gzip by its prefix. Anything else must be UTF-8 text.
 */
export async function decodeTransport(bytes: Uint8Array): Promise<DecodedBundle> {
  if (isGzip(bytes)) return gunzipText(bytes, 'gzip')

  const text = decodeUtf8(bytes, 'Bundle')
  const compact = text.trim()
  if (compact.startsWith(BASE64_GZIP_PREFIX)) {
    const joined = compact.replace(/\s+/g, '')
    if (!BASE64_PATTERN.test(joined)) {
      throw new DecodeError('Bundle looks like base64 but contains invalid characters')
    }
    return gunzipText(Buffer.from(joined, 'base64'), 'base64')
  }
  return { text, transport: 'text' }
}
