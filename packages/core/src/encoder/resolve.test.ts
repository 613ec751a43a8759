import { describe, it, expect } from 'vitest'
import { resolveEncoding, textModeOf } from './resolve.js'
import { ValidationError } from '../errors/catalog.js'

describe('resolveEncoding', () => {
  it('defaults to plain', () => {
    expect(resolveEncoding({})).toEqual({ kind: 'plain' })
  })

  it('selects the text modes', () => {
    expect(resolveEncoding({ compress: true })).toEqual({ kind: 'compressed' })
    expect(resolveEncoding({ maxCompress: true })).toEqual({ kind: 'max-compressed' })
  })

  it('lets maxCompress win when both compress flags are set', () => {
    expect(resolveEncoding({ compress: true, maxCompress: true })).toEqual({
      kind: 'max-compressed',
    })
  })

  it('wraps the text mode in gzip and base64', () => {
    expect(resolveEncoding({ gzip: true })).toEqual({ kind: 'gzip', text: 'plain' })
    expect(resolveEncoding({ compress: true, gzip: true, base64: true })).toEqual({
      kind: 'base64',
      text: 'compressed',
    })
  })

  it('rejects base64 without gzip', () => {
    expect(() => resolveEncoding({ base64: true })).toThrow(ValidationError)
    expect(() => resolveEncoding({ base64: true })).toThrow('base64 encoding requires gzip')
  })
})

describe('textModeOf', () => {
  it('reads the wrapped text mode', () => {
    expect(textModeOf({ kind: 'plain' })).toBe('plain')
    expect(textModeOf({ kind: 'gzip', text: 'max-compressed' })).toBe('max-compressed')
  })
})
