import { describe, it, expect } from 'vitest'
import { ValidationError } from '@corpus/core/errors'
import { parseCommandArgs, parseInteger, splitList } from './args.js'

describe('parseCommandArgs', () => {
  it('returns parsed values and positionals', () => {
    const { values, positionals } = parseCommandArgs('demo', {
      args: ['one', '--flag', '-n', '3'],
      options: { flag: { type: 'boolean' }, num: { type: 'string', short: 'n' } },
      allowPositionals: true,
      strict: true,
    })
    expect(values).toEqual({ flag: true, num: '3' })
    expect(positionals).toEqual(['one'])
  })

  it('reports unknown options as a ValidationError naming the command', () => {
    let caught: unknown
    try {
      parseCommandArgs('demo', { args: ['--nope'], options: {}, strict: true })
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(ValidationError)
    expect(caught instanceof ValidationError && caught.message.startsWith('demo: ')).toBe(true)
  })
})

describe('parseInteger', () => {
  it('passes undefined through', () => {
    expect(parseInteger('top-k', undefined)).toBeUndefined()
  })

  it('parses signed integers', () => {
    expect(parseInteger('top-k', '12')).toBe(12)
    expect(parseInteger('top-k', '-4')).toBe(-4)
  })

  it('rejects anything else', () => {
    expect(() => parseInteger('top-k', '1.5')).toThrow('--top-k must be an integer, got "1.5"')
    expect(() => parseInteger('port', 'abc')).toThrow(ValidationError)
  })
})

describe('splitList', () => {
  it('trims items and drops empty ones', () => {
    expect(splitList('a, b,,c ')).toEqual(['a', 'b', 'c'])
    expect(splitList(undefined)).toEqual([])
  })
})
