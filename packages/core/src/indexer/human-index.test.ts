import { describe, it, expect } from 'vitest'
import { buildHumanIndex, splitHumanIndex, stripHumanIndex } from './human-index.js'
import { DecodeError } from '../errors/catalog.js'

describe('buildHumanIndex', () => {
  it('lists path, size and line count per file', () => {
    expect(
      buildHumanIndex([
        { path: 'a.py', size: 120, lines: 10 },
        { path: 'docs/b.md', size: 40, lines: 5 },
      ]),
    ).toBe(
      '--- FILE INDEX START ---\na.py\t120\t10\ndocs/b.md\t40\t5\n--- FILE INDEX END ---\n\n',
    )
  })

  it('renders an empty index', () => {
    expect(buildHumanIndex([])).toBe('--- FILE INDEX START ---\n--- FILE INDEX END ---\n\n')
  })
})

describe('splitHumanIndex', () => {
  const body = '--- START OF FILE: a.py ---\nx\n--- END OF FILE: a.py ---\n\n'

  it('separates the header rows from the body', () => {
    const header = buildHumanIndex([{ path: 'with\ttab.py', size: 2, lines: 1 }])
    expect(splitHumanIndex(header + body)).toEqual({
      index: [{ path: 'with\ttab.py', size: 2, lines: 1 }],
      body,
    })
  })

  it('returns the text unchanged when there is no header', () => {
    expect(splitHumanIndex(body)).toEqual({ index: null, body })
    expect(stripHumanIndex(body)).toBe(body)
  })

  it('handles an empty header', () => {
    expect(splitHumanIndex(buildHumanIndex([]) + body)).toEqual({ index: [], body })
  })

  it('rejects a header without an end marker', () => {
    expect(() => splitHumanIndex('--- FILE INDEX START ---\na\t1\t1\n')).toThrow(DecodeError)
  })

  it('rejects malformed rows', () => {
    const header = '--- FILE INDEX START ---\nno-tabs-here\n--- FILE INDEX END ---\n\n'
    expect(() => splitHumanIndex(header)).toThrow(DecodeError)
  })
})
