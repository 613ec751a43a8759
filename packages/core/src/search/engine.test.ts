import { describe, it, expect } from 'vitest'
import { resolveTopK, searchFiles } from './engine.js'
import { ValidationError } from '../errors/catalog.js'

function numbered(lines: Record<number, string>, total: number): string {
  return Array.from({ length: total }, (_, i) => lines[i + 1] ?? `filler ${i + 1}`).join('\n')
}

describe('searchFiles', () => {
  const files = [
    { path: 'client.go', content: numbered({ 42: '# connect timeout handling' }, 60) },
    { path: 'util.go', content: numbered({ 7: '# timeout only' }, 20) },
  ]

  it('ranks the line with the full query above partial matches', () => {
    expect(searchFiles('repo', files, 'connect timeout')).toEqual([
      {
        collectionId: 'repo',
        path: 'client.go',
        line: 42,
        snippet: '# connect timeout handling',
        score: 649,
      },
      {
        collectionId: 'repo',
        path: 'util.go',
        line: 7,
        snippet: '# timeout only',
        score: 105,
      },
    ])
  })

  it('returns identical results for repeated queries', () => {
    const first = searchFiles('repo', files, 'timeout')
    const second = searchFiles('repo', files, 'timeout')
    expect(second).toEqual(first)
  })

  it('breaks score ties by path then line', () => {
    const tied = [
      { path: 'b.txt', content: 'alpha\nalpha' },
      { path: 'a.txt', content: 'x\nx\nalpha' },
    ]
    expect(searchFiles('c', tied, 'alpha').map((r) => [r.path, r.line])).toEqual([
      ['a.txt', 3],
      ['b.txt', 1],
      ['b.txt', 2],
    ])
  })

  it('rewards more distinct terms and closer terms', () => {
    const ranked = searchFiles(
      'c',
      [
        {
          path: 'a.txt',
          content: [
            'cache only',
            `cache ${'.'.repeat(60)} eviction`,
            'cache eviction',
            'the eviction policy for the cache',
          ].join('\n'),
        },
      ],
      'cache eviction policy',
    )
    expect(ranked.map((r) => r.line)).toEqual([4, 3, 2, 1])
  })

  it('ignores case unless asked not to', () => {
    const content = [{ path: 'a.md', content: 'Timeout here\ntimeout there' }]
    expect(searchFiles('c', content, 'TIMEOUT').map((r) => r.line)).toEqual([1, 2])
    expect(
      searchFiles('c', content, 'Timeout', { caseSensitive: true }).map((r) => r.line),
    ).toEqual([1])
  })

  it('splits terms on any non-alphanumeric character, including Unicode letters', () => {
    const content = [{ path: 'menu.txt', content: 'Café au lait\ntea' }]
    expect(searchFiles('c', content, 'café!!').map((r) => r.snippet)).toEqual(['Café au lait'])
  })

  it('returns nothing for an empty query', () => {
    expect(searchFiles('repo', files, '')).toEqual([])
    expect(searchFiles('repo', files, '  -- ')).toEqual([])
  })

  it('caps results at top_k', () => {
    const many = [{ path: 'a.txt', content: Array.from({ length: 10 }, () => 'hit').join('\n') }]
    expect(searchFiles('c', many, 'hit', { topK: 3 })).toHaveLength(3)
    expect(searchFiles('c', many, 'hit')).toHaveLength(10)
  })

  it('clips long lines around the first match', () => {
    const late = `${'a'.repeat(250)} needle ${'b'.repeat(42)}`
    const early = `  needle ${'c'.repeat(300)}`
    const [lateResult] = searchFiles('c', [{ path: 'late.txt', content: late }], 'needle')
    const [earlyResult] = searchFiles('c', [{ path: 'early.txt', content: early }], 'needle')

    expect(lateResult?.snippet).toBe(`...${late.slice(100)}`)
    expect(earlyResult?.snippet).toBe(`${early.trim().slice(0, 200)}...`)
  })
})

describe('resolveTopK', () => {
  const limits = { defaultTopK: 50, maxTopK: 500 }

  it('defaults when omitted', () => {
    expect(resolveTopK(undefined, limits)).toBe(50)
  })

  it('rejects values outside 1..max and fractions', () => {
    for (const value of [0, -1, 501, 2.5, Number.NaN]) {
      expect(() => resolveTopK(value, limits)).toThrow(ValidationError)
    }
    expect(resolveTopK(500, limits)).toBe(500)
  })
})
