import { describe, it, expect } from 'vitest'
import { searchFiles } from './engine.js'
import { closestGap, parseQuery, scoreLine } from './score.js'

describe('closestGap', () => {
  it('finds the nearest pair across two sorted lists', () => {
    expect(closestGap([1, 10, 30], [5, 28, 50])).toBe(2)
    expect(closestGap([100], [0, 40, 95])).toBe(5)
    expect(closestGap([7], [7])).toBe(0)
  })

  it('is infinite when either list is empty', () => {
    expect(closestGap([], [1, 2])).toBe(Infinity)
  })
})

describe('scoreLine', () => {
  it('adds proximity for distinct terms close together', () => {
    // 2 terms x 100 + 2 occurrences x 5 + floor((40 - 4) * 49 / 40)
    expect(scoreLine('foo bar', parseQuery('foo baz bar'))?.score).toBe(200 + 10 + 44)
  })

  it('scores a very long line in linear time', () => {
    const line = 'a=b;'.repeat(30_000)
    const started = Date.now()

    const results = searchFiles('min', [{ path: 'bundle.min.js', content: line }], 'a b')

    expect(Date.now() - started).toBeLessThan(1000)
    expect(results).toHaveLength(1)
    // 2 terms x 100 + 19 capped occurrences x 5 + floor((40 - 2) * 49 / 40)
    expect(results[0].score).toBe(200 + 95 + 46)
  })
})
