import { describe, it, expect } from 'vitest'
import { parseBundleBody, renderBundleBody, renderFileBlock } from './format.js'
import { DecodeError } from '../errors/catalog.js'

describe('renderFileBlock', () => {
  it('wraps content in start and end markers', () => {
    expect(renderFileBlock({ path: 'src/a.py', content: 'print(1)' })).toBe(
      '--- START OF FILE: src/a.py ---\nprint(1)\n--- END OF FILE: src/a.py ---\n\n',
    )
  })
})

describe('renderBundleBody', () => {
  it('keeps file order and applies the text mode', () => {
    const body = renderBundleBody(
      [
        { path: 'b.txt', content: 'two  \n\n\n' },
        { path: 'a.txt', content: 'one' },
      ],
      'compressed',
    )
    expect(body).toBe(
      '--- START OF FILE: b.txt ---\ntwo\n--- END OF FILE: b.txt ---\n\n' +
        '--- START OF FILE: a.txt ---\none\n--- END OF FILE: a.txt ---\n\n',
    )
  })
})

describe('parseBundleBody', () => {
  it('recovers the exact content of every file', () => {
    const files = [
      { path: 'empty.txt', content: '' },
      { path: 'newline.txt', content: '\n' },
      { path: 'trailing.txt', content: 'a\nb\n' },
      { path: 'plain.txt', content: 'no newline' },
    ]
    expect(parseBundleBody(renderBundleBody(files, 'plain'))).toEqual(files)
  })

  it('ignores end markers that name another file', () => {
    const files = [
      {
        path: 'doc.md',
        content: 'example:\n--- END OF FILE: other.txt ---\ndone',
      },
    ]
    expect(parseBundleBody(renderBundleBody(files, 'plain'))).toEqual(files)
  })

  it('ignores end markers that are not a whole line', () => {
    const files = [{ path: 'x.txt', content: '--- END OF FILE: x.txt --- not really' }]
    expect(parseBundleBody(renderBundleBody(files, 'plain'))).toEqual(files)
  })

  it('skips text outside file blocks', () => {
    const body = 'preamble\n\n--- START OF FILE: a ---\nA\n--- END OF FILE: a ---\n\n'
    expect(parseBundleBody(body)).toEqual([{ path: 'a', content: 'A' }])
  })

  it('rejects a block without an end marker', () => {
    expect(() => parseBundleBody('--- START OF FILE: a ---\ncut off')).toThrow(DecodeError)
  })
})
