import { describe, it, expect } from 'vitest'
import { commentSyntaxFor, stripComments } from './comments.js'
import { applyTextMode } from './text.js'

const maxCompress = (content: string, path: string) =>
  applyTextMode(content, path, 'max-compressed')

describe('stripComments', () => {
  it('removes C-style comments but keeps strings and template literals', () => {
    const source = [
      '// header comment',
      'const url = "http://example.com" // trailing',
      '/* block',
      '   spanning */',
      "const s = '/* not a comment */'",
      'const t = `line one',
      '// still template`',
      'function f() { return 1 /* inline */ + 2 }',
      '',
    ].join('\n')

    expect(maxCompress(source, 'src/app.ts')).toBe(
      [
        'const url = "http://example.com"',
        "const s = '/* not a comment */'",
        'const t = `line one',
        '// still template`',
        'function f() { return 1  + 2 }',
      ].join('\n'),
    )
  })

  it('keeps escaped quotes inside strings', () => {
    const source = 'const q = "say \\"hi\\" // here" // gone\n'
    expect(maxCompress(source, 'q.js')).toBe('const q = "say \\"hi\\" // here"')
  })

  it('keeps the shebang, docstrings and hashes inside Python strings', () => {
    const source = [
      '#!/usr/bin/env python3',
      '# module comment',
      'def greet(name):',
      '    """Say hi # not a comment"""',
      '    print("hello # world")  # trailing',
      "    return f'{name}#x'",
      '',
    ].join('\n')

    expect(maxCompress(source, 'tools/greet.py')).toBe(
      [
        '#!/usr/bin/env python3',
        'def greet(name):',
        '    """Say hi # not a comment"""',
        '    print("hello # world")',
        "    return f'{name}#x'",
      ].join('\n'),
    )
  })

  it('only treats # after whitespace as a comment in YAML', () => {
    expect(maxCompress('url: http://example.com/#anchor  # note\n', 'config.yaml')).toBe(
      'url: http://example.com/#anchor',
    )
  })

  it('strips SQL line comments outside string literals', () => {
    expect(maxCompress("SELECT '--not' AS x -- comment\n", 'query.sql')).toBe(
      "SELECT '--not' AS x",
    )
  })

  it('strips only block comments in CSS', () => {
    const source = [
      'a { color: red; } /* note */',
      '/* only */',
      'b { background: url("//cdn/x.png"); }',
    ].join('\n')
    expect(maxCompress(source, 'site.css')).toBe(
      'a { color: red; }\nb { background: url("//cdn/x.png"); }',
    )
  })

  it('strips markup comments in Markdown', () => {
    expect(maxCompress('Text <!-- hidden -->\n<!-- whole line -->\nMore\n', 'README.md')).toBe(
      'Text\nMore',
    )
  })

  it('handles Lua block comments before line comments', () => {
    expect(maxCompress('--[[ block\ncomment ]]\nlocal x = 1 -- one\n', 'init.lua')).toBe(
      'local x = 1',
    )
  })

  it('leaves files of unknown type untouched', () => {
    const source = 'keep // this\n# and this\n'
    expect(stripComments(source, 'notes.txt')).toBe(source)
  })

  it('never drops lines that carry code', () => {
    const source = 'x = 1 # set\ny = 2\n'
    const stripped = stripComments(source, 'a.py')
    expect(stripped).toBe('x = 1 \ny = 2\n')
  })
})

describe('commentSyntaxFor', () => {
  it('resolves by extension and by well-known filename', () => {
    expect(commentSyntaxFor('a/b/C.TS')).toBeDefined()
    expect(commentSyntaxFor('Dockerfile')).toBeDefined()
    expect(commentSyntaxFor('LICENSE')).toBeUndefined()
    expect(commentSyntaxFor('data.bin')).toBeUndefined()
  })
})
