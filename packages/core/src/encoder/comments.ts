import { basename, extname } from 'node:path'

/**
 * Best-effort comment stripping for max-compressed bundles.
 *
 * This is a lexical heuristic, not a parser. It knows each language family's
 * comment markers and string quotes, never strips inside a recognised string
 * literal, and when unsure it keeps text rather than removing it (an
 * unterminated single-line string runs to the end of its line). Lines that held
 * nothing but comments are dropped; code lines keep their code.
 */

interface CommentSyntax {
  line: readonly string[]
  block: ReadonlyArray<readonly [open: string, close: string]>
  /** Longest delimiters first */
  quotes: readonly string[]
  multilineQuotes: readonly string[]
  /** Line markers only count at line start or after whitespace (`#` in URLs, `$#`) */
  lineMarkerNeedsSpace?: boolean
  keepShebang?: boolean
}

const C_LIKE: CommentSyntax = {
  line: ['//'],
  block: [['/*', '*/']],
  quotes: ['"', "'", '`'],
  multilineQuotes: ['`'],
}

const CSS: CommentSyntax = {
  line: [],
  block: [['/*', '*/']],
  quotes: ['"', "'"],
  multilineQuotes: [],
}

const HASH: CommentSyntax = {
  line: ['#'],
  block: [],
  quotes: ['"""', "'''", '"', "'"],
  multilineQuotes: ['"""', "'''"],
  lineMarkerNeedsSpace: true,
  keepShebang: true,
}

const SQL: CommentSyntax = {
  line: ['--'],
  block: [['/*', '*/']],
  quotes: ["'", '"'],
  multilineQuotes: [],
}

const LUA: CommentSyntax = {
  line: ['--'],
  block: [['--[[', ']]']],
  quotes: ['"', "'"],
  multilineQuotes: [],
}

const HASKELL: CommentSyntax = {
  line: ['--'],
  block: [['{-', '-}']],
  quotes: ['"'],
  multilineQuotes: [],
}

const MARKUP: CommentSyntax = {
  line: [],
  block: [['<!--', '-->']],
  quotes: [],
  multilineQuotes: [],
}

const FAMILIES: ReadonlyArray<readonly [CommentSyntax, readonly string[]]> = [
  [
    C_LIKE,
    [
      'js', 'jsx', 'mjs', 'cjs', 'ts', 'tsx', 'mts', 'cts', 'java', 'c', 'h',
      'cc', 'cpp', 'cxx', 'hpp', 'cs', 'go', 'rs', 'swift', 'kt', 'kts',
      'scala', 'dart', 'php', 'scss', 'less', 'proto', 'jsonc',
    ],
  ],
  [CSS, ['css']],
  [HASH, ['py', 'pyi', 'sh', 'bash', 'zsh', 'rb', 'yaml', 'yml', 'toml', 'r', 'pl', 'cfg', 'ini', 'conf']],
  [SQL, ['sql']],
  [LUA, ['lua']],
  [HASKELL, ['hs']],
  [MARKUP, ['html', 'htm', 'xml', 'svg', 'md', 'markdown', 'vue']],
]

const SYNTAX_BY_EXTENSION = new Map<string, CommentSyntax>(
  FAMILIES.flatMap(([syntax, extensions]) =>
    extensions.map((ext) => [ext, syntax] as const),
  ),
)

const HASH_FILENAMES = new Set(['dockerfile', 'makefile', 'gemfile', 'rakefile'])

export function commentSyntaxFor(path: string): CommentSyntax | undefined {
  const ext = extname(path).slice(1).toLowerCase()
  if (ext) return SYNTAX_BY_EXTENSION.get(ext)
  return HASH_FILENAMES.has(basename(path).toLowerCase()) ? HASH : undefined
}

/** Index just past the string literal opened by `quote` at `start` */
function endOfString(
  content: string,
  start: number,
  quote: string,
  multiline: boolean,
): number {
  let i = start + quote.length
  while (i < content.length) {
    if (content[i] === '\\') {
      i += 2
      continue
    }
    if (content.startsWith(quote, i)) return i + quote.length
    if (content[i] === '\n' && !multiline) return i
    i++
  }
  return content.length
}

export function stripComments(content: string, path: string): string {
  const syntax = commentSyntaxFor(path)
  if (!syntax) return content

  const lines: string[] = []
  let line = ''
  let hadComment = false
  const endLine = (): void => {
    if (!(hadComment && line.trim() === '')) lines.push(line)
    line = ''
    hadComment = false
  }

  let i = 0
  if (syntax.keepShebang && content.startsWith('#!')) {
    const newline = content.indexOf('\n')
    if (newline === -1) return content
    line = content.slice(0, newline)
    i = newline
  }

  while (i < content.length) {
    const ch = content[i]
    if (ch === '\n') {
      endLine()
      i++
      continue
    }

    const block = syntax.block.find(([open]) => content.startsWith(open, i))
    if (block) {
      const [open, close] = block
      const closeAt = content.indexOf(close, i + open.length)
      const end = closeAt === -1 ? content.length : closeAt + close.length
      hadComment = true
      for (let j = i; j < end; j++) {
        if (content[j] === '\n') {
          endLine()
          hadComment = true
        }
      }
      i = end
      continue
    }

    const atLineMarker = syntax.line.some((marker) => content.startsWith(marker, i))
    if (atLineMarker && (!syntax.lineMarkerNeedsSpace || i === 0 || /\s/.test(content[i - 1]))) {
      const newline = content.indexOf('\n', i)
      i = newline === -1 ? content.length : newline
      hadComment = true
      continue
    }

    const quote = syntax.quotes.find((q) => content.startsWith(q, i))
    if (quote) {
      const end = endOfString(content, i, quote, syntax.multilineQuotes.includes(quote))
      const [first, ...rest] = content.slice(i, end).split('\n')
      line += first
      for (const part of rest) {
        endLine()
        line = part
      }
      i = end
      continue
    }

    line += ch
    i++
  }
  endLine()

  return lines.join('\n')
}
