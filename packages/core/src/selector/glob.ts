import picomatch from 'picomatch'
import { ValidationError } from '../errors/catalog.js'

export type PathMatcher = (relativePath: string) => boolean

const PICOMATCH_OPTIONS: picomatch.PicomatchOptions = {
  dot: true,
  strictBrackets: true,
}

/** Suffix that makes a pattern cover a whole subtree */
const SUBTREE_SUFFIX = '/**'

function hasBalancedDelimiters(pattern: string, open: string, close: string): boolean {
  let depth = 0
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i]
    if (ch === '\\') {
      i++
      continue
    }
    if (ch === open) depth++
    else if (ch === close) {
      depth--
      if (depth < 0) return false
    }
  }
  return depth === 0
}

/**
 * Validate a glob pattern. Throws ValidationError naming the pattern.
 */
export function validatePattern(pattern: string): void {
  if (pattern.trim().length === 0) {
    throw new ValidationError('Glob pattern must not be empty', { pattern })
  }
  if (!hasBalancedDelimiters(pattern, '[', ']')) {
    throw new ValidationError(`Unbalanced brackets in glob pattern: ${pattern}`, { pattern })
  }
  if (!hasBalancedDelimiters(pattern, '{', '}')) {
    throw new ValidationError(`Unbalanced braces in glob pattern: ${pattern}`, { pattern })
  }
}

function normalizePattern(pattern: string): string {
  let normalized = pattern.replace(/\\/g, '/')
  while (normalized.startsWith('./')) normalized = normalized.slice(2)
  return normalized
}

function compileOne(pattern: string, source: string, basename: boolean): PathMatcher {
  try {
    return picomatch(source, { ...PICOMATCH_OPTIONS, basename })
  } catch (err) {
    throw new ValidationError(`Invalid glob pattern: ${pattern}`, {
      pattern,
      reason: err instanceof Error ? err.message : String(err),
    })
  }
}

/**
 * Compile a list of patterns into one matcher that is true when any pattern
 * matches. An empty list compiles to a matcher that never matches.
 */
export function compilePatterns(patterns: readonly string[]): PathMatcher {
  if (patterns.length === 0) return () => false

  const matchers = patterns.map((pattern) => {
    validatePattern(pattern)
    const normalized = normalizePattern(pattern)
    // Only slash-free patterns match against the basename ("*.py" hits "src/a.py")
    return compileOne(pattern, normalized, !normalized.includes('/'))
  })

  return (relativePath) => matchers.some((isMatch) => isMatch(relativePath))
}

/**
 * Matcher for directories whose whole subtree is excluded. Only patterns
 * ending in `/**` prune: a directory matching `prefix` or `prefix/**` holds
 * nothing the pattern would let through. Other excludes apply per file.
 */
export function compileSubtreePatterns(patterns: readonly string[]): PathMatcher {
  const matchers: PathMatcher[] = []
  for (const pattern of patterns) {
    const normalized = normalizePattern(pattern)
    if (!normalized.endsWith(SUBTREE_SUFFIX)) continue
    const prefix = normalized.slice(0, -SUBTREE_SUFFIX.length)
    if (prefix === '') continue
    const matchPrefix = compileOne(pattern, prefix, false)
    const matchBelow = compileOne(pattern, normalized, false)
    matchers.push((relativePath) => matchPrefix(relativePath) || matchBelow(relativePath))
  }
  return (relativePath) => matchers.some((isMatch) => isMatch(relativePath))
}

export interface SelectionRules {
  /** True when the file belongs in the selected set */
  includesFile: PathMatcher
  /** True when nothing under a directory can be selected, so the walk skips it */
  excludesDirectory: PathMatcher
}

/**
 * Build include/exclude rules. A file is selected iff it matches at least one
 * include pattern (all files when there are none) and no exclude pattern.
 * Excludes win regardless of pattern order.
 */
export function buildSelectionRules(
  include: readonly string[],
  exclude: readonly string[],
): SelectionRules {
  const isIncluded = include.length === 0 ? () => true : compilePatterns(include)
  const isExcluded = compilePatterns(exclude)
  const isSubtreeExcluded = compileSubtreePatterns(exclude)

  return {
    includesFile: (relativePath) => !isExcluded(relativePath) && isIncluded(relativePath),
    excludesDirectory: isSubtreeExcluded,
  }
}
