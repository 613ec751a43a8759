import { comparePaths } from '../selector/select.js'
import type { HumanIndexEntry } from './human-index.js'

export const TREE_START = '--- FILE TREE START ---'
export const TREE_END = '--- FILE TREE END ---'

interface TreeNode {
  dirs: Map<string, TreeNode>
  files: Array<{ name: string; size: number; lines: number }>
}

function emptyNode(): TreeNode {
  return { dirs: new Map(), files: [] }
}

function buildTree(entries: readonly HumanIndexEntry[]): TreeNode {
  const root = emptyNode()
  for (const entry of entries) {
    const parts = entry.path.split('/')
    const name = parts.pop() ?? entry.path
    let node = root
    for (const part of parts) {
      let child = node.dirs.get(part)
      if (!child) {
        child = emptyNode()
        node.dirs.set(part, child)
      }
      node = child
    }
    node.files.push({ name, size: entry.size, lines: entry.lines })
  }
  return root
}

function renderNode(node: TreeNode, level: number, depth: number | undefined, rows: string[]): void {
  if (depth !== undefined && level >= depth) return
  const indent = '  '.repeat(level)

  for (const name of [...node.dirs.keys()].sort(comparePaths)) {
    rows.push(`${indent}${name}/`)
    const child = node.dirs.get(name)
    if (child) renderNode(child, level + 1, depth, rows)
  }
  for (const file of [...node.files].sort((a, b) => comparePaths(a.name, b.name))) {
    rows.push(`${indent}${file.name}\t${file.size}\t${file.lines}`)
  }
}

/**
 * Tree-style header: directories first, then files, two spaces of indent per
 * level. `depth` limits how many levels are shown (1 shows only top-level
 * entries). The rows are for reading; decoding skips them.
 */
export function buildTreeIndex(
  entries: readonly HumanIndexEntry[],
  options?: { depth?: number },
): string {
  const rows: string[] = []
  renderNode(buildTree(entries), 0, options?.depth, rows)
  const body = rows.map((row) => `${row}\n`).join('')
  return `${TREE_START}\n${body}${TREE_END}\n\n`
}
