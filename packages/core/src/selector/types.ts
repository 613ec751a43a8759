export type FileType = 'text' | 'binary'

/** One selected file. Paths are posix-style and relative to the pack root. */
export interface FileEntry {
  path: string
  size: number
  lines: number
  /** SHA-256 hex of the file bytes */
  hash: string
  type: FileType
}

export interface SelectedFile {
  entry: FileEntry
  absolutePath: string
  /** UTF-8 decoded content; null for binary files */
  content: string | null
}

export type SelectionWarningKind =
  | 'symlink-cycle'
  | 'broken-symlink'
  | 'permission-denied'
  | 'unreadable'
  | 'binary-skipped'

export interface SelectionWarning {
  kind: SelectionWarningKind
  path: string
  message: string
}

export interface SelectOptions {
  include?: string[]
  exclude?: string[]
  signal?: AbortSignal
}

export interface SelectionResult {
  root: string
  /** Text and binary files, sorted by path */
  files: SelectedFile[]
  warnings: SelectionWarning[]
}
