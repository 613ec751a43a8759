export { selectFiles, textFilesOf, countLines, isBinary, comparePaths } from './select.js'
export { buildSelectionRules, compilePatterns, validatePattern } from './glob.js'
export type { PathMatcher, SelectionRules } from './glob.js'
export type {
  FileEntry,
  FileType,
  SelectedFile,
  SelectionResult,
  SelectionWarning,
  SelectionWarningKind,
  SelectOptions,
} from './types.js'
