import type { PackStats } from '@corpus/core/bundle'

export function formatBytes(bytes: number): string {
  if (bytes >= 1024 ** 3) return `${(bytes / 1024 ** 3).toFixed(1)} GB`
  if (bytes >= 1024 ** 2) return `${(bytes / 1024 ** 2).toFixed(1)} MB`
  if (bytes >= 1024) return `${(bytes / 1024).toFixed(1)} KB`
  return `${bytes} bytes`
}

export function formatPackStats(stats: PackStats): string {
  const ratio = (stats.compressionRatio * 100).toFixed(1)
  return (
    `Stats: ${stats.filesProcessed} files, ${formatBytes(stats.totalBytes)} -> ` +
    `${formatBytes(stats.bundleSize)} (${ratio}% ratio)`
  )
}
