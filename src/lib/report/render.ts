/**
 * Fixed-layout text rendering of an analysis report.
 * Labels and line order are part of the output format; keep them stable.
 */

import { DUPLICATE_INDEX_DISPLAY_LIMIT, REPORT_RULE_WIDTH } from '@/lib/constants'
import type { AnalysisReport, ArtifactStatus } from '@/types'

const RULE = '─'.repeat(REPORT_RULE_WIDTH)

function formatColumnList(entries: readonly { column: string; detail: string }[]): string {
  if (entries.length === 0) return 'None'
  const items = entries.map((entry) => `${entry.column} (${entry.detail})`)
  return `${entries.length} columns → [${items.join(', ')}]`
}

export function formatDuplicateIndices(count: number, indices: readonly number[]): string {
  if (count === 0) return 'none'
  const shown = indices.slice(0, DUPLICATE_INDEX_DISPLAY_LIMIT).join(', ')
  return count > DUPLICATE_INDEX_DISPLAY_LIMIT ? `${shown}, ...` : shown
}

export function formatArtifact(artifact: ArtifactStatus): string {
  switch (artifact.status) {
    case 'saved':
      return artifact.path
    case 'skipped':
      return 'Skipped'
    case 'not_saved':
      return `Not saved (${artifact.reason})`
  }
}

export function renderReport(report: AnalysisReport): string {
  const missing = formatColumnList(
    report.missing.map((entry) => ({ column: entry.column, detail: String(entry.count) }))
  )
  const mixed = formatColumnList(
    report.mixedTypes.map((entry) => ({ column: entry.column, detail: entry.kinds.join(', ') }))
  )
  const outliers = formatColumnList(
    report.outliers.map((entry) => ({ column: entry.column, detail: String(entry.count) }))
  )
  const duplicates = `${report.duplicateCount} rows (indices: ${formatDuplicateIndices(
    report.duplicateCount,
    report.duplicateIndices
  )})`

  const lines = [
    RULE,
    '   MICRO DATA CLEANER – ANALYSIS REPORT',
    RULE,
    `File scanned              :  ${report.fileName}`,
    `File size (KB)            :  ${report.fileSizeKB}`,
    `Total rows                :  ${report.totalRows}`,
    `Total columns              :  ${report.totalColumns}`,
    RULE,
    `Missing Values            :  ${missing}`,
    `Duplicate Entries         :  ${duplicates}`,
    `Mixed Data Types          :  ${mixed}`,
    `Outliers Detected         :  ${outliers}`,
    RULE,
    'Effective Data (after cleaning):',
    `   Unique rows retained   :  ${report.uniqueRows}`,
    `   Rows after cleaning    :  ${report.cleanedRows ?? 'Skipped'}`,
    `   Worthy data ratio      :  ${report.worthyRatio}%`,
    RULE,
    `Report saved as           :  ${formatArtifact(report.report)}`,
    `Cleaned dataset           :  ${formatArtifact(report.cleaned)}`,
    RULE,
  ]

  return lines.join('\n')
}
