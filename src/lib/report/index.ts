/**
 * Reporter
 *
 * Persists the cleaned table and the text report, then echoes the report.
 * Write failures are recovered: they are logged, shown as "Not saved" in the
 * report, and do not stop the other write.
 */

import { buildAnalysisReport, type ReportInput } from './build-report'
import { renderReport } from './render'
import { serializeTable } from './serialize'
import { resolveOutputPaths, writeFileAtomic } from './write'
import type { ArtifactStatus, PublishResult, RunContext } from '@/types'

export { buildAnalysisReport, type ReportInput } from './build-report'
export { renderReport } from './render'
export { serializeTable } from './serialize'
export { resolveOutputPaths, writeFileAtomic } from './write'

export const NO_ROWS_AFTER_CLEANING = 'no rows left after cleaning'

function persistCleanedTable(input: ReportInput, cleanedPath: string): ArtifactStatus {
  const { cleaning, source } = input

  if (cleaning.status === 'skipped') {
    return { status: 'skipped' }
  }

  if (cleaning.table.rowCount === 0) {
    console.warn(`[Reporter] Cleaned dataset is empty, ${cleanedPath} not written`)
    return { status: 'not_saved', reason: NO_ROWS_AFTER_CLEANING }
  }

  const result = writeFileAtomic(cleanedPath, serializeTable(cleaning.table, source.delimiter))
  if (!result.success) {
    console.warn(`[Reporter] Failed to write cleaned dataset ${cleanedPath}: ${result.error.message}`)
    return { status: 'not_saved', reason: result.error.message }
  }

  return { status: 'saved', path: result.path }
}

export function publishReport(input: ReportInput, context: RunContext): PublishResult {
  const paths = resolveOutputPaths(input.source, context)

  const cleaned = persistCleanedTable(input, paths.cleanedPath)

  let report = buildAnalysisReport(input, {
    report: { status: 'saved', path: paths.reportPath },
    cleaned,
  })
  let text = renderReport(report)

  const written = writeFileAtomic(paths.reportPath, text + '\n')
  if (!written.success) {
    console.warn(`[Reporter] Failed to write report ${paths.reportPath}: ${written.error.message}`)
    report = buildAnalysisReport(input, {
      report: { status: 'not_saved', reason: written.error.message },
      cleaned,
    })
    text = renderReport(report)
  }

  console.log(text)

  return {
    report,
    text,
    reportPath: written.success ? written.path : null,
    cleanedPath: cleaned.status === 'saved' ? cleaned.path : null,
  }
}
