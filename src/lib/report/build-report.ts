import type {
  AnalysisReport,
  ArtifactStatus,
  CleaningOutcome,
  SourceFileInfo,
  TableProfile,
} from '@/types'

export interface ReportInput {
  source: SourceFileInfo
  profile: TableProfile
  cleaning: CleaningOutcome
}

/**
 * Snapshot the profile and cleaning results into a frozen report
 */
export function buildAnalysisReport(
  input: ReportInput,
  artifacts: { report: ArtifactStatus; cleaned: ArtifactStatus }
): AnalysisReport {
  const { source, profile, cleaning } = input

  const report: AnalysisReport = {
    fileName: source.fileName,
    fileSizeKB: source.sizeKB,
    totalRows: profile.rowCount,
    totalColumns: profile.columnCount,
    missing: Object.freeze(profile.missing.map((entry) => ({ ...entry }))),
    duplicateCount: profile.duplicates.count,
    duplicateIndices: Object.freeze([...profile.duplicates.indices]),
    mixedTypes: Object.freeze(
      profile.mixedTypes.map((entry) => ({ column: entry.column, kinds: [...entry.kinds] }))
    ),
    outliers: Object.freeze(
      profile.outliers.map((entry) => ({ ...entry, bounds: { ...entry.bounds } }))
    ),
    uniqueRows: profile.duplicates.uniqueRowCount,
    worthyRatio: profile.worthyRatio,
    cleanedRows: cleaning.status === 'cleaned' ? cleaning.table.rowCount : null,
    report: artifacts.report,
    cleaned: artifacts.cleaned,
  }

  return Object.freeze(report)
}
