import type { Delimiter } from '@/lib/fileUtils'

// ===== CELLS & TABLES =====

export type CellKind = 'integer' | 'float' | 'text' | 'boolean' | 'null'

/**
 * A single parsed cell. `raw` is the field text as it appeared in the source
 * (quotes removed), used when the cell is written back out.
 */
export type CellValue =
  | { kind: 'integer'; value: number; raw: string }
  | { kind: 'float'; value: number; raw: string }
  | { kind: 'text'; value: string; raw: string }
  | { kind: 'boolean'; value: boolean; raw: string }
  | { kind: 'null'; raw: string }

export type NumericCell = Extract<CellValue, { kind: 'integer' | 'float' }>

export interface Column {
  name: string
  cells: CellValue[]
}

export interface Table {
  columns: Column[]
  rowCount: number
}

// ===== ERRORS =====

export type DataCleanerErrorKind =
  | 'NotFound'        // Input path missing or unreadable
  | 'EmptyInput'      // No header, or header with zero data rows
  | 'MalformedInput'  // Structural parse failure
  | 'WriteFailure'    // Cleaned table or report could not be written (recovered)

export interface DataCleanerError {
  kind: DataCleanerErrorKind
  message: string
  path: string
}

// ===== LOADER =====

export type TextEncoding = 'utf-8' | 'latin-1'

export interface SourceFileInfo {
  path: string
  fileName: string
  sizeBytes: number
  sizeKB: number
  encoding: TextEncoding
  delimiter: Delimiter
}

export interface LoadedTable {
  table: Table
  source: SourceFileInfo
}

export type LoadResult =
  | { success: true; loaded: LoadedTable }
  | { success: false; error: DataCleanerError }

// ===== PROFILER =====

export interface MissingColumn {
  column: string
  count: number
}

export interface DuplicateCensus {
  count: number
  indices: number[]       // Original row indices, ascending
  uniqueRowCount: number
}

export interface MixedTypeColumn {
  column: string
  kinds: Exclude<CellKind, 'null'>[]  // First-seen order
}

export interface OutlierBounds {
  q1: number
  q3: number
  iqr: number
  lower: number
  upper: number
}

export interface OutlierColumn {
  column: string
  count: number
  bounds: OutlierBounds
}

export interface ColumnProfile {
  name: string
  missingCount: number
  kinds: Exclude<CellKind, 'null'>[]
  isNumeric: boolean
  outlierCount: number
}

export interface TableProfile {
  rowCount: number
  columnCount: number
  missing: MissingColumn[]
  duplicates: DuplicateCensus
  mixedTypes: MixedTypeColumn[]
  outliers: OutlierColumn[]
  worthyRatio: number
  columns: ColumnProfile[]
}

// ===== CLEANER =====

export type CleaningOutcome =
  | { status: 'skipped' }
  | { status: 'cleaned'; table: Table }

// ===== REPORTER =====

export type ArtifactStatus =
  | { status: 'saved'; path: string }
  | { status: 'skipped' }
  | { status: 'not_saved'; reason: string }

export interface AnalysisReport {
  fileName: string
  fileSizeKB: number
  totalRows: number
  totalColumns: number
  missing: readonly MissingColumn[]
  duplicateCount: number
  duplicateIndices: readonly number[]
  mixedTypes: readonly MixedTypeColumn[]
  outliers: readonly OutlierColumn[]
  uniqueRows: number
  worthyRatio: number
  cleanedRows: number | null  // null when cleaning was skipped
  report: ArtifactStatus
  cleaned: ArtifactStatus
}

/**
 * Everything a single run depends on from its environment.
 */
export interface RunContext {
  now: Date
  targetDir?: string        // Defaults to the source file's directory
  autoclean: boolean
  delimiter?: Delimiter     // Overrides detection when set
}

export interface PublishResult {
  report: AnalysisReport
  text: string
  reportPath: string | null
  cleanedPath: string | null
}

export type PipelineResult =
  | ({ success: true } & PublishResult)
  | { success: false; error: DataCleanerError }
