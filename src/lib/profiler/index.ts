/**
 * Profiler
 *
 * Runs the independent, read-only detectors over a loaded table and gathers
 * their results into a single profile.
 */

import { countMissing, findMissingValues } from './missing-values'
import { findDuplicateRows } from './duplicates'
import { columnKinds, findMixedTypes } from './mixed-types'
import { detectColumnOutliers, findOutliers, isNumericColumn } from './outliers'
import { computeWorthyRatio } from './worthy-ratio'
import type { ColumnProfile, Table, TableProfile } from '@/types'

export { findMissingValues } from './missing-values'
export { findDuplicateRows, findFirstOccurrences } from './duplicates'
export { findMixedTypes } from './mixed-types'
export { findOutliers } from './outliers'
export { computeWorthyRatio } from './worthy-ratio'

/**
 * Per-column view combining the missing, kind and outlier checks
 */
export function profileColumns(table: Table): ColumnProfile[] {
  const missing = countMissing(table)

  return table.columns.map((column, index) => ({
    name: column.name,
    missingCount: missing[index]?.count ?? 0,
    kinds: columnKinds(column),
    isNumeric: isNumericColumn(column),
    outlierCount: detectColumnOutliers(column)?.count ?? 0,
  }))
}

export function profileTable(table: Table): TableProfile {
  const duplicates = findDuplicateRows(table)

  return {
    rowCount: table.rowCount,
    columnCount: table.columns.length,
    missing: findMissingValues(table),
    duplicates,
    mixedTypes: findMixedTypes(table),
    outliers: findOutliers(table),
    worthyRatio: computeWorthyRatio(duplicates.uniqueRowCount, table.rowCount),
    columns: profileColumns(table),
  }
}
