/**
 * Outlier Detection (IQR method)
 *
 * Numeric columns only. Quartiles come from non-null values; a column whose
 * interquartile range is zero is not checked.
 */

import { isNumeric } from '@/lib/cell-values'
import { IQR_MULTIPLIER } from '@/lib/constants'
import { quantile } from '@/lib/utils/stats'
import type { Column, OutlierBounds, OutlierColumn, Table } from '@/types'

/**
 * A column is numeric when every cell is an integer, float or null and at
 * least one cell is not null. Booleans are not numeric.
 */
export function isNumericColumn(column: Column): boolean {
  let hasValue = false
  for (const cell of column.cells) {
    if (cell.kind === 'null') continue
    if (!isNumeric(cell)) return false
    hasValue = true
  }
  return hasValue
}

function numericValues(column: Column): number[] {
  const values: number[] = []
  for (const cell of column.cells) {
    if (isNumeric(cell)) {
      values.push(cell.value)
    }
  }
  return values
}

/**
 * IQR bounds for a set of values, or null when the IQR is zero
 */
export function computeBounds(values: readonly number[]): OutlierBounds | null {
  if (values.length === 0) return null

  const sorted = [...values].sort((a, b) => a - b)
  const q1 = quantile(sorted, 0.25)
  const q3 = quantile(sorted, 0.75)
  const iqr = q3 - q1

  if (!(iqr > 0)) return null

  return {
    q1,
    q3,
    iqr,
    lower: q1 - IQR_MULTIPLIER * iqr,
    upper: q3 + IQR_MULTIPLIER * iqr,
  }
}

/**
 * Outlier count and bounds for one column; null for non-numeric or
 * zero-IQR columns
 */
export function detectColumnOutliers(column: Column): OutlierColumn | null {
  if (!isNumericColumn(column)) return null

  const values = numericValues(column)
  const bounds = computeBounds(values)
  if (!bounds) return null

  const count = values.filter((v) => v < bounds.lower || v > bounds.upper).length

  return { column: column.name, count, bounds }
}

/**
 * Numeric columns with at least one value outside their IQR bounds
 */
export function findOutliers(table: Table): OutlierColumn[] {
  const outliers: OutlierColumn[] = []

  for (const column of table.columns) {
    const result = detectColumnOutliers(column)
    if (result && result.count > 0) {
      outliers.push(result)
    }
  }

  return outliers
}
