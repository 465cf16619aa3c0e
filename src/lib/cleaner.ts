/**
 * Cleaner
 *
 * Derives a deduplicated, null-free copy of a table: duplicate rows are
 * dropped first (keeping the first occurrence), then every row holding a
 * null. The source table is never modified.
 */

import { isNull } from '@/lib/cell-values'
import { findFirstOccurrences } from '@/lib/profiler'
import { selectRows } from '@/lib/table'
import type { CleaningOutcome, Table } from '@/types'

function rowHasNull(table: Table, rowIndex: number): boolean {
  return table.columns.some((column) => {
    const cell = column.cells[rowIndex]
    return cell !== undefined && isNull(cell)
  })
}

export function cleanTable(table: Table): Table {
  const kept = findFirstOccurrences(table).filter((rowIndex) => !rowHasNull(table, rowIndex))
  return selectRows(table, kept)
}

/**
 * Run the cleaner when autoclean is on. A cleaned table with zero rows is
 * still a `cleaned` outcome.
 */
export function runCleaning(table: Table, autoclean: boolean): CleaningOutcome {
  if (!autoclean) {
    return { status: 'skipped' }
  }
  return { status: 'cleaned', table: cleanTable(table) }
}
