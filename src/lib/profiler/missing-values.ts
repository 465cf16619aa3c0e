import { isNull } from '@/lib/cell-values'
import type { MissingColumn, Table } from '@/types'

/**
 * Null count per column, in column order
 */
export function countMissing(table: Table): MissingColumn[] {
  return table.columns.map((column) => ({
    column: column.name,
    count: column.cells.filter(isNull).length,
  }))
}

/**
 * Columns holding at least one null cell, in column order
 */
export function findMissingValues(table: Table): MissingColumn[] {
  return countMissing(table).filter((entry) => entry.count > 0)
}
