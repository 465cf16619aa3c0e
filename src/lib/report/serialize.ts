/**
 * Table serialisation for the cleaned dataset
 */

import { inferCell } from '@/lib/cell-values'
import type { Delimiter } from '@/lib/fileUtils'
import { getColumnNames, getRow } from '@/lib/table'
import type { CellValue, Table } from '@/types'

/**
 * Escape a field for delimited output
 */
function escapeField(value: string, delimiter: Delimiter, forceQuotes = false): string {
  if (
    forceQuotes ||
    value.includes(delimiter) ||
    value.includes('"') ||
    value.includes('\n') ||
    value.includes('\r')
  ) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

/**
 * Text cells that would read back as another kind (a number, boolean or null
 * token) are quoted, so reloading the output yields the same kinds.
 */
function serializeCell(cell: CellValue, delimiter: Delimiter): string {
  if (cell.kind === 'null') return ''
  if (cell.kind === 'text') {
    const rereadKind = inferCell(cell.raw, false).kind
    return escapeField(cell.raw, delimiter, rereadKind !== 'text')
  }
  return escapeField(cell.raw, delimiter)
}

/**
 * Header line followed by one line per row, newline terminated
 */
export function serializeTable(table: Table, delimiter: Delimiter): string {
  const lines = [getColumnNames(table).map((name) => escapeField(name, delimiter)).join(delimiter)]

  for (let rowIndex = 0; rowIndex < table.rowCount; rowIndex++) {
    lines.push(getRow(table, rowIndex).map((cell) => serializeCell(cell, delimiter)).join(delimiter))
  }

  return lines.join('\n') + '\n'
}
