import { copyCell } from '@/lib/cell-values'
import type { CellValue, Table } from '@/types'

/**
 * Build a column-oriented table from row-oriented cells.
 * Every row must have one cell per column name.
 */
export function createTable(columnNames: string[], rows: CellValue[][]): Table {
  const columns = columnNames.map((name, colIndex) => ({
    name,
    cells: rows.map((row) => {
      const cell = row[colIndex]
      if (cell === undefined) {
        throw new Error(`Row is missing a value for column "${name}"`)
      }
      return cell
    }),
  }))

  return { columns, rowCount: rows.length }
}

export function getRow(table: Table, rowIndex: number): CellValue[] {
  return table.columns.map((column) => {
    const cell = column.cells[rowIndex]
    if (cell === undefined) {
      throw new Error(`Row ${rowIndex} out of range (table has ${table.rowCount} rows)`)
    }
    return cell
  })
}

/**
 * New table holding only the given rows, in the given order.
 * Row indices of the result are dense from 0; cells are copied.
 */
export function selectRows(table: Table, rowIndices: number[]): Table {
  const columns = table.columns.map((column) => ({
    name: column.name,
    cells: rowIndices.map((rowIndex) => {
      const cell = column.cells[rowIndex]
      if (cell === undefined) {
        throw new Error(`Row ${rowIndex} out of range (table has ${table.rowCount} rows)`)
      }
      return copyCell(cell)
    }),
  }))

  return { columns, rowCount: rowIndices.length }
}

export function getColumnNames(table: Table): string[] {
  return table.columns.map((column) => column.name)
}
