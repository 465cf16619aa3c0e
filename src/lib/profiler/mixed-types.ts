/**
 * Mixed Type Detection
 *
 * Flags columns whose non-null cells hold more than one value kind.
 */

import type { CellKind, Column, MixedTypeColumn, Table } from '@/types'

type ValueKind = Exclude<CellKind, 'null'>

/**
 * Distinct kinds among a column's non-null cells, in first-seen order.
 *
 * Integers count as floats in a column that also holds floats: a numeric
 * column written with and without decimals is one numeric kind.
 */
export function columnKinds(column: Column): ValueKind[] {
  const hasFloat = column.cells.some((cell) => cell.kind === 'float')
  const kinds: ValueKind[] = []

  for (const cell of column.cells) {
    if (cell.kind === 'null') continue
    const kind: ValueKind = cell.kind === 'integer' && hasFloat ? 'float' : cell.kind
    if (!kinds.includes(kind)) {
      kinds.push(kind)
    }
  }

  return kinds
}

export function findMixedTypes(table: Table): MixedTypeColumn[] {
  const mixed: MixedTypeColumn[] = []

  for (const column of table.columns) {
    const kinds = columnKinds(column)
    if (kinds.length > 1) {
      mixed.push({ column: column.name, kinds })
    }
  }

  return mixed
}
