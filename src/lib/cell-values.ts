/**
 * Cell Values
 *
 * Per-cell type inference for parsed fields, plus the value identity used to
 * compare rows. A column is never forced to a single declared type; each cell
 * carries its own kind so that mixed-type columns stay observable.
 */

import { NULL_TOKENS } from '@/lib/constants'
import type { CellValue, NumericCell } from '@/types'

const INTEGER_PATTERN = /^[+-]?\d+$/
const FLOAT_PATTERN = /^[+-]?(\d+\.\d*|\.\d+|\d+)([eE][+-]?\d+)?$/
const BOOLEAN_PATTERN = /^(true|false)$/i

/**
 * Infer the kind of a single field.
 *
 * Quoted fields are always text unless empty. Unquoted fields are checked for
 * null tokens, booleans, integers and floats in that order.
 *
 * @param raw - Field text with surrounding quotes already removed
 * @param quoted - Whether the field was enclosed in quotes in the source
 */
export function inferCell(raw: string, quoted: boolean): CellValue {
  if (raw === '') return { kind: 'null', raw }
  if (quoted) return { kind: 'text', value: raw, raw }

  const trimmed = raw.trim()

  if (trimmed === '' || NULL_TOKENS.has(trimmed)) {
    return { kind: 'null', raw }
  }

  if (BOOLEAN_PATTERN.test(trimmed)) {
    return { kind: 'boolean', value: trimmed.toLowerCase() === 'true', raw }
  }

  if (INTEGER_PATTERN.test(trimmed)) {
    const value = Number(trimmed)
    if (Number.isSafeInteger(value)) {
      return { kind: 'integer', value, raw }
    }
    return { kind: 'float', value, raw }
  }

  if (FLOAT_PATTERN.test(trimmed)) {
    const value = Number(trimmed)
    if (Number.isFinite(value)) {
      return { kind: 'float', value, raw }
    }
  }

  return { kind: 'text', value: raw, raw }
}

export function isNull(cell: CellValue): cell is Extract<CellValue, { kind: 'null' }> {
  return cell.kind === 'null'
}

export function isNumeric(cell: CellValue): cell is NumericCell {
  return cell.kind === 'integer' || cell.kind === 'float'
}

/**
 * Value identity of a cell for row comparison.
 *
 * Integers and floats share a numeric key so `1` and `1.0` match; text `"1"`
 * stays distinct from the number `1`. All nulls share one key.
 */
export function cellKey(cell: CellValue): string {
  switch (cell.kind) {
    case 'null':
      return 'null'
    case 'integer':
    case 'float':
      // -0 and 0 are the same value
      return `num:${cell.value === 0 ? 0 : cell.value}`
    case 'boolean':
      return `bool:${cell.value}`
    case 'text':
      return `text:${cell.value}`
  }
}

/**
 * Value identity of a whole row
 */
export function rowKey(cells: CellValue[]): string {
  return JSON.stringify(cells.map(cellKey))
}

/**
 * Copy of a cell with no shared storage
 */
export function copyCell(cell: CellValue): CellValue {
  return { ...cell }
}
