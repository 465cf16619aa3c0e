/**
 * Duplicate Row Detection
 *
 * A row is a duplicate when an earlier row holds the same value in every
 * column. The first occurrence is never flagged. Nulls match other nulls.
 */

import { rowKey } from '@/lib/cell-values'
import { getRow } from '@/lib/table'
import type { DuplicateCensus, Table } from '@/types'

/**
 * Indices of the first occurrence of each distinct row, ascending
 */
export function findFirstOccurrences(table: Table): number[] {
  const seen = new Set<string>()
  const firstOccurrences: number[] = []

  for (let rowIndex = 0; rowIndex < table.rowCount; rowIndex++) {
    const key = rowKey(getRow(table, rowIndex))
    if (!seen.has(key)) {
      seen.add(key)
      firstOccurrences.push(rowIndex)
    }
  }

  return firstOccurrences
}

export function findDuplicateRows(table: Table): DuplicateCensus {
  const seen = new Set<string>()
  const indices: number[] = []

  for (let rowIndex = 0; rowIndex < table.rowCount; rowIndex++) {
    const key = rowKey(getRow(table, rowIndex))
    if (seen.has(key)) {
      indices.push(rowIndex)
    } else {
      seen.add(key)
    }
  }

  return {
    count: indices.length,
    indices,
    uniqueRowCount: seen.size,
  }
}
