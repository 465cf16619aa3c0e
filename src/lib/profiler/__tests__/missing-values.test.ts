import { describe, it, expect } from 'vitest'
import { countMissing, findMissingValues } from '../missing-values'
import { makeTable } from '@/test/table-fixtures'

describe('findMissingValues', () => {
  it('lists columns with nulls in column order', () => {
    const table = makeTable(
      ['c', 'a', 'b'],
      [
        [null, '1', 'x'],
        ['2', '1', 'NA'],
        [null, '1', 'y'],
      ]
    )

    expect(findMissingValues(table)).toEqual([
      { column: 'c', count: 2 },
      { column: 'b', count: 1 },
    ])
  })

  it('returns nothing for a complete table', () => {
    const table = makeTable(['a'], [['1'], ['2']])
    expect(findMissingValues(table)).toEqual([])
  })

  it('counts quoted text as present', () => {
    const table = makeTable(['a'], [[{ quoted: 'NA' }]])
    expect(countMissing(table)).toEqual([{ column: 'a', count: 0 }])
  })
})
