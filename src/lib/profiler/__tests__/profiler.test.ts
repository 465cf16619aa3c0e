import { describe, it, expect } from 'vitest'
import { profileColumns, profileTable } from '../index'
import { makeTable } from '@/test/table-fixtures'

describe('profileTable', () => {
  it('combines every detector for one table', () => {
    // a,b / 1,2 / 1,2 / 3,
    const table = makeTable(['a', 'b'], [['1', '2'], ['1', '2'], ['3', null]])

    expect(profileTable(table)).toEqual({
      rowCount: 3,
      columnCount: 2,
      missing: [{ column: 'b', count: 1 }],
      duplicates: { count: 1, indices: [1], uniqueRowCount: 2 },
      mixedTypes: [],
      outliers: [],
      worthyRatio: 66.67,
      columns: [
        { name: 'a', missingCount: 0, kinds: ['integer'], isNumeric: true, outlierCount: 0 },
        { name: 'b', missingCount: 1, kinds: ['integer'], isNumeric: true, outlierCount: 0 },
      ],
    })
  })

  it('keeps the worthy ratio within 0-100 and at 100 without duplicates', () => {
    const unique = makeTable(['a'], [['1'], ['2'], ['3']])
    const repeated = makeTable(['a'], [['1'], ['1'], ['1'], ['2']])

    expect(profileTable(unique).worthyRatio).toBe(100)
    expect(profileTable(repeated).worthyRatio).toBe(50)
  })
})

describe('profileColumns', () => {
  it('reports kinds and outliers per column', () => {
    const table = makeTable(
      ['id', 'amount'],
      [
        [{ quoted: '1' }, '10'],
        ['2', '12'],
        [{ quoted: '3' }, '11'],
        ['4', '13'],
        ['5', '500'],
      ]
    )

    expect(profileColumns(table)).toEqual([
      { name: 'id', missingCount: 0, kinds: ['text', 'integer'], isNumeric: false, outlierCount: 0 },
      { name: 'amount', missingCount: 0, kinds: ['integer'], isNumeric: true, outlierCount: 1 },
    ])
  })
})
