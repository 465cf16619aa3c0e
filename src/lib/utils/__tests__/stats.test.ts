import { describe, it, expect } from 'vitest'
import { quantile, roundTo } from '../stats'

describe('quantile', () => {
  it('interpolates between ranks', () => {
    expect(quantile([1, 2, 3, 4], 0.25)).toBe(1.75)
    expect(quantile([1, 2, 3, 4], 0.75)).toBe(3.25)
  })

  it('hits exact ranks', () => {
    expect(quantile([10, 11, 12, 13, 500], 0.25)).toBe(11)
    expect(quantile([10, 11, 12, 13, 500], 0.5)).toBe(12)
  })

  it('returns the only value for a single element', () => {
    expect(quantile([7], 0.75)).toBe(7)
  })

  it('returns NaN for no values', () => {
    expect(quantile([], 0.5)).toBeNaN()
  })
})

describe('roundTo', () => {
  it('rounds to the nearest value', () => {
    expect(roundTo(2.345, 1)).toBe(2.3)
    expect(roundTo(66.666, 2)).toBe(66.67)
    expect(roundTo(-1.006, 2)).toBe(-1.01)
  })

  it('rounds exact ties to even', () => {
    expect(roundTo(0.125, 2)).toBe(0.12)
    expect(roundTo(0.375, 2)).toBe(0.38)
    expect(roundTo(-0.125, 2)).toBe(-0.12)
    expect(roundTo(2.5, 0)).toBe(2)
    expect(roundTo(3.5, 0)).toBe(4)
  })

  it('treats values stored just below a tie as below it', () => {
    // 2.675 is stored as 2.67499999...
    expect(roundTo(2.675, 2)).toBe(2.67)
  })
})
