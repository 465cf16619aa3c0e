import { roundTo } from '@/lib/utils/stats'

/**
 * Share of rows that are not duplicates of an earlier row, as a percentage
 * rounded to 2 decimals. Zero rows yields 0.
 */
export function computeWorthyRatio(uniqueRows: number, totalRows: number): number {
  if (totalRows <= 0) return 0
  return roundTo((uniqueRows / totalRows) * 100, 2)
}
