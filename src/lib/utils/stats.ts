/**
 * Numeric helpers for the profiler
 */

/**
 * Quantile of sorted values by linear interpolation between closest ranks.
 * Position is `(n - 1) * p`; returns NaN for an empty input.
 *
 * @param sorted - Values in ascending order
 * @param p - Quantile in [0, 1]
 */
export function quantile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return NaN

  const position = (sorted.length - 1) * p
  const lowerIndex = Math.floor(position)
  const upperIndex = Math.ceil(position)
  const lower = sorted[lowerIndex] ?? NaN
  const upper = sorted[upperIndex] ?? NaN

  return lower + (upper - lower) * (position - lowerIndex)
}

/**
 * Round to a fixed number of decimals, ties to even.
 *
 * Works on the exact decimal expansion of the double, so only values that are
 * exactly halfway count as ties: 0.125 rounds to 0.12, while 2.675 (stored as
 * 2.67499...) rounds to 2.67.
 */
export function roundTo(value: number, decimals: number): number {
  const magnitude = Math.abs(value)
  if (!Number.isFinite(magnitude) || magnitude >= 1e21) return value

  // toFixed rounds the exact stored value to the nearest, ties upward
  const nearest = Number(magnitude.toFixed(decimals))
  const expansion = magnitude.toFixed(100)
  const cut = expansion.indexOf('.') + 1 + decimals
  const isTie = /^50*$/.test(expansion.slice(cut))

  let rounded = nearest
  if (isTie) {
    const kept = expansion.slice(0, cut)
    const lastDigit = Number(kept.replace('.', '').slice(-1))
    if (lastDigit % 2 === 0) {
      rounded = Number(kept)
    }
  }

  return value < 0 ? -rounded : rounded
}
