/**
 * Date Utility Functions
 */

function pad2(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * Sortable local-time stamp for output file names: `YYYY-MM-DD_HH-mm-ss`
 */
export function formatRunTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`
  const time = `${pad2(date.getHours())}-${pad2(date.getMinutes())}-${pad2(date.getSeconds())}`
  return `${day}_${time}`
}
