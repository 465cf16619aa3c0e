/**
 * Shared Constants
 *
 * Constants used across the loader, profiler and reporter.
 */

/**
 * Multiplier applied to the interquartile range when deriving outlier bounds.
 *
 * Used by:
 * - profiler/outliers.ts: [Q1 - k*IQR, Q3 + k*IQR]
 */
export const IQR_MULTIPLIER = 1.5

/**
 * Number of duplicate row indices shown in the report before the ellipsis.
 * The duplicate count itself is never truncated.
 */
export const DUPLICATE_INDEX_DISPLAY_LIMIT = 10

/**
 * Lines read from the top of a file when guessing its delimiter.
 */
export const DELIMITER_PREVIEW_LINES = 50

/**
 * Unquoted field values read as missing, on top of the empty string.
 * Matches the default missing-value markers of common dataframe readers.
 */
export const NULL_TOKENS: ReadonlySet<string> = new Set([
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
])

/**
 * Width of the horizontal rules framing each report section.
 */
export const REPORT_RULE_WIDTH = 46

/**
 * File extensions offered when scanning a directory for input files.
 */
export const DELIMITED_FILE_EXTENSIONS = ['.csv', '.tsv', '.txt'] as const
