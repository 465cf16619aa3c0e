/**
 * Loader
 *
 * Reads a delimited text file into an in-memory table. Expected failures
 * (missing file, empty input, parse errors) are returned as results rather
 * than thrown.
 */

import { readFileSync, statSync } from 'node:fs'
import { basename, resolve } from 'node:path'
import { parse } from 'csv-parse/sync'
import { inferCell } from '@/lib/cell-values'
import { decodeText, detectDelimiter, previewLines, type Delimiter } from '@/lib/fileUtils'
import { createTable } from '@/lib/table'
import { roundTo } from '@/lib/utils/stats'
import type { CellValue, DataCleanerError, DataCleanerErrorKind, LoadResult } from '@/types'

export interface LoadOptions {
  /** Skip detection and split on this delimiter */
  delimiter?: Delimiter
}

function isCellValue(value: unknown): value is CellValue {
  return typeof value === 'object' && value !== null && 'kind' in value && 'raw' in value
}

function isCellRow(value: unknown): value is CellValue[] {
  return Array.isArray(value) && value.every(isCellValue)
}

function failure(kind: DataCleanerErrorKind, message: string, path: string): LoadResult {
  const error: DataCleanerError = { kind, message, path }
  return { success: false, error }
}

/**
 * Resolve column names from the header row. Blank names become
 * `Unnamed: <index>`; repeated names are rejected.
 */
function resolveColumnNames(header: CellValue[]): { names: string[] } | { duplicate: string } {
  const names: string[] = []
  const seen = new Set<string>()

  for (const [index, cell] of header.entries()) {
    const name = cell.raw.trim() === '' ? `Unnamed: ${index}` : cell.raw
    if (seen.has(name)) {
      return { duplicate: name }
    }
    seen.add(name)
    names.push(name)
  }

  return { names }
}

/**
 * Load a delimited file into a table.
 *
 * @param filePath - Path to the input file
 * @param options - Optional delimiter override
 */
export function loadTable(filePath: string, options: LoadOptions = {}): LoadResult {
  const path = resolve(filePath)
  const fileName = basename(path)

  let buffer: Buffer
  try {
    const stats = statSync(path)
    if (!stats.isFile()) {
      return failure('NotFound', `Not a regular file: ${path}`, path)
    }
    buffer = readFileSync(path)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    return failure('NotFound', `Cannot read file: ${reason}`, path)
  }

  const { text, encoding } = decodeText(buffer)
  if (encoding === 'latin-1') {
    console.warn(`[Loader] ${fileName} is not valid UTF-8, decoded as Latin-1`)
  }

  if (text.trim() === '') {
    return failure('EmptyInput', 'File is empty', path)
  }

  const delimiter = options.delimiter ?? detectDelimiter(previewLines(text))

  let records: unknown
  try {
    records = parse(text, {
      delimiter,
      bom: true,
      skip_empty_lines: true,
      cast: (value, context) => inferCell(value, context.quoting),
    })
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    return failure('MalformedInput', `Could not parse ${fileName}: ${reason}`, path)
  }

  if (!Array.isArray(records) || !records.every(isCellRow)) {
    return failure('MalformedInput', `Could not parse ${fileName}: unexpected record shape`, path)
  }

  const [header, ...rows] = records
  if (header === undefined) {
    return failure('EmptyInput', 'File is empty', path)
  }
  if (rows.length === 0) {
    return failure('EmptyInput', 'File has a header but no data rows', path)
  }

  const resolved = resolveColumnNames(header)
  if ('duplicate' in resolved) {
    return failure('MalformedInput', `Duplicate column name "${resolved.duplicate}"`, path)
  }

  const table = createTable(resolved.names, rows)
  const sizeBytes = buffer.byteLength

  console.log(
    `[Loader] ${fileName}: ${table.rowCount} rows, ${table.columns.length} columns ` +
      `(${encoding}, delimiter ${JSON.stringify(delimiter)})`
  )

  return {
    success: true,
    loaded: {
      table,
      source: {
        path,
        fileName,
        sizeBytes,
        sizeKB: roundTo(sizeBytes / 1024, 2),
        encoding,
        delimiter,
      },
    },
  }
}
