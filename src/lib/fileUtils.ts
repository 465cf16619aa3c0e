/**
 * File analysis utilities for delimited-text ingestion
 */

import { DELIMITER_PREVIEW_LINES } from '@/lib/constants'
import type { TextEncoding } from '@/types'

export const DELIMITERS = [',', '\t', '|', ';'] as const
export type Delimiter = (typeof DELIMITERS)[number]

export interface DecodedText {
  text: string
  encoding: TextEncoding
}

/**
 * Decode file bytes as UTF-8, falling back to Latin-1 when the bytes are not
 * valid UTF-8. Latin-1 maps every byte to a code point, so the fallback never fails.
 */
export function decodeText(buffer: Uint8Array): DecodedText {
  const utf8Decoder = new TextDecoder('utf-8', { fatal: true })

  try {
    return { text: utf8Decoder.decode(buffer), encoding: 'utf-8' }
  } catch {
    return { text: Buffer.from(buffer).toString('latin1'), encoding: 'latin-1' }
  }
}

/**
 * First N lines of decoded text, for delimiter detection
 */
export function previewLines(text: string, maxLines: number = DELIMITER_PREVIEW_LINES): string[] {
  return text.split(/\r?\n/).slice(0, maxLines)
}

/**
 * Detect the delimiter from the first lines of a file.
 *
 * A delimiter qualifies only when it appears in the header and every complete
 * record in the preview has the header's field count. Among qualifying
 * delimiters the one giving the most fields wins, ties going to the earlier
 * entry of DELIMITERS. Without a qualifying delimiter the one matching the
 * header's field count on the most records is used, then a comma.
 */
export function detectDelimiter(lines: string[]): Delimiter {
  const [header, ...records] = joinRecords(lines)
  if (header === undefined) return ','

  let best: Delimiter = ','
  let bestMatches = -1
  let bestFields = 0

  for (const delimiter of DELIMITERS) {
    const fields = countDelimiter(header, delimiter)
    if (fields === 0) continue

    const matches = records.filter((record) => countDelimiter(record, delimiter) === fields).length
    if (matches > bestMatches || (matches === bestMatches && fields > bestFields)) {
      best = delimiter
      bestMatches = matches
      bestFields = fields
    }
  }

  return best
}

/**
 * Group preview lines into records, joining lines that sit inside a quoted
 * field. A record still open at the end of the preview is dropped.
 */
function joinRecords(lines: string[]): string[] {
  const records: string[] = []
  let pending: string | null = null

  for (const line of lines) {
    const record: string = pending === null ? line : `${pending}\n${line}`
    if (endsInsideQuotes(record)) {
      pending = record
      continue
    }
    pending = null
    if (record.trim().length > 0) {
      records.push(record)
    }
  }

  return records
}

function endsInsideQuotes(record: string): boolean {
  let inQuotes = false
  for (const char of record) {
    if (char === '"') inQuotes = !inQuotes
  }
  return inQuotes
}

/**
 * Occurrences of a delimiter outside quoted fields
 */
function countDelimiter(record: string, delimiter: Delimiter): number {
  let count = 0
  let inQuotes = false

  for (const char of record) {
    if (char === '"') {
      // A doubled quote inside a field toggles twice and leaves the state unchanged
      inQuotes = !inQuotes
    } else if (char === delimiter && !inQuotes) {
      count++
    }
  }

  return count
}

/**
 * Split a file name into stem and extension (extension keeps its leading dot).
 * Dotfiles without a further extension have an empty extension.
 */
export function splitFileName(fileName: string): { stem: string; ext: string } {
  const dot = fileName.lastIndexOf('.')
  if (dot <= 0) return { stem: fileName, ext: '' }
  return { stem: fileName.slice(0, dot), ext: fileName.slice(dot) }
}
