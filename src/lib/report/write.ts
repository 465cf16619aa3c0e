/**
 * Output file writing
 *
 * Each artifact is written to a temporary sibling and renamed into place, so
 * an earlier file at the same path is either fully replaced or left untouched.
 */

import { mkdirSync, renameSync, rmSync, writeFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { splitFileName } from '@/lib/fileUtils'
import { formatRunTimestamp } from '@/lib/utils/date'
import type { DataCleanerError, RunContext, SourceFileInfo } from '@/types'

export interface OutputPaths {
  directory: string
  cleanedPath: string
  reportPath: string
}

export type WriteResult =
  | { success: true; path: string }
  | { success: false; error: DataCleanerError }

/**
 * `<stem>_cleaned<ext>` and `clean_report_<stem>_<timestamp>.txt` in the
 * target directory (the source file's directory unless overridden)
 */
export function resolveOutputPaths(source: SourceFileInfo, context: RunContext): OutputPaths {
  const directory = context.targetDir ?? dirname(source.path)
  const { stem, ext } = splitFileName(source.fileName)

  return {
    directory,
    cleanedPath: join(directory, `${stem}_cleaned${ext}`),
    reportPath: join(directory, `clean_report_${stem}_${formatRunTimestamp(context.now)}.txt`),
  }
}

export function writeFileAtomic(path: string, content: string): WriteResult {
  const tempPath = `${path}.${process.pid}.tmp`

  try {
    mkdirSync(dirname(path), { recursive: true })
    writeFileSync(tempPath, content, 'utf-8')
    renameSync(tempPath, path)
    return { success: true, path }
  } catch (error) {
    try {
      rmSync(tempPath, { force: true })
    } catch (cleanupError) {
      const reason = cleanupError instanceof Error ? cleanupError.message : String(cleanupError)
      console.warn(`[Reporter] Could not remove temporary file ${tempPath}: ${reason}`)
    }

    return {
      success: false,
      error: {
        kind: 'WriteFailure',
        message: error instanceof Error ? error.message : String(error),
        path,
      },
    }
  }
}
