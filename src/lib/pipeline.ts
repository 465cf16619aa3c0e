/**
 * Analysis pipeline: load → profile → clean → report, once per file.
 */

import { runCleaning } from '@/lib/cleaner'
import { loadTable } from '@/lib/loader'
import { profileTable } from '@/lib/profiler'
import { publishReport } from '@/lib/report'
import type { PipelineResult, RunContext } from '@/types'

/**
 * Analyse one file. Load failures end the run before anything is written;
 * write failures are recovered inside the reporter.
 */
export function analyzeFile(filePath: string, context: RunContext): PipelineResult {
  const loaded = loadTable(filePath, { delimiter: context.delimiter })
  if (!loaded.success) {
    return { success: false, error: loaded.error }
  }

  const { table, source } = loaded.loaded
  const profile = profileTable(table)
  const cleaning = runCleaning(table, context.autoclean)

  const published = publishReport({ source, profile, cleaning }, context)

  return { success: true, ...published }
}
