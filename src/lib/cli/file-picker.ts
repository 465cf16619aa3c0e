/**
 * Input file selection for interactive runs
 *
 * Lists delimited files in the working directory and resolves the operator's
 * answer (a list number or a path) to an existing, readable file.
 */

import { accessSync, constants, readdirSync, statSync } from 'node:fs'
import { extname, join, resolve } from 'node:path'
import { DELIMITED_FILE_EXTENSIONS } from '@/lib/constants'

/** Asks one question and resolves with the answer, or null at end of input */
export type AskFn = (question: string) => Promise<string | null>

export function isReadableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false
    accessSync(path, constants.R_OK)
    return true
  } catch {
    return false
  }
}

/**
 * Delimited files directly inside a directory, sorted by name
 */
export function findDelimitedFiles(directory: string): string[] {
  let entries: string[]
  try {
    entries = readdirSync(directory)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    console.warn(`[FilePicker] Could not list ${directory}: ${reason}`)
    return []
  }

  const extensions: readonly string[] = DELIMITED_FILE_EXTENSIONS
  return entries
    .filter((name) => extensions.includes(extname(name).toLowerCase()))
    .filter((name) => !name.startsWith('clean_report_'))
    .filter((name) => isReadableFile(join(directory, name)))
    .sort((a, b) => a.localeCompare(b))
}

/**
 * Map an answer to a file path: a 1-based number picks from the candidates,
 * anything else is a path relative to the directory. Null if the result is
 * not a readable file.
 */
export function resolveAnswer(answer: string, candidates: string[], directory: string): string | null {
  const trimmed = answer.trim().replace(/^["']|["']$/g, '')
  if (trimmed === '') return null

  if (/^\d+$/.test(trimmed)) {
    const picked = candidates[Number(trimmed) - 1]
    if (picked !== undefined) {
      return join(directory, picked)
    }
  }

  const path = resolve(directory, trimmed)
  return isReadableFile(path) ? path : null
}

/**
 * Prompt until the answer names a readable file. Resolves with null when the
 * operator gives an empty answer or input ends.
 */
export async function promptForFile(ask: AskFn, directory: string): Promise<string | null> {
  const candidates = findDelimitedFiles(directory)

  if (candidates.length > 0) {
    console.log(`Delimited files in ${directory}:`)
    candidates.forEach((name, index) => {
      console.log(`  ${index + 1}. ${name}`)
    })
  }

  const question =
    candidates.length > 0 ? 'Enter a number or the path of a CSV file: ' : 'Enter path of CSV file: '

  for (;;) {
    const answer = await ask(question)
    if (answer === null || answer.trim() === '') {
      return null
    }

    const path = resolveAnswer(answer, candidates, directory)
    if (path) {
      return path
    }
    console.log(`No readable file at "${answer.trim()}", try again.`)
  }
}
