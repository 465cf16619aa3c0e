/**
 * Command-line options
 *
 * Parsed with node:util and validated with zod into the values a run needs.
 */

import { parseArgs } from 'node:util'
import { resolve } from 'node:path'
import { z } from 'zod'
import { DELIMITERS } from '@/lib/fileUtils'

export const USAGE = `Usage: micro-cleaner [file] [options]

Scan a delimited data file for missing values, duplicate rows, mixed value
types and outliers. Writes a text report and a cleaned copy of the data.

Options:
  --out-dir <dir>      Directory for the report and cleaned file (default: the input's directory)
  --delimiter <char>   Field delimiter: "," ";" "|" or "tab" (default: detected)
  --skip-clean         Do not write the cleaned dataset
  -h, --help           Show this help`

const DELIMITER_ALIASES: Record<string, string> = {
  tab: '\t',
  '\\t': '\t',
  comma: ',',
  semicolon: ';',
  pipe: '|',
}

const cliOptionsSchema = z.object({
  file: z.string().trim().min(1).optional(),
  outDir: z
    .string()
    .trim()
    .min(1, 'Output directory must not be empty')
    .transform((dir) => resolve(dir))
    .optional(),
  delimiter: z
    .preprocess(
      (value) => (typeof value === 'string' ? DELIMITER_ALIASES[value.toLowerCase()] ?? value : value),
      z.enum(DELIMITERS, {
        errorMap: () => ({ message: 'Delimiter must be one of ",", ";", "|" or "tab"' }),
      })
    )
    .optional(),
  skipClean: z.boolean(),
  help: z.boolean(),
})

export type CliOptions = z.infer<typeof cliOptionsSchema>

export type ParseOptionsResult =
  | { success: true; options: CliOptions }
  | { success: false; message: string }

export function parseCliOptions(argv: string[]): ParseOptionsResult {
  let parsed: ReturnType<typeof parseRaw>
  try {
    parsed = parseRaw(argv)
  } catch (error) {
    return { success: false, message: error instanceof Error ? error.message : String(error) }
  }

  const { values, positionals } = parsed
  if (positionals.length > 1) {
    return { success: false, message: 'Only one input file can be analysed per run' }
  }

  const result = cliOptionsSchema.safeParse({
    file: positionals[0],
    outDir: values['out-dir'],
    delimiter: values.delimiter,
    skipClean: values['skip-clean'] ?? false,
    help: values.help ?? false,
  })

  if (!result.success) {
    return { success: false, message: result.error.issues.map((issue) => issue.message).join('; ') }
  }

  return { success: true, options: result.data }
}

function parseRaw(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      'out-dir': { type: 'string' },
      delimiter: { type: 'string' },
      'skip-clean': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  })
}
