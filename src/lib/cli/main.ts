/**
 * Pick a file, run the pipeline once, and map the outcome to an exit status:
 * 0 on success, 1 when the run fails, 2 for invalid options.
 */

import { createInterface } from 'node:readline/promises'
import { promptForFile, type AskFn } from './file-picker'
import { parseCliOptions, USAGE } from './options'
import { analyzeFile } from '@/lib/pipeline'

export interface LinePrompt {
  ask: AskFn
  close: () => void
}

/**
 * One readline interface for every question of a run. Lines are read through
 * its async iterator, which buffers piped lines until a question takes them.
 * End of input answers null.
 */
export function createLinePrompt(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream
): LinePrompt {
  const rl = createInterface({ input, output })
  const lines = rl[Symbol.asyncIterator]()

  return {
    ask: async (question) => {
      rl.setPrompt(question)
      rl.prompt()
      const next = await lines.next()
      return next.done ? null : next.value
    },
    close: () => rl.close(),
  }
}

async function pickFile(ask: AskFn | undefined): Promise<string | null> {
  if (ask) {
    return promptForFile(ask, process.cwd())
  }

  const prompt = createLinePrompt(process.stdin, process.stdout)
  try {
    return await promptForFile(prompt.ask, process.cwd())
  } finally {
    prompt.close()
  }
}

export async function main(argv: string[], ask?: AskFn): Promise<number> {
  const parsed = parseCliOptions(argv)
  if (!parsed.success) {
    console.error(`[MicroCleaner] ${parsed.message}`)
    console.error(USAGE)
    return 2
  }

  const { options } = parsed
  if (options.help) {
    console.log(USAGE)
    return 0
  }

  const filePath = options.file ?? (await pickFile(ask))
  if (!filePath) {
    console.error('[MicroCleaner] No input file selected')
    return 1
  }

  const result = analyzeFile(filePath, {
    now: new Date(),
    targetDir: options.outDir,
    autoclean: !options.skipClean,
    delimiter: options.delimiter,
  })

  if (!result.success) {
    console.error(`[MicroCleaner] ${result.error.kind}: ${result.error.message}`)
    return 1
  }

  return 0
}
