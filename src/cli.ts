#!/usr/bin/env node
import { main } from '@/lib/cli/main'

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    console.error('[MicroCleaner] Unexpected failure:', error)
    process.exitCode = 1
  })
