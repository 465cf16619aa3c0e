import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdirSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { findDelimitedFiles, promptForFile, resolveAnswer, type AskFn } from '../file-picker'
import { makeTempDir, writeFixture } from '@/test/table-fixtures'

function scriptedAsk(answers: (string | null)[]): AskFn {
  const queue = [...answers]
  return vi.fn(async () => (queue.length > 0 ? queue.shift() ?? null : null))
}

describe('file picker', () => {
  let dir: string

  beforeEach(() => {
    dir = makeTempDir()
    writeFixture(dir, 'b.csv', 'a\n1\n')
    writeFixture(dir, 'a.tsv', 'a\n1\n')
    writeFixture(dir, 'notes.md', '# notes')
    writeFixture(dir, 'clean_report_b_2024-01-01_00-00-00.txt', 'report')
    mkdirSync(join(dir, 'folder.csv'))
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  describe('findDelimitedFiles', () => {
    it('lists readable delimited files by name, skipping reports and folders', () => {
      expect(findDelimitedFiles(dir)).toEqual(['a.tsv', 'b.csv'])
    })
  })

  describe('resolveAnswer', () => {
    it('picks a listed file by number', () => {
      expect(resolveAnswer('2', ['a.tsv', 'b.csv'], dir)).toBe(join(dir, 'b.csv'))
    })

    it('accepts a relative or quoted path', () => {
      expect(resolveAnswer('b.csv', [], dir)).toBe(join(dir, 'b.csv'))
      expect(resolveAnswer('"b.csv"', [], dir)).toBe(join(dir, 'b.csv'))
    })

    it('rejects missing files and directories', () => {
      expect(resolveAnswer('missing.csv', [], dir)).toBeNull()
      expect(resolveAnswer('folder.csv', [], dir)).toBeNull()
      expect(resolveAnswer('9', ['a.tsv'], dir)).toBeNull()
    })
  })

  describe('promptForFile', () => {
    it('asks again until the answer is a readable file', async () => {
      const ask = scriptedAsk(['missing.csv', '1'])

      const path = await promptForFile(ask, dir)

      expect(path).toBe(join(dir, 'a.tsv'))
      expect(ask).toHaveBeenCalledTimes(2)
      expect(console.log).toHaveBeenCalledWith('No readable file at "missing.csv", try again.')
    })

    it('returns null on an empty answer', async () => {
      expect(await promptForFile(scriptedAsk(['']), dir)).toBeNull()
    })

    it('returns null at end of input', async () => {
      expect(await promptForFile(scriptedAsk([null]), dir)).toBeNull()
    })
  })
})
