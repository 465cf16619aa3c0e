import { describe, it, expect } from 'vitest'
import { cellKey, inferCell, rowKey } from '../cell-values'

describe('inferCell', () => {
  describe('unquoted fields', () => {
    it('reads an empty field as null', () => {
      expect(inferCell('', false)).toEqual({ kind: 'null', raw: '' })
    })

    it('reads common missing-value markers as null', () => {
      expect(inferCell('NA', false).kind).toBe('null')
      expect(inferCell('N/A', false).kind).toBe('null')
      expect(inferCell('NaN', false).kind).toBe('null')
      expect(inferCell('null', false).kind).toBe('null')
      expect(inferCell('  ', false).kind).toBe('null')
    })

    it('reads integers', () => {
      expect(inferCell('42', false)).toEqual({ kind: 'integer', value: 42, raw: '42' })
      expect(inferCell('-7', false)).toEqual({ kind: 'integer', value: -7, raw: '-7' })
      expect(inferCell('007', false)).toEqual({ kind: 'integer', value: 7, raw: '007' })
    })

    it('reads decimals and exponents as floats', () => {
      expect(inferCell('1.50', false)).toEqual({ kind: 'float', value: 1.5, raw: '1.50' })
      expect(inferCell('.5', false)).toEqual({ kind: 'float', value: 0.5, raw: '.5' })
      expect(inferCell('2e3', false)).toEqual({ kind: 'float', value: 2000, raw: '2e3' })
    })

    it('reads integers beyond the safe range as floats', () => {
      expect(inferCell('9007199254740993', false).kind).toBe('float')
    })

    it('reads booleans in any case', () => {
      expect(inferCell('true', false)).toEqual({ kind: 'boolean', value: true, raw: 'true' })
      expect(inferCell('FALSE', false)).toEqual({ kind: 'boolean', value: false, raw: 'FALSE' })
    })

    it('reads everything else as text', () => {
      expect(inferCell('hello', false)).toEqual({ kind: 'text', value: 'hello', raw: 'hello' })
      expect(inferCell('12abc', false).kind).toBe('text')
      expect(inferCell('1.2.3', false).kind).toBe('text')
    })
  })

  describe('quoted fields', () => {
    it('keeps numeric-looking values as text', () => {
      expect(inferCell('1', true)).toEqual({ kind: 'text', value: '1', raw: '1' })
      expect(inferCell('true', true).kind).toBe('text')
      expect(inferCell('NA', true).kind).toBe('text')
    })

    it('reads an empty quoted field as null', () => {
      expect(inferCell('', true).kind).toBe('null')
    })
  })
})

describe('cellKey', () => {
  it('matches integers and floats with the same value', () => {
    expect(cellKey(inferCell('1', false))).toBe(cellKey(inferCell('1.0', false)))
  })

  it('keeps text "1" distinct from the number 1', () => {
    expect(cellKey(inferCell('1', true))).not.toBe(cellKey(inferCell('1', false)))
  })

  it('gives every null the same key', () => {
    expect(cellKey(inferCell('', false))).toBe(cellKey(inferCell('NA', false)))
  })
})

describe('rowKey', () => {
  it('does not confuse cell boundaries', () => {
    const a = rowKey([inferCell('a,b', true), inferCell('c', true)])
    const b = rowKey([inferCell('a', true), inferCell('b,c', true)])
    expect(a).not.toBe(b)
  })
})
