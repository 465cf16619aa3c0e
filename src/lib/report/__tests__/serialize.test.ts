import { describe, it, expect } from 'vitest'
import { serializeTable } from '../serialize'
import { makeTable } from '@/test/table-fixtures'

describe('serializeTable', () => {
  it('writes the header and rows from raw text', () => {
    const table = makeTable(['id', 'price', 'ok'], [['1', '2.50', 'TRUE'], ['2', '3', 'false']])

    expect(serializeTable(table, ',')).toBe('id,price,ok\n1,2.50,TRUE\n2,3,false\n')
  })

  it('quotes fields holding the delimiter, quotes or line breaks', () => {
    const table = makeTable(['note'], [[{ quoted: 'a,b' }], [{ quoted: 'say "hi"' }], [{ quoted: 'x\ny' }]])

    expect(serializeTable(table, ',')).toBe('note\n"a,b"\n"say ""hi"""\n"x\ny"\n')
  })

  it('quotes text that would read back as another kind', () => {
    const table = makeTable(['code'], [[{ quoted: '007' }], [{ quoted: 'NA' }], [{ quoted: 'true' }], ['plain']])

    expect(serializeTable(table, ',')).toBe('code\n"007"\n"NA"\n"true"\nplain\n')
  })

  it('uses the given delimiter', () => {
    const table = makeTable(['a', 'b'], [[{ quoted: 'x,y' }, '1']])

    expect(serializeTable(table, ';')).toBe('a;b\nx,y;1\n')
  })

  it('writes nulls as empty fields', () => {
    const table = makeTable(['a', 'b'], [['1', null]])

    expect(serializeTable(table, ',')).toBe('a,b\n1,\n')
  })
})
