import { Readable } from 'node:stream'
import { describe, expect, it, vi } from 'vitest'
import type { BufferedResult, NamedTable, Table } from '../src/index.js'
import {
  bufferResults,
  compareBuffered,
  compareResults,
  decoderFor,
  fromBufferedResults,
  renderCanonical,
  tableKey,
} from '../src/index.js'
import { createResultStream } from '@querydiff/model'

// ── Fixtures ───────────────────────────────────────────────────

function table(host: string, values: number[], order: 'value-first' | 'host-first' = 'value-first'): Table {
  const key = { columns: [{ label: 'host', type: 'string' as const }], values: [host] }
  if (order === 'host-first') {
    return {
      key,
      columns: [
        { label: 'host', type: 'string' },
        { label: '_value', type: 'double' },
      ],
      rows: values.map((v) => [host, v]),
    }
  }
  return {
    key,
    columns: [
      { label: '_value', type: 'double' },
      { label: 'host', type: 'string' },
    ],
    rows: values.map((v) => [v, host]),
  }
}

function results(...tables: Table[]): BufferedResult[] {
  return [{ name: '_result', tables }]
}

// ── Equality ───────────────────────────────────────────────────

describe('compareBuffered', () => {
  it('ignores table order, column order and result names', () => {
    const want = results(table('a', [1, 2]), table('b', [3]))
    const got: BufferedResult[] = [
      { name: '0', tables: [table('b', [3], 'host-first')] },
      { name: '1', tables: [table('a', [1, 2], 'host-first')] },
    ]
    expect(compareBuffered(want, got)).toEqual({ equal: true })
  })

  it('is symmetric', () => {
    const x = results(table('a', [1]))
    const y = results(table('a', [1]), table('b', [2]))
    expect(compareBuffered(x, y).equal).toBe(false)
    expect(compareBuffered(y, x).equal).toBe(false)
    expect(compareBuffered(x, x).equal).toBe(true)
  })

  it('names a missing table', () => {
    const verdict = compareBuffered(results(table('a', [1]), table('b', [2])), results(table('a', [1])))
    expect(verdict).toMatchObject({
      equal: false,
      reason: 'missing table {host="b"} [_value:double,host:string]',
    })
  })

  it('names an unexpected table', () => {
    const verdict = compareBuffered(results(table('a', [1])), results(table('a', [1]), table('b', [2])))
    expect(verdict).toMatchObject({ equal: false, reason: 'unexpected table {host="b"} [_value:double,host:string]' })
  })

  it('names the first differing cell', () => {
    const verdict = compareBuffered(results(table('a', [1, 2])), results(table('a', [1, 2.5])))
    expect(verdict).toMatchObject({
      equal: false,
      reason: 'table {host="a"} [_value:double,host:string]: row 1: column _value: want 2, got 2.5',
    })
  })

  it('treats row order as significant by default', () => {
    const want = results(table('a', [1, 2]))
    const got = results(table('a', [2, 1]))
    expect(compareBuffered(want, got).equal).toBe(false)
    expect(compareBuffered(want, got, { rowOrder: 'ignore' })).toEqual({ equal: true })
  })

  it('reports a differing row count', () => {
    const verdict = compareBuffered(results(table('a', [1, 2])), results(table('a', [1])))
    expect(verdict).toMatchObject({ reason: 'table {host="a"} [_value:double,host:string]: want 2 rows, got 1' })
  })

  it('distinguishes column types', () => {
    const long: Table = { ...table('a', [1]), columns: [{ label: '_value', type: 'long' }, { label: 'host', type: 'string' }] }
    expect(compareBuffered(results(table('a', [1])), results(long)).equal).toBe(false)
  })

  it('attaches a unified diff of the canonical renderings', () => {
    const verdict = compareBuffered(results(table('a', [2])), results(table('a', [3])))
    if (verdict.equal) throw new Error('expected a mismatch')
    expect(verdict.diff).toContain('--- want')
    expect(verdict.diff).toContain('+++ got')
    expect(verdict.diff).toContain('\n-,,0,2,a\n')
    expect(verdict.diff).toContain('\n+,,0,3,a\n')
  })
})

// ── Streams ────────────────────────────────────────────────────

describe('compareResults', () => {
  it('drains and releases both streams', async () => {
    const want = fromBufferedResults(results(table('a', [1])))
    const got = fromBufferedResults(results(table('a', [1])))
    expect(await compareResults(want, got)).toEqual({ equal: true })
    expect(want.released).toBe(true)
    expect(got.released).toBe(true)
  })

  it('does not match a table without rows against no table', async () => {
    const csv = [
      '#datatype,string,long,double,string',
      '#group,false,false,false,true',
      '#default,_result,0,,a',
      ',result,table,_value,host',
      '',
      '#datatype,string,long,double,string',
      '#group,false,false,false,true',
      '#default,_result,,,',
      ',result,table,_value,host',
      ',,1,3,b',
      '',
    ].join('\n')
    const decoder = decoderFor('annotated-csv')
    const want = await decoder.decode(Readable.from([csv]))
    const got = await decoder.decode(Readable.from([renderCanonical(results(table('b', [3])))]))
    expect(await compareResults(want, got)).toMatchObject({
      equal: false,
      reason: 'missing table {host="a"} [_value:double,host:string]',
    })
  })

  it('releases both streams when one fails to decode', async () => {
    const release = vi.fn()
    async function* broken(): AsyncGenerator<NamedTable> {
      yield { result: '_result', table: table('a', [1]) }
      throw new Error('truncated')
    }
    const want = createResultStream(broken(), release)
    const got = fromBufferedResults(results(table('a', [1])))
    await expect(compareResults(want, got)).rejects.toThrow('truncated')
    expect(release).toHaveBeenCalledTimes(1)
    expect(got.released).toBe(true)
  })
})

// ── Canonical rendering ────────────────────────────────────────

describe('renderCanonical', () => {
  it('orders tables by key and columns by label', () => {
    const text = renderCanonical(results(table('b', [2], 'host-first'), table('a', [1])))
    expect(text).toBe(
      [
        '#datatype,string,long,double,string',
        '#group,false,false,false,true',
        '#default,_result,,,',
        ',result,table,_value,host',
        ',,0,1,a',
        ',,1,2,b',
        '',
      ].join('\n'),
    )
  })

  it('decodes back to results equal to its input', async () => {
    const input = results(table('b', [2, 1]), table('a', [1]))
    const decoded = await bufferResults(
      await decoderFor('annotated-csv').decode(Readable.from([renderCanonical(input)])),
    )
    expect(compareBuffered(input, decoded)).toEqual({ equal: true })
  })

  it('keys tables independently of column order', () => {
    expect(tableKey(table('a', [1]))).toBe(tableKey(table('a', [1], 'host-first')))
  })
})
