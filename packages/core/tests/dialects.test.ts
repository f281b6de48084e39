import { PassThrough, Readable } from 'node:stream'
import { text } from 'node:stream/consumers'
import { describe, expect, it } from 'vitest'
import type { BufferedResult, Dialect, Table } from '../src/index.js'
import {
  bufferResults,
  compareBuffered,
  csvDialect,
  decoderFor,
  encoderFor,
  ExecutionError,
  fromBufferedResults,
  jsonDialect,
} from '../src/index.js'

// ── Helpers ────────────────────────────────────────────────────

const T0 = 1_527_018_806_000_000_000n

function hostTable(host: string, value: number): Table {
  return {
    key: {
      columns: [
        { label: '_measurement', type: 'string' },
        { label: 'host', type: 'string' },
      ],
      values: ['cpu', host],
    },
    columns: [
      { label: '_time', type: 'dateTime' },
      { label: '_value', type: 'double' },
      { label: '_measurement', type: 'string' },
      { label: 'host', type: 'string' },
    ],
    rows: [[T0, value, 'cpu', host]],
  }
}

const results: BufferedResult[] = [{ name: '_result', tables: [hostTable('a', 1.5), hostTable('b', 3)] }]

async function encodeText(dialect: Dialect, input: readonly BufferedResult[]): Promise<{ rows: number; output: string }> {
  const out = new PassThrough()
  const output = text(out)
  const rows = await encoderFor(dialect).encode(fromBufferedResults(input), out)
  out.end()
  return { rows, output: await output }
}

// ── Annotated CSV ──────────────────────────────────────────────

describe('annotated CSV encoder', () => {
  it('writes one block for tables sharing a schema', async () => {
    const { rows, output } = await encodeText(csvDialect(), results)
    expect(rows).toBe(2)
    expect(output).toBe(
      [
        '#datatype,string,long,dateTime:RFC3339,double,string,string',
        '#group,false,false,false,false,true,true',
        '#default,_result,,,,,',
        ',result,table,_time,_value,_measurement,host',
        ',,0,2018-05-22T19:53:26Z,1.5,cpu,a',
        ',,1,2018-05-22T19:53:26Z,3,cpu,b',
        '',
      ].join('\n'),
    )
  })

  it('starts a new block when the schema changes', async () => {
    const counts: Table = {
      key: { columns: [], values: [] },
      columns: [{ label: 'count', type: 'long' }],
      rows: [[2n]],
    }
    const { output } = await encodeText(csvDialect(['datatype']), [{ name: 'r', tables: [hostTable('a', 1), counts] }])
    expect(output.split('\n').slice(3)).toEqual(['', '#datatype,string,long,long', ',result,table,count', ',r,1,2', ''])
  })

  it('writes the result name in every row without a default annotation', async () => {
    const { output } = await encodeText(csvDialect(['datatype', 'group']), results)
    expect(output.split('\n')[3]).toBe(',_result,0,2018-05-22T19:53:26Z,1.5,cpu,a')
  })

  it('quotes fields that need it', async () => {
    const table: Table = {
      key: { columns: [], values: [] },
      columns: [{ label: 'note', type: 'string' }],
      rows: [['say "hi", then leave']],
    }
    const { output } = await encodeText(csvDialect(), [{ name: '_result', tables: [table] }])
    expect(output.split('\n')[4]).toBe(',,0,"say ""hi"", then leave"')
  })

  it('decodes back to equal results', async () => {
    const { output } = await encodeText(csvDialect(), results)
    const decoded = await bufferResults(await decoderFor('annotated-csv').decode(Readable.from([output])))
    expect(compareBuffered(results, decoded)).toEqual({ equal: true })
  })

  it('writes a table without rows as its own block keyed by #default', async () => {
    const empty: Table = { ...hostTable('a', 1), rows: [] }
    const input: BufferedResult[] = [{ name: '_result', tables: [empty, hostTable('b', 3)] }]
    const { rows, output } = await encodeText(csvDialect(), input)
    expect(rows).toBe(1)
    expect(output).toBe(
      [
        '#datatype,string,long,dateTime:RFC3339,double,string,string',
        '#group,false,false,false,false,true,true',
        '#default,_result,0,,,cpu,a',
        ',result,table,_time,_value,_measurement,host',
        '',
        '#datatype,string,long,dateTime:RFC3339,double,string,string',
        '#group,false,false,false,false,true,true',
        '#default,_result,,,,,',
        ',result,table,_time,_value,_measurement,host',
        ',,1,2018-05-22T19:53:26Z,3,cpu,b',
        '',
      ].join('\n'),
    )
    const decoded = await bufferResults(await decoderFor('annotated-csv').decode(Readable.from([output])))
    expect(compareBuffered(input, decoded)).toEqual({ equal: true })
  })
})

// ── JSON ───────────────────────────────────────────────────────

describe('JSON encoder', () => {
  it('writes one document', async () => {
    const { rows, output } = await encodeText(jsonDialect(), results)
    expect(rows).toBe(2)
    expect(output).toBe(
      '{"results":[{"statement_id":0,"series":[' +
        '{"name":"cpu","tags":{"host":"a"},"columns":["time","_value"],"values":[["2018-05-22T19:53:26Z",1.5]]},' +
        '{"name":"cpu","tags":{"host":"b"},"columns":["time","_value"],"values":[["2018-05-22T19:53:26Z",3]]}' +
        ']}]}\n',
    )
  })

  it('writes one envelope per table in lines mode', async () => {
    const { output } = await encodeText(jsonDialect('lines'), [{ name: '3', tables: [hostTable('a', 1)] }])
    expect(output).toBe(
      '{"results":[{"statement_id":3,"series":[' +
        '{"name":"cpu","tags":{"host":"a"},"columns":["time","_value"],"values":[["2018-05-22T19:53:26Z",1]]}' +
        ']}]}\n',
    )
  })

  it('writes integers beyond the double range with all their digits', async () => {
    const big: Table = {
      key: { columns: [], values: [] },
      columns: [{ label: 'n', type: 'long' }],
      rows: [[9_007_199_254_740_993n]],
    }
    const { output } = await encodeText(jsonDialect(), [{ name: '0', tables: [big] }])
    expect(output).toBe('{"results":[{"statement_id":0,"series":[{"columns":["n"],"values":[[9007199254740993]]}]}]}\n')
  })

  it('writes a table without rows as a series without values', async () => {
    const empty: Table = { ...hostTable('a', 1), rows: [] }
    const { rows, output } = await encodeText(jsonDialect(), [{ name: '0', tables: [empty] }])
    expect(rows).toBe(0)
    expect(output).toBe(
      '{"results":[{"statement_id":0,"series":[{"name":"cpu","tags":{"host":"a"},"columns":["time","_value"],"values":[]}]}]}\n',
    )
  })

  it('decodes back to equal results', async () => {
    const { output } = await encodeText(jsonDialect('lines'), results)
    const decoded = await bufferResults(await decoderFor('json').decode(Readable.from([output])))
    expect(compareBuffered(results, decoded)).toEqual({ equal: true })
  })
})

// ── Output handling ────────────────────────────────────────────

describe('encoder output', () => {
  it('waits for a slow reader', async () => {
    const many: Table = {
      key: { columns: [], values: [] },
      columns: [{ label: 'n', type: 'long' }],
      rows: Array.from({ length: 500 }, (_, i) => [BigInt(i)]),
    }
    const out = new PassThrough({ highWaterMark: 16 })
    const output = text(out)
    const rows = await encoderFor(csvDialect()).encode(fromBufferedResults([{ name: '_result', tables: [many] }]), out)
    out.end()
    expect(rows).toBe(500)
    expect((await output).split('\n')).toHaveLength(4 + 500 + 1)
  })

  it('rejects and releases the stream when the output is closed', async () => {
    const out = new PassThrough()
    out.destroy()
    const stream = fromBufferedResults(results)
    await expect(encoderFor(csvDialect()).encode(stream, out)).rejects.toThrow(ExecutionError)
    expect(stream.released).toBe(true)
  })
})
