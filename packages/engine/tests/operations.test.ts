import type { Operation, Table, Value } from '@querydiff/core'
import { ExecutionError } from '@querydiff/core'
import { describe, expect, it } from 'vitest'
import { applyOperations } from '../src/index.js'

// ── Fixtures ───────────────────────────────────────────────────

const T0 = 1_527_018_806_000_000_000n
const T1 = 1_527_018_816_000_000_000n
const T2 = 1_527_018_826_000_000_000n
const T3 = 1_527_018_836_000_000_000n

const KEY = [
  { label: '_field', type: 'string' },
  { label: '_measurement', type: 'string' },
  { label: 'host', type: 'string' },
] as const

function cpu(host: string, points: [bigint, number | null][]): Table {
  return {
    key: { columns: KEY, values: ['usage_idle', 'cpu', host] },
    columns: [{ label: '_time', type: 'dateTime' }, { label: '_value', type: 'double' }, ...KEY],
    rows: points.map(([t, v]) => [t, v, 'usage_idle', 'cpu', host]),
  }
}

function values(tables: readonly Table[], label = '_value'): Value[][] {
  return tables.map((t) => {
    const i = t.columns.findIndex((c) => c.label === label)
    return t.rows.map((row) => row[i] ?? null)
  })
}

function run(tables: readonly Table[], ...operations: Operation[]): Table[] {
  return applyOperations(tables, operations)
}

// ── range / filter ─────────────────────────────────────────────

describe('range', () => {
  it('keeps rows in the half-open window', () => {
    const out = run([cpu('a', [[T0, 1], [T1, 2], [T2, 3], [T3, 4]])], { op: 'range', start: T1, stop: T3 })
    expect(values(out)).toEqual([[2, 3]])
  })

  it('drops tables left empty', () => {
    expect(run([cpu('a', [[T0, 1]]), cpu('b', [[T2, 2]])], { op: 'range', start: T1 })).toHaveLength(1)
  })

  it('needs a _time column', () => {
    const table: Table = { key: { columns: [], values: [] }, columns: [{ label: 'n', type: 'long' }], rows: [[1n]] }
    expect(() => run([table], { op: 'range', start: 0n })).toThrow(ExecutionError)
    expect(() => run([table], { op: 'range', start: 0n })).toThrow('range: table has no _time column')
  })
})

describe('filter', () => {
  const table = cpu('a', [[T0, 1], [T1, null], [T2, 2]])

  it('never matches null', () => {
    const out = run([table], { op: 'filter', predicates: [{ column: '_value', operator: '>', value: 1 }] })
    expect(values(out)).toEqual([[2]])
  })

  it('only satisfies != across value kinds', () => {
    expect(values(run([table], { op: 'filter', predicates: [{ column: '_value', operator: '!=', value: 'x' }] }))).toEqual([
      [1, 2],
    ])
    expect(run([table], { op: 'filter', predicates: [{ column: '_value', operator: '==', value: 'x' }] })).toEqual([])
  })

  it('requires every predicate', () => {
    const out = run([cpu('a', [[T0, 1]]), cpu('b', [[T0, 2]])], {
      op: 'filter',
      predicates: [
        { column: '_measurement', operator: '==', value: 'cpu' },
        { column: 'host', operator: '==', value: 'b' },
      ],
    })
    expect(values(out)).toEqual([[2]])
  })

  it('compares times', () => {
    const out = run([table], { op: 'filter', predicates: [{ column: '_time', operator: '>=', value: T1 }] })
    expect(values(out, '_time')).toEqual([[T1, T2]])
  })
})

// ── group / keep / rename ──────────────────────────────────────

describe('group', () => {
  it('merges tables sharing the new key', () => {
    const [merged, ...rest] = run([cpu('a', [[T0, 1], [T1, 2]]), cpu('b', [[T0, 3]])], {
      op: 'group',
      columns: ['_measurement'],
    })
    expect(rest).toEqual([])
    expect(merged?.key).toEqual({ columns: [{ label: '_measurement', type: 'string' }], values: ['cpu'] })
    expect(values(merged === undefined ? [] : [merged])).toEqual([[1, 2, 3]])
  })

  it('splits rows by key value', () => {
    const table: Table = {
      key: { columns: [], values: [] },
      columns: [
        { label: 'host', type: 'string' },
        { label: '_value', type: 'long' },
      ],
      rows: [
        ['a', 1n],
        ['b', 2n],
        ['a', 3n],
      ],
    }
    const out = run([table], { op: 'group', columns: ['host'] })
    expect(out.map((t) => t.key.values)).toEqual([['a'], ['b']])
    expect(values(out)).toEqual([[1n, 3n], [2n]])
  })

  it('fills columns a table lacks with nulls', () => {
    const regional: Table = {
      key: { columns: [], values: [] },
      columns: [
        { label: '_value', type: 'double' },
        { label: 'region', type: 'string' },
      ],
      rows: [[9, 'west']],
    }
    const [all] = run([cpu('a', [[T0, 1]]), regional], { op: 'group', columns: [] })
    expect(all?.columns.map((c) => c.label)).toEqual(['_time', '_value', '_field', '_measurement', 'host', 'region'])
    expect(all?.rows).toEqual([
      [T0, 1, 'usage_idle', 'cpu', 'a', null],
      [null, 9, null, null, null, 'west'],
    ])
  })

  it('rejects a column with two types', () => {
    const counts: Table = { key: { columns: [], values: [] }, columns: [{ label: '_value', type: 'long' }], rows: [[1n]] }
    expect(() => run([cpu('a', [[T0, 1]]), counts], { op: 'group', columns: [] })).toThrow(
      'group: column _value is both double and long',
    )
  })
})

describe('keep', () => {
  it('projects columns and merges tables whose keys become equal', () => {
    const out = run([cpu('a', [[T0, 1]]), cpu('b', [[T1, 2]])], {
      op: 'keep',
      columns: ['_time', '_value', '_measurement'],
    })
    expect(out).toEqual([
      {
        key: { columns: [{ label: '_measurement', type: 'string' }], values: ['cpu'] },
        columns: [
          { label: '_time', type: 'dateTime' },
          { label: '_value', type: 'double' },
          { label: '_measurement', type: 'string' },
        ],
        rows: [
          [T0, 1, 'cpu'],
          [T1, 2, 'cpu'],
        ],
      },
    ])
  })
})

describe('rename', () => {
  it('renames data and key columns', () => {
    const [table] = run([cpu('a', [[T0, 1]])], { op: 'rename', columns: { _value: 'v', host: 'server' } })
    expect(table?.columns.map((c) => c.label)).toEqual(['_time', 'v', '_field', '_measurement', 'server'])
    expect(table?.key.columns.map((c) => c.label)).toEqual(['_field', '_measurement', 'server'])
  })
})

// ── sort / limit ───────────────────────────────────────────────

describe('sort', () => {
  const table = cpu('a', [[T0, 2], [T1, null], [T2, 1], [T3, 2]])

  it('orders nulls first and keeps ties in place', () => {
    const out = run([table], { op: 'sort', columns: ['_value'], desc: false })
    expect(values(out, '_time')).toEqual([[T1, T2, T0, T3]])
  })

  it('reverses for descending order', () => {
    const out = run([table], { op: 'sort', columns: ['_value'], desc: true })
    expect(values(out, '_time')).toEqual([[T0, T3, T2, T1]])
  })
})

describe('limit', () => {
  it('keeps the first rows of each table', () => {
    const out = run([cpu('a', [[T0, 1], [T1, 2]]), cpu('b', [[T0, 3]])], { op: 'limit', n: 1 })
    expect(values(out)).toEqual([[1], [3]])
  })
})

// ── aggregate ──────────────────────────────────────────────────

describe('aggregate', () => {
  const table = cpu('a', [[T0, 1], [T1, null], [T2, 4]])

  function aggregate(fn: 'count' | 'sum' | 'mean' | 'min' | 'max' | 'first' | 'last', source = table): Table | undefined {
    return run([source], { op: 'aggregate', fn, column: '_value', as: fn })[0]
  }

  it('counts non-null values as a long', () => {
    expect(aggregate('count')).toEqual({
      key: table.key,
      columns: [...KEY, { label: 'count', type: 'long' }],
      rows: [['usage_idle', 'cpu', 'a', 2n]],
    })
  })

  it.each([
    ['sum', 5, 'double'],
    ['mean', 2.5, 'double'],
    ['min', 1, 'double'],
    ['max', 4, 'double'],
    ['first', 1, 'double'],
    ['last', 4, 'double'],
  ] as const)('computes %s', (fn, expected, type) => {
    const out = aggregate(fn)
    expect(out?.columns.at(-1)).toEqual({ label: fn, type })
    expect(out?.rows).toEqual([['usage_idle', 'cpu', 'a', expected]])
  })

  it('reports a mean of doubles over longs', () => {
    const longs: Table = { key: { columns: [], values: [] }, columns: [{ label: '_value', type: 'long' }], rows: [[1n], [2n]] }
    expect(aggregate('mean', longs)).toEqual({ key: longs.key, columns: [{ label: 'mean', type: 'double' }], rows: [[1.5]] })
    expect(aggregate('sum', longs)).toEqual({ key: longs.key, columns: [{ label: 'sum', type: 'long' }], rows: [[3n]] })
  })

  it('sums longs exactly up to the int64 limit', () => {
    const longs: Table = {
      key: { columns: [], values: [] },
      columns: [{ label: '_value', type: 'long' }],
      rows: [[9_223_372_036_854_775_000n], [null], [807n]],
    }
    expect(aggregate('sum', longs)?.rows).toEqual([[9_223_372_036_854_775_807n]])
    expect(aggregate('max', longs)?.rows).toEqual([[9_223_372_036_854_775_000n]])
    expect(aggregate('count', longs)?.rows).toEqual([[2n]])
  })

  it('is null over no values', () => {
    expect(aggregate('mean', cpu('a', [[T0, null]]))?.rows).toEqual([['usage_idle', 'cpu', 'a', null]])
  })

  it('rejects sums over strings', () => {
    expect(() => run([table], { op: 'aggregate', fn: 'sum', column: 'host', as: 'sum' })).toThrow(
      'sum: column host is string, not numeric',
    )
  })

  it('rejects a missing column', () => {
    expect(() => run([table], { op: 'aggregate', fn: 'count', column: 'nope', as: 'count' })).toThrow(
      'count: table has no column nope',
    )
  })
})
