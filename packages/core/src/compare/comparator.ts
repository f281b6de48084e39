import type { BufferedResult, CompareOptions, ResultStream, Row, RowOrder, Table } from '@querydiff/model'
import { bufferResults, displayValue, valuesEqual } from '@querydiff/model'
import { unifiedDiff } from './diff.js'
import { compareRows, renderCanonical, tableKey } from './render.js'

// --- Verdict ---

export type ComparisonVerdict =
  | { readonly equal: true }
  | { readonly equal: false; readonly reason: string; readonly diff: string }

// --- Streams ---

/**
 * Drains both streams and compares them. Both are released on every exit
 * path, including a failure to decode either side.
 */
export async function compareResults(
  want: ResultStream,
  got: ResultStream,
  options?: CompareOptions,
): Promise<ComparisonVerdict> {
  let wanted: BufferedResult[]
  let gotten: BufferedResult[]
  try {
    wanted = await bufferResults(want)
    gotten = await bufferResults(got)
  } finally {
    await Promise.all([want.release(), got.release()])
  }
  return compareBuffered(wanted, gotten, options)
}

// --- Buffered results ---

/**
 * Two result sets are equal when they hold the same tables, matched by group
 * key and column set regardless of result names, table order or column order.
 * Tables sharing a key are matched in arrival order. Row order counts unless
 * `rowOrder` is `'ignore'`.
 */
export function compareBuffered(
  want: readonly BufferedResult[],
  got: readonly BufferedResult[],
  options?: CompareOptions,
): ComparisonVerdict {
  const rowOrder = options?.rowOrder ?? 'significant'
  const reason = firstDifference(indexTables(want), indexTables(got), rowOrder)
  if (reason === undefined) return { equal: true }
  return {
    equal: false,
    reason,
    diff: unifiedDiff(renderCanonical(want, { rowOrder }), renderCanonical(got, { rowOrder })),
  }
}

function indexTables(results: readonly BufferedResult[]): Map<string, Table[]> {
  const index = new Map<string, Table[]>()
  for (const result of results) {
    for (const table of result.tables) {
      const key = tableKey(table)
      const tables = index.get(key)
      if (tables === undefined) index.set(key, [table])
      else tables.push(table)
    }
  }
  return index
}

function firstDifference(
  want: Map<string, Table[]>,
  got: Map<string, Table[]>,
  rowOrder: RowOrder,
): string | undefined {
  const keys = [...new Set([...want.keys(), ...got.keys()])].sort()
  for (const key of keys) {
    const w = want.get(key) ?? []
    const g = got.get(key) ?? []
    if (g.length === 0) return `missing table ${key}`
    if (w.length === 0) return `unexpected table ${key}`
    if (w.length !== g.length) {
      return `table ${key}: want ${String(w.length)} tables, got ${String(g.length)}`
    }
    for (const [i, table] of w.entries()) {
      const other = g[i]
      if (other === undefined) continue
      const reason = compareTables(key, table, other, rowOrder)
      if (reason !== undefined) return reason
    }
  }
  return undefined
}

function compareTables(key: string, want: Table, got: Table, rowOrder: RowOrder): string | undefined {
  const labels = want.columns.map((c) => c.label).sort()
  const wantRows = project(want, labels)
  const gotRows = project(got, labels)
  if (rowOrder === 'ignore') {
    wantRows.sort(compareRows)
    gotRows.sort(compareRows)
  }

  if (wantRows.length !== gotRows.length) {
    return `table ${key}: want ${String(wantRows.length)} rows, got ${String(gotRows.length)}`
  }
  for (const [r, wantRow] of wantRows.entries()) {
    const gotRow = gotRows[r] ?? []
    for (const [c, label] of labels.entries()) {
      const a = wantRow[c] ?? null
      const b = gotRow[c] ?? null
      if (!valuesEqual(a, b)) {
        const type = want.columns.find((column) => column.label === label)?.type ?? 'string'
        return `table ${key}: row ${String(r)}: column ${label}: want ${displayValue(a, type)}, got ${displayValue(b, type)}`
      }
    }
  }
  return undefined
}

function project(table: Table, labels: readonly string[]): Row[] {
  const positions = labels.map((label) => table.columns.findIndex((c) => c.label === label))
  return table.rows.map((row) => positions.map((p) => row[p] ?? null))
}
