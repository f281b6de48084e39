import type { BufferedResult, ColumnMeta, Row, RowOrder, Table } from '@querydiff/model'
import { compareValues, displayValue } from '@querydiff/model'
import { csvDialect } from '../dialects/dialect.js'
import { CsvBlockWriter } from '../dialects/annotatedCsv.js'

// ── Table identity ─────────────────────────────────────────────

function byText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

function byLabel(a: ColumnMeta, b: ColumnMeta): number {
  return byText(a.label, b.label)
}

/**
 * Identifies a table independently of column order: its group key values and
 * its column set, both ordered by label.
 */
export function tableKey(table: Table): string {
  const key = table.key.columns
    .map((column, i) => `${column.label}=${displayValue(table.key.values[i] ?? null, column.type)}`)
    .sort(byText)
  const columns = [...table.columns].sort(byLabel).map((c) => `${c.label}:${c.type}`)
  return `{${key.join(',')}} [${columns.join(',')}]`
}

export function compareRows(a: Row, b: Row): number {
  const n = Math.min(a.length, b.length)
  for (let i = 0; i < n; i++) {
    const order = compareValues(a[i] ?? null, b[i] ?? null)
    if (order !== 0) return order
  }
  return a.length - b.length
}

/**
 * Reorders a table's columns (and its key) by label. With `rowOrder: 'ignore'`
 * the rows are sorted as well.
 */
export function canonicalTable(table: Table, rowOrder: RowOrder = 'significant'): Table {
  const order = table.columns.map((column, i) => ({ column, i })).sort((a, b) => byLabel(a.column, b.column))
  const keyOrder = table.key.columns.map((column, i) => ({ column, i })).sort((a, b) => byLabel(a.column, b.column))
  const rows = table.rows.map((row): Row => order.map(({ i }) => row[i] ?? null))
  if (rowOrder === 'ignore') rows.sort(compareRows)
  return {
    key: {
      columns: keyOrder.map(({ column }) => column),
      values: keyOrder.map(({ i }) => table.key.values[i] ?? null),
    },
    columns: order.map(({ column }) => column),
    rows,
  }
}

// ── Canonical rendering ────────────────────────────────────────

export interface RenderOptions {
  readonly rowOrder?: RowOrder | undefined
}

/**
 * Renders results as annotated CSV in a stable layout: all tables under one
 * result, sorted by table key, columns ordered by label. Decoding the output
 * yields results equal to the input under the comparator.
 */
export function renderCanonical(results: readonly BufferedResult[], options?: RenderOptions): string {
  const tables = results
    .flatMap((result) => result.tables)
    .map((table) => canonicalTable(table, options?.rowOrder))
    .map((table) => ({ table, key: tableKey(table) }))
    .sort((a, b) => byText(a.key, b.key))

  const writer = new CsvBlockWriter(csvDialect())
  return tables.map(({ table }) => writer.render('_result', table)).join('')
}
