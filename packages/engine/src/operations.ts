import type { AggregateFn, ColumnMeta, ColumnType, Operation, Predicate, Row, Table, Value } from '@querydiff/core'
import { ExecutionError } from '@querydiff/core'
import { compareValues, displayValue } from '@querydiff/model'

// ── applyOperations ────────────────────────────────────────────

/**
 * Runs operations over tables in order. Tables left without rows are
 * dropped after every step.
 */
export function applyOperations(tables: readonly Table[], operations: readonly Operation[]): Table[] {
  let current = tables.filter(hasRows)
  for (const operation of operations) {
    current = applyOperation(current, operation).filter(hasRows)
  }
  return current
}

function applyOperation(tables: readonly Table[], operation: Operation): Table[] {
  switch (operation.op) {
    case 'range':
      return tables.map((t) => rangeTable(t, operation.start, operation.stop))
    case 'filter':
      return tables.map((t) => filterTable(t, operation.predicates))
    case 'group':
      return groupTables(tables, operation.columns)
    case 'keep':
      return keepColumns(tables, operation.columns)
    case 'rename':
      return tables.map((t) => renameColumns(t, operation.columns))
    case 'sort':
      return tables.map((t) => sortTable(t, operation.columns, operation.desc))
    case 'limit':
      return tables.map((t) => ({ ...t, rows: t.rows.slice(0, operation.n) }))
    case 'aggregate':
      return tables.map((t) => aggregateTable(t, operation.fn, operation.column, operation.as))
  }
}

function hasRows(table: Table): boolean {
  return table.rows.length > 0
}

function failed(operation: string, message: string): ExecutionError {
  return new ExecutionError({ code: 'QUERY_FAILED', operation }, `${operation}: ${message}`)
}

function columnIndex(table: Table, label: string): number {
  return table.columns.findIndex((c) => c.label === label)
}

// ── range / filter ─────────────────────────────────────────────

function rangeTable(table: Table, start: bigint, stop: bigint | undefined): Table {
  const t = columnIndex(table, '_time')
  if (t < 0) throw failed('range', 'table has no _time column')
  const rows = table.rows.filter((row) => {
    const time = row[t]
    return typeof time === 'bigint' && time >= start && (stop === undefined || time < stop)
  })
  return { ...table, rows }
}

function filterTable(table: Table, predicates: readonly Predicate[]): Table {
  const checks = predicates.map((p) => ({ predicate: p, index: columnIndex(table, p.column) }))
  const rows = table.rows.filter((row) =>
    checks.every(({ predicate, index }) => matches(index < 0 ? null : (row[index] ?? null), predicate)),
  )
  return { ...table, rows }
}

function kindOf(value: Exclude<Value, null>): string {
  return typeof value === 'bigint' ? 'number' : typeof value
}

/** Null never matches. Values of different kinds only satisfy `!=`; numbers and bigints are one kind. */
function matches(value: Value, predicate: Predicate): boolean {
  if (value === null) return false
  if (kindOf(value) !== kindOf(predicate.value)) return predicate.operator === '!='

  const order = compareValues(value, predicate.value)
  switch (predicate.operator) {
    case '==':
      return order === 0
    case '!=':
      return order !== 0
    case '<':
      return order < 0
    case '<=':
      return order <= 0
    case '>':
      return order > 0
    case '>=':
      return order >= 0
  }
}

// ── group / keep / rename ──────────────────────────────────────

interface Group {
  readonly keyColumns: ColumnMeta[]
  readonly keyValues: Value[]
  readonly parts: Table[]
}

function keyId(columns: readonly ColumnMeta[], values: readonly Value[]): string {
  return JSON.stringify(columns.map((c, i) => `${c.label}:${c.type}=${displayValue(values[i] ?? null, c.type)}`))
}

/**
 * Regroups rows by the values of `columns`. Each row's key holds the requested
 * columns its table has; rows from tables with different columns are merged
 * with nulls filling the gaps.
 */
function groupTables(tables: readonly Table[], columns: readonly string[]): Table[] {
  const groups = new Map<string, Group>()
  for (const table of tables) {
    const positions = columns.map((label) => columnIndex(table, label)).filter((i) => i >= 0)
    const keyColumns = positions.flatMap((i) => table.columns[i] ?? [])
    const rowsByKey = new Map<string, { values: Value[]; rows: Row[] }>()
    for (const row of table.rows) {
      const values = positions.map((i) => row[i] ?? null)
      const id = keyId(keyColumns, values)
      const bucket = rowsByKey.get(id)
      if (bucket === undefined) rowsByKey.set(id, { values, rows: [row] })
      else bucket.rows.push(row)
    }
    for (const [id, { values, rows }] of rowsByKey) {
      const part: Table = { key: { columns: keyColumns, values }, columns: table.columns, rows }
      const group = groups.get(id)
      if (group === undefined) groups.set(id, { keyColumns: [...keyColumns], keyValues: values, parts: [part] })
      else group.parts.push(part)
    }
  }
  return [...groups.values()].map((g) => mergeParts(g, 'group'))
}

/** Concatenates tables sharing a key, filling columns a part lacks with nulls. */
function mergeParts(group: Group, operation: string): Table {
  const [first, ...rest] = group.parts
  if (first !== undefined && rest.length === 0) {
    return { key: { columns: group.keyColumns, values: group.keyValues }, columns: first.columns, rows: first.rows }
  }

  const columns: ColumnMeta[] = []
  for (const part of group.parts) {
    for (const column of part.columns) {
      const existing = columns.find((c) => c.label === column.label)
      if (existing === undefined) columns.push(column)
      else if (existing.type !== column.type) {
        throw failed(operation, `column ${column.label} is both ${existing.type} and ${column.type}`)
      }
    }
  }
  const rows = group.parts.flatMap((part) => {
    const positions = columns.map((c) => columnIndex(part, c.label))
    return part.rows.map((row): Row => positions.map((p) => (p < 0 ? null : (row[p] ?? null))))
  })
  return { key: { columns: group.keyColumns, values: group.keyValues }, columns, rows }
}

/** Projects tables onto `columns`; tables whose keys become equal merge. */
function keepColumns(tables: readonly Table[], keep: readonly string[]): Table[] {
  const groups = new Map<string, Group>()
  for (const table of tables) {
    const positions = table.columns.flatMap((c, i) => (keep.includes(c.label) ? [i] : []))
    const keyPositions = table.key.columns.flatMap((c, i) => (keep.includes(c.label) ? [i] : []))
    const keyColumns = keyPositions.flatMap((i) => table.key.columns[i] ?? [])
    const keyValues = keyPositions.map((i) => table.key.values[i] ?? null)
    const part: Table = {
      key: { columns: keyColumns, values: keyValues },
      columns: positions.flatMap((i) => table.columns[i] ?? []),
      rows: table.rows.map((row) => positions.map((i) => row[i] ?? null)),
    }
    const id = keyId(keyColumns, keyValues)
    const group = groups.get(id)
    if (group === undefined) groups.set(id, { keyColumns, keyValues, parts: [part] })
    else group.parts.push(part)
  }
  return [...groups.values()].map((g) => mergeParts(g, 'keep'))
}

function renameColumns(table: Table, names: Readonly<Record<string, string>>): Table {
  const rename = (column: ColumnMeta): ColumnMeta => {
    const label = Object.hasOwn(names, column.label) ? names[column.label] : undefined
    return label === undefined ? column : { ...column, label }
  }
  return {
    key: { columns: table.key.columns.map(rename), values: table.key.values },
    columns: table.columns.map(rename),
    rows: table.rows,
  }
}

// ── sort / aggregate ───────────────────────────────────────────

/** Stable sort; nulls order first ascending. */
function sortTable(table: Table, columns: readonly string[], desc: boolean): Table {
  const positions = columns.map((label) => columnIndex(table, label))
  const sign = desc ? -1 : 1
  const rows = [...table.rows].sort((a, b) => {
    for (const p of positions) {
      const order = p < 0 ? 0 : compareValues(a[p] ?? null, b[p] ?? null)
      if (order !== 0) return sign * order
    }
    return 0
  })
  return { ...table, rows }
}

const NUMERIC_TYPES: readonly ColumnType[] = ['long', 'unsignedLong', 'double']

/**
 * Reduces a table to one row holding its key columns and the aggregate.
 * Nulls are ignored; an aggregate over no values is null (0 for count).
 */
function aggregateTable(table: Table, fn: AggregateFn, column: string, as: string): Table {
  const index = columnIndex(table, column)
  const source = table.columns[index]
  if (source === undefined) throw failed(fn, `table has no column ${column}`)

  const values = table.rows.map((row) => row[index] ?? null).filter((v) => v !== null)
  let result: Value
  let type: ColumnType = source.type
  switch (fn) {
    case 'count':
      result = BigInt(values.length)
      type = 'long'
      break
    case 'sum':
      result = values.length === 0 ? null : sum(fn, source, values)
      break
    case 'mean':
      result = values.length === 0 ? null : Number(sum(fn, source, values)) / values.length
      type = 'double'
      break
    case 'min':
      result = values.reduce<Value>((m, v) => (m === null || compareValues(v, m) < 0 ? v : m), null)
      break
    case 'max':
      result = values.reduce<Value>((m, v) => (m === null || compareValues(v, m) > 0 ? v : m), null)
      break
    case 'first':
      result = values[0] ?? null
      break
    case 'last':
      result = values.at(-1) ?? null
      break
  }

  return {
    key: table.key,
    columns: [...table.key.columns, { label: as, type }],
    rows: [[...table.key.values, result]],
  }
}

/** Integer columns sum exactly as bigints; doubles as numbers. */
function sum(fn: AggregateFn, column: ColumnMeta, values: readonly Value[]): number | bigint {
  if (!NUMERIC_TYPES.includes(column.type)) throw failed(fn, `column ${column.label} is ${column.type}, not numeric`)
  if (column.type === 'double') {
    return values.reduce<number>((total, v) => (typeof v === 'number' ? total + v : total), 0)
  }
  return values.reduce<bigint>((total, v) => (typeof v === 'bigint' ? total + v : total), 0n)
}
