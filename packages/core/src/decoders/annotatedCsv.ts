import type { Readable } from 'node:stream'
import type { ColumnMeta, ColumnType, NamedTable, ResultStream, Row, Value } from '@querydiff/model'
import { DecodeError, displayValue, openResultStream, parseCell, valuesEqual } from '@querydiff/model'
import type { FixtureFormat, ResultDecoder } from './decoder.js'
import type { CsvRecord } from './lines.js'
import { readCsvRecords, readLines } from './lines.js'

// ── Decoder ────────────────────────────────────────────────────

export class AnnotatedCsvDecoder implements ResultDecoder {
  readonly format: FixtureFormat = 'annotated-csv'

  decode(input: Readable): Promise<ResultStream> {
    const tables = decodeAnnotatedCsv(readCsvRecords(readLines(input, this.format)))
    return openResultStream(tables, () => {
      input.destroy()
    })
  }
}

// ── Annotations ────────────────────────────────────────────────

const DEFAULT_RESULT = '_result'

const TYPE_NAMES = new Map<string, ColumnType>([
  ['boolean', 'boolean'],
  ['long', 'long'],
  ['unsignedLong', 'unsignedLong'],
  ['double', 'double'],
  ['string', 'string'],
  ['dateTime', 'dateTime'],
  ['dateTime:RFC3339', 'dateTime'],
  ['dateTime:RFC3339Nano', 'dateTime'],
])

interface Annotation {
  readonly line: number
  readonly values: readonly string[]
}

interface Annotations {
  datatype?: Annotation | undefined
  group?: Annotation | undefined
  default?: Annotation | undefined
}

/** Everything needed to read the data rows of one block. */
interface Header {
  readonly width: number
  readonly defaults: readonly string[]
  readonly defaultLine: number
  readonly resultIndex: number
  readonly tableIndex: number
  readonly columns: readonly ColumnMeta[]
  /** Field index of each entry in `columns`. */
  readonly fieldIndex: readonly number[]
  /** Positions in `columns` that belong to the group key. */
  readonly keyPositions: readonly number[]
  readonly keyColumns: readonly ColumnMeta[]
  readonly errorTable: boolean
}

interface PendingTable {
  readonly result: string
  readonly id: string
  readonly line: number
  readonly header: Header
  readonly keyValues: readonly Value[]
  readonly rows: Row[]
}

function csvError(code: DecodeError['code'], reason: string, line: number): DecodeError {
  return new DecodeError(code, reason, { format: 'annotated-csv', line })
}

// ── Table assembly ─────────────────────────────────────────────

/**
 * Reads annotated CSV records into tables. A blank line or a new annotation
 * row ends the current block; a change of the `result` or `table` cell ends
 * the current table. A block without data rows is one empty table whose
 * result and group key come from `#default`.
 */
export async function* decodeAnnotatedCsv(records: AsyncIterable<CsvRecord>): AsyncGenerator<NamedTable> {
  let annotations: Annotations = {}
  let header: Header | undefined
  let pending: PendingTable | undefined
  let blockRows = 0

  for await (const record of records) {
    if (record.blank) {
      if (pending !== undefined) yield finish(pending)
      else if (header !== undefined && blockRows === 0 && !header.errorTable) yield emptyTable(header)
      pending = undefined
      header = undefined
      annotations = {}
      continue
    }

    const first = record.fields[0] ?? ''
    if (first.startsWith('#')) {
      if (header !== undefined) {
        if (pending !== undefined) yield finish(pending)
        else if (blockRows === 0 && !header.errorTable) yield emptyTable(header)
        pending = undefined
        header = undefined
        annotations = {}
      }
      annotate(annotations, first, record)
      continue
    }
    if (first !== '') {
      throw csvError('MALFORMED_ROW', `expected an empty annotation column, found "${first}"`, record.line)
    }

    if (header === undefined) {
      header = parseHeader(annotations, record)
      blockRows = 0
      continue
    }

    if (header.errorTable) throw resultError(header, record)

    const row = parseRow(header, record)
    blockRows++
    if (pending !== undefined && (pending.result !== row.result || pending.id !== row.id)) {
      yield finish(pending)
      pending = undefined
    }
    if (pending === undefined) {
      pending = { result: row.result, id: row.id, line: record.line, header, keyValues: row.keyValues, rows: [] }
    } else {
      checkKey(pending, row.keyValues, record.line)
    }
    pending.rows.push(row.values)
  }

  if (pending !== undefined) yield finish(pending)
  else if (header !== undefined && blockRows === 0 && !header.errorTable) yield emptyTable(header)
}

function annotate(annotations: Annotations, name: string, record: CsvRecord): void {
  const annotation: Annotation = { line: record.line, values: record.fields.slice(1) }
  switch (name) {
    case '#datatype':
      annotations.datatype = annotation
      return
    case '#group':
      annotations.group = annotation
      return
    case '#default':
      annotations.default = annotation
      return
    default:
      throw csvError('MALFORMED_HEADER', `unknown annotation ${name}`, record.line)
  }
}

function parseHeader(annotations: Annotations, record: CsvRecord): Header {
  const labels = record.fields.slice(1)
  const width = labels.length

  if (labels[0] === 'error' && labels[1] === 'reference' && width === 2) {
    return {
      width,
      defaults: annotations.default?.values ?? ['', ''],
      defaultLine: annotations.default?.line ?? record.line,
      resultIndex: -1,
      tableIndex: -1,
      columns: [],
      fieldIndex: [],
      keyPositions: [],
      keyColumns: [],
      errorTable: true,
    }
  }

  const datatype = annotations.datatype
  if (datatype === undefined) {
    throw csvError('MALFORMED_HEADER', 'header row without a #datatype annotation', record.line)
  }
  for (const annotation of [datatype, annotations.group, annotations.default]) {
    if (annotation !== undefined && annotation.values.length !== width) {
      throw csvError(
        'MALFORMED_HEADER',
        `annotation has ${String(annotation.values.length)} columns, header has ${String(width)}`,
        annotation.line,
      )
    }
  }

  const seen = new Set<string>()
  const columns: ColumnMeta[] = []
  const fieldIndex: number[] = []
  const keyPositions: number[] = []
  const keyColumns: ColumnMeta[] = []
  let resultIndex = -1
  let tableIndex = -1

  labels.forEach((label, i) => {
    if (label === '') throw csvError('MALFORMED_HEADER', `column ${String(i + 1)} has no label`, record.line)
    if (seen.has(label)) throw csvError('MALFORMED_HEADER', `duplicate column ${label}`, record.line)
    seen.add(label)

    if (label === 'result') {
      resultIndex = i
      return
    }
    if (label === 'table') {
      tableIndex = i
      return
    }

    const typeName = datatype.values[i] ?? ''
    const type = TYPE_NAMES.get(typeName)
    if (type === undefined) {
      throw csvError('MALFORMED_HEADER', `unknown datatype "${typeName}" for column ${label}`, datatype.line)
    }
    const column: ColumnMeta = { label, type }
    const group = annotations.group?.values[i] ?? 'false'
    if (group !== 'true' && group !== 'false') {
      const line = annotations.group?.line ?? record.line
      throw csvError('MALFORMED_HEADER', `invalid #group value "${group}" for column ${label}`, line)
    }
    if (group === 'true') {
      keyPositions.push(columns.length)
      keyColumns.push(column)
    }
    columns.push(column)
    fieldIndex.push(i)
  })

  return {
    width,
    defaults: annotations.default?.values ?? labels.map(() => ''),
    defaultLine: annotations.default?.line ?? record.line,
    resultIndex,
    tableIndex,
    columns,
    fieldIndex,
    keyPositions,
    keyColumns,
    errorTable: false,
  }
}

interface ParsedRow {
  readonly result: string
  readonly id: string
  readonly keyValues: readonly Value[]
  readonly values: Row
}

function parseRow(header: Header, record: CsvRecord): ParsedRow {
  const fields = record.fields.slice(1)
  if (fields.length !== header.width) {
    throw csvError(
      'MALFORMED_ROW',
      `row has ${String(fields.length)} columns, header has ${String(header.width)}`,
      record.line,
    )
  }
  const cell = (i: number): string => {
    const text = fields[i] ?? ''
    return text === '' ? (header.defaults[i] ?? '') : text
  }

  const values = header.columns.map((column, position): Value => {
    const text = cell(header.fieldIndex[position] ?? -1)
    if (text === '') return null
    const value = parseCell(text, column.type)
    if (value === undefined) {
      throw csvError('INVALID_VALUE', `invalid ${column.type} "${text}" in column ${column.label}`, record.line)
    }
    return value
  })

  const result = header.resultIndex >= 0 ? cell(header.resultIndex) : ''
  return {
    result: result === '' ? DEFAULT_RESULT : result,
    id: header.tableIndex >= 0 ? cell(header.tableIndex) : '',
    keyValues: header.keyPositions.map((p) => values[p] ?? null),
    values,
  }
}

function checkKey(pending: PendingTable, keyValues: readonly Value[], line: number): void {
  pending.keyValues.forEach((want, i) => {
    const got = keyValues[i] ?? null
    if (!valuesEqual(want, got)) {
      const column = pending.header.keyColumns[i]
      const label = column?.label ?? String(i)
      const type = column?.type ?? 'string'
      throw csvError(
        'GROUP_KEY_MISMATCH',
        `table ${pending.id}: group key column ${label} changed from ${displayValue(want, type)} to ${displayValue(got, type)}`,
        line,
      )
    }
  })
}

function resultError(header: Header, record: CsvRecord): DecodeError {
  const fields = record.fields.slice(1)
  const message = fields[0] !== undefined && fields[0] !== '' ? fields[0] : (header.defaults[0] ?? '')
  return csvError('RESULT_ERROR', message === '' ? 'query returned an error' : message, record.line)
}

function emptyTable(header: Header): NamedTable {
  const result = header.resultIndex >= 0 ? (header.defaults[header.resultIndex] ?? '') : ''
  const keyValues = header.keyPositions.map((position): Value => {
    const column = header.columns[position]
    const text = header.defaults[header.fieldIndex[position] ?? -1] ?? ''
    if (column === undefined || text === '') return null
    const value = parseCell(text, column.type)
    if (value === undefined) {
      throw csvError('INVALID_VALUE', `invalid ${column.type} "${text}" in column ${column.label}`, header.defaultLine)
    }
    return value
  })
  return {
    result: result === '' ? DEFAULT_RESULT : result,
    table: { key: { columns: header.keyColumns, values: keyValues }, columns: header.columns, rows: [] },
  }
}

function finish(pending: PendingTable): NamedTable {
  const { header } = pending
  return {
    result: pending.result,
    table: {
      key: { columns: header.keyColumns, values: pending.keyValues },
      columns: header.columns,
      rows: pending.rows,
    },
  }
}
