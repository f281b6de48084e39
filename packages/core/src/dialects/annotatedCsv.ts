import type { Writable } from 'node:stream'
import type { ColumnType, ResultStream, Table } from '@querydiff/model'
import { formatCell } from '@querydiff/model'
import type { AnnotatedCsvDialect, CsvAnnotation, ResultEncoder } from './dialect.js'
import { writeChunk } from './output.js'

// --- Annotated CSV Encoder ---

export class AnnotatedCsvEncoder implements ResultEncoder {
  private readonly dialect: AnnotatedCsvDialect

  constructor(dialect: AnnotatedCsvDialect) {
    this.dialect = dialect
  }

  async encode(stream: ResultStream, out: Writable): Promise<number> {
    const writer = new CsvBlockWriter(this.dialect)
    let rows = 0
    try {
      for await (const result of stream) {
        for await (const table of result.tables()) {
          await writeChunk(out, writer.render(result.name, table))
          rows += table.rows.length
        }
      }
    } finally {
      await stream.release()
    }
    return rows
  }
}

// --- Block writer ---

const ANNOTATION_ORDER: readonly CsvAnnotation[] = ['datatype', 'group', 'default']

/**
 * Renders tables one at a time. Consecutive tables with the same columns,
 * group key and (when `#default` is written) result share one block.
 * Table ids restart at 0 for every result. A table without rows gets a block
 * of its own whose `#default` row carries its table id and group key.
 */
export class CsvBlockWriter {
  private readonly dialect: AnnotatedCsvDialect
  private signature: string | undefined
  private result: string | undefined
  private tableId = 0
  private written = false

  constructor(dialect: AnnotatedCsvDialect) {
    this.dialect = dialect
  }

  render(resultName: string, table: Table): string {
    if (resultName !== this.result) {
      this.result = resultName
      this.tableId = 0
    }

    const withDefault = this.dialect.annotations.includes('default')
    const keyLabels = new Set(table.key.columns.map((c) => c.label))
    const flags = table.columns.map((c) => keyLabels.has(c.label))
    const signature = JSON.stringify([withDefault ? resultName : null, table.columns, flags])

    const lines: string[][] = []
    if (table.rows.length === 0) {
      if (this.written) lines.push([])
      this.written = true
      this.signature = undefined
      lines.push(...this.blockHeader(resultName, table, flags, true))
      this.tableId++
      return render(lines)
    }
    if (signature !== this.signature) {
      if (this.written) lines.push([])
      this.written = true
      this.signature = signature
      lines.push(...this.blockHeader(resultName, table, flags, false))
    }

    const resultCell = withDefault ? '' : resultName
    const id = String(this.tableId)
    for (const row of table.rows) {
      lines.push(['', resultCell, id, ...table.columns.map((c, i) => formatCell(row[i] ?? null, c.type))])
    }
    this.tableId++

    return render(lines)
  }

  private blockHeader(resultName: string, table: Table, flags: readonly boolean[], empty: boolean): string[][] {
    const lines: string[][] = []
    for (const annotation of ANNOTATION_ORDER) {
      if (!this.dialect.annotations.includes(annotation)) continue
      switch (annotation) {
        case 'datatype':
          lines.push(['#datatype', 'string', 'long', ...table.columns.map((c) => typeName(c.type))])
          break
        case 'group':
          lines.push(['#group', 'false', 'false', ...flags.map(String)])
          break
        case 'default':
          lines.push(['#default', resultName, empty ? String(this.tableId) : '', ...this.keyDefaults(table, empty)])
          break
      }
    }
    if (this.dialect.header) {
      lines.push(['', 'result', 'table', ...table.columns.map((c) => c.label)])
    }
    return lines
  }

  private keyDefaults(table: Table, empty: boolean): string[] {
    return table.columns.map((column) => {
      const i = table.key.columns.findIndex((c) => c.label === column.label)
      return empty && i >= 0 ? formatCell(table.key.values[i] ?? null, column.type) : ''
    })
  }
}

function render(lines: readonly string[][]): string {
  return lines.map((fields) => `${fields.map(escapeField).join(',')}\n`).join('')
}

function typeName(type: ColumnType): string {
  return type === 'dateTime' ? 'dateTime:RFC3339' : type
}

function escapeField(field: string): string {
  return /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field
}
