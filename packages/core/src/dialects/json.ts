import type { Writable } from 'node:stream'
import type { ColumnType, ResultStream, Table, Value } from '@querydiff/model'
import { formatCell, formatTime } from '@querydiff/model'
import { stringify } from 'lossless-json'
import type { JsonDialect, ResultEncoder } from './dialect.js'
import { writeChunk } from './output.js'

// --- JSON Encoder ---

export interface LegacySeries {
  name?: string
  tags?: Record<string, string>
  columns: string[]
  values: (string | number | bigint | boolean | null)[][]
}

/**
 * Writes results in the legacy JSON response format. Results whose name is a
 * non-negative integer keep it as `statement_id`; others are numbered by position.
 */
export class JsonEncoder implements ResultEncoder {
  private readonly dialect: JsonDialect

  constructor(dialect: JsonDialect) {
    this.dialect = dialect
  }

  async encode(stream: ResultStream, out: Writable): Promise<number> {
    const perLine = this.dialect.mode === 'lines'
    let rows = 0
    let ordinal = 0
    try {
      if (!perLine) await writeChunk(out, '{"results":[')
      for await (const result of stream) {
        const statementId = /^\d+$/.test(result.name) ? Number(result.name) : ordinal
        const prefix = `{"statement_id":${String(statementId)},"series":[`
        if (!perLine) await writeChunk(out, `${ordinal > 0 ? ',' : ''}${prefix}`)
        ordinal++

        let count = 0
        for await (const table of result.tables()) {
          const series = encodeSeries(toSeries(table))
          if (perLine) {
            await writeChunk(out, `{"results":[${prefix}${series}]}]}\n`)
          } else {
            await writeChunk(out, `${count > 0 ? ',' : ''}${series}`)
          }
          count++
          rows += table.rows.length
        }
        if (!perLine) await writeChunk(out, ']}')
      }
      if (!perLine) await writeChunk(out, ']}\n')
    } finally {
      await stream.release()
    }
    return rows
  }
}

/**
 * Maps a table onto a series: `_measurement` becomes the name, other key
 * columns become tags (sorted), the rest become columns with `_time` as `time`.
 */
export function toSeries(table: Table): LegacySeries {
  let name: string | undefined
  const tags: [string, string][] = []
  for (const [i, column] of table.key.columns.entries()) {
    const value = table.key.values[i] ?? null
    const text = formatCell(value, column.type)
    if (column.label === '_measurement') name = text
    else tags.push([column.label, text])
  }
  tags.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))

  const keyLabels = new Set(table.key.columns.map((c) => c.label))
  const positions: number[] = []
  const columns: string[] = []
  for (const [i, column] of table.columns.entries()) {
    if (keyLabels.has(column.label)) continue
    positions.push(i)
    columns.push(column.label === '_time' ? 'time' : column.label)
  }

  return {
    ...(name !== undefined ? { name } : {}),
    ...(tags.length > 0 ? { tags: Object.fromEntries(tags) } : {}),
    columns,
    values: table.rows.map((row) => positions.map((i) => jsonValue(row[i] ?? null, table.columns[i]?.type))),
  }
}

/** Integers outside the safe range are written with all their digits. */
function encodeSeries(series: LegacySeries): string {
  const text = stringify(series)
  if (text === undefined) throw new TypeError('series did not serialize')
  return text
}

function jsonValue(value: Value, type: ColumnType | undefined): string | number | bigint | boolean | null {
  if (typeof value === 'bigint') return type === 'dateTime' ? formatTime(value) : value
  if (typeof value === 'number' && !Number.isFinite(value)) return null
  return value
}
