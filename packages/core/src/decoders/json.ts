import type { Readable } from 'node:stream'
import type { ColumnMeta, ColumnType, NamedTable, ResultStream, Row, Value } from '@querydiff/model'
import { DecodeError, openResultStream, parseTime } from '@querydiff/model'
import { parse } from 'lossless-json'
import { z } from 'zod'
import type { FixtureFormat, ResultDecoder } from './decoder.js'
import { readLines } from './lines.js'

// ── Decoder ────────────────────────────────────────────────────

/**
 * Decodes the legacy JSON response format, either one document or one
 * document per line. Each series becomes a table keyed by `_measurement`
 * and its tags; the `time` column becomes `_time`.
 */
export class JsonDecoder implements ResultDecoder {
  readonly format: FixtureFormat = 'json'

  decode(input: Readable): Promise<ResultStream> {
    const tables = decodeJsonTables(readLines(input, this.format))
    return openResultStream(tables, () => {
      input.destroy()
    })
  }
}

// ── Shapes ─────────────────────────────────────────────────────

const seriesSchema = z.object({
  name: z.string().optional(),
  tags: z.record(z.string()).optional(),
  columns: z.array(z.string()),
  values: z.array(z.array(z.unknown())).optional(),
  partial: z.boolean().optional(),
})

const resultSchema = z.object({
  statement_id: z.number().int().nonnegative().optional(),
  series: z.array(seriesSchema).optional(),
  error: z.string().optional(),
  partial: z.boolean().optional(),
})

const envelopeSchema = z.object({
  results: z.array(resultSchema).optional(),
  error: z.string().optional(),
})

type Series = z.infer<typeof seriesSchema>
type LegacyResult = z.infer<typeof resultSchema>

function jsonError(code: DecodeError['code'], reason: string, line: number | undefined, path?: string): DecodeError {
  return new DecodeError(code, reason, { format: 'json', line, path })
}

function validate<S extends z.ZodTypeAny>(schema: S, value: unknown, line: number | undefined): z.infer<S> {
  const parsed = schema.safeParse(value)
  if (parsed.success) return parsed.data
  const issue = parsed.error.issues[0]
  const path = issue?.path.join('.') ?? ''
  const message = issue?.message ?? 'invalid shape'
  return failShape(path === '' ? message : `${path}: ${message}`, line, path)
}

function failShape(reason: string, line: number | undefined, path?: string): never {
  throw jsonError('INVALID_SHAPE', reason, line, path)
}

// ── Framing ────────────────────────────────────────────────────

interface Document {
  readonly value: unknown
  readonly line?: number | undefined
}

type ParseOutcome = { readonly ok: true; readonly value: unknown } | { readonly ok: false; readonly error: Error }

const INTEGER = /^-?\d+$/
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER)

/** Integers beyond the safe range stay exact as bigints. */
function parseNumber(text: string): number | bigint {
  if (INTEGER.test(text)) {
    const n = BigInt(text)
    if (n > MAX_SAFE || n < -MAX_SAFE) return n
  }
  return Number(text)
}

function tryParse(text: string): ParseOutcome {
  try {
    const value = parse(text, null, parseNumber)
    return { ok: true, value }
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err : new Error(String(err)) }
  }
}

/**
 * Yields top-level JSON values. When the first non-blank line parses on its
 * own the input is read as one document per line, otherwise as one document.
 */
async function* documents(lines: AsyncIterable<string>): AsyncGenerator<Document> {
  let mode: 'sniff' | 'lines' | 'document' = 'sniff'
  const buffered: string[] = []
  let lineNo = 0

  for await (const line of lines) {
    lineNo++
    if (mode === 'document') {
      buffered.push(line)
      continue
    }
    if (line.trim() === '') continue

    const parsed = tryParse(line)
    if (parsed.ok) {
      mode = 'lines'
      yield { value: parsed.value, line: lineNo }
    } else if (mode === 'lines') {
      throw jsonError('INVALID_JSON', parsed.error.message, lineNo)
    } else {
      mode = 'document'
      buffered.push(line)
    }
  }

  if (mode !== 'document') return
  const parsed = tryParse(buffered.join('\n'))
  if (!parsed.ok) throw jsonError('INVALID_JSON', parsed.error.message, undefined)
  yield { value: parsed.value }
}

function* expand(value: unknown, line: number | undefined): Generator<LegacyResult> {
  if (Array.isArray(value)) {
    for (const item of value) yield* expand(item, line)
    return
  }
  if (isEnvelope(value)) {
    const envelope = validate(envelopeSchema, value, line)
    if (envelope.error !== undefined) throw jsonError('RESULT_ERROR', envelope.error, line)
    yield* envelope.results ?? []
    return
  }
  yield validate(resultSchema, value, line)
}

function isEnvelope(value: unknown): boolean {
  if (typeof value !== 'object' || value === null) return false
  return 'results' in value || ('error' in value && !('statement_id' in value) && !('series' in value))
}

// ── Tables ─────────────────────────────────────────────────────

interface PendingSeries {
  readonly result: string
  readonly identity: string
  readonly series: Series
  readonly line: number | undefined
  readonly rows: unknown[][]
}

/**
 * Converts legacy results into tables. A series flagged `partial` continues
 * in the next series with the same name and tags. A series without values
 * is a table without rows.
 */
export async function* decodeJsonTables(lines: AsyncIterable<string>): AsyncGenerator<NamedTable> {
  let ordinal = 0
  let pending: PendingSeries | undefined

  for await (const doc of documents(lines)) {
    for (const result of expand(doc.value, doc.line)) {
      const name = String(result.statement_id ?? ordinal)
      ordinal++
      if (result.error !== undefined) throw jsonError('RESULT_ERROR', result.error, doc.line)

      for (const series of result.series ?? []) {
        const identity = seriesIdentity(series)
        if (pending !== undefined && (pending.result !== name || pending.identity !== identity)) {
          yield toTable(pending)
          pending = undefined
        }
        if (pending === undefined) {
          pending = { result: name, identity, series, line: doc.line, rows: [] }
        } else if (pending.series.columns.join('\u0000') !== series.columns.join('\u0000')) {
          failShape(`partial series ${identity} changed its columns`, doc.line)
        }
        for (const row of series.values ?? []) pending.rows.push(row)

        if (series.partial !== true) {
          yield toTable(pending)
          pending = undefined
        }
      }
    }
  }

  if (pending !== undefined) yield toTable(pending)
}

function sortedTags(series: Series): [string, string][] {
  return Object.entries(series.tags ?? {}).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
}

function seriesIdentity(series: Series): string {
  return JSON.stringify([series.name ?? null, sortedTags(series)])
}

function toTable(pending: PendingSeries): NamedTable {
  const { series, line } = pending
  const keyColumns: ColumnMeta[] = []
  const keyValues: Value[] = []
  if (series.name !== undefined) {
    keyColumns.push({ label: '_measurement', type: 'string' })
    keyValues.push(series.name)
  }
  for (const [tag, value] of sortedTags(series)) {
    keyColumns.push({ label: tag, type: 'string' })
    keyValues.push(value)
  }

  const labels = series.columns.map((c) => (c === 'time' ? '_time' : c))
  const seen = new Set(keyColumns.map((c) => c.label))
  for (const label of labels) {
    if (seen.has(label)) failShape(`series ${pending.identity} has duplicate column ${label}`, line)
    seen.add(label)
  }

  pending.rows.forEach((row, i) => {
    if (row.length !== labels.length) {
      failShape(`row ${String(i)} has ${String(row.length)} values, expected ${String(labels.length)}`, line)
    }
  })

  const dataColumns = labels.map((label, j): ColumnMeta => ({ label, type: inferType(label, pending.rows, j, line) }))
  const rows = pending.rows.map(
    (row): Row => [...keyValues, ...dataColumns.map((column, j) => convert(row[j], column, line))],
  )

  return {
    result: pending.result,
    table: {
      key: { columns: keyColumns, values: keyValues },
      columns: [...keyColumns, ...dataColumns],
      rows,
    },
  }
}

function inferType(label: string, rows: readonly unknown[][], j: number, line: number | undefined): ColumnType {
  if (label === '_time') return 'dateTime'
  for (const row of rows) {
    const value = row[j]
    if (value === null || value === undefined) continue
    switch (typeof value) {
      case 'number':
      case 'bigint':
        return 'double'
      case 'string':
        return 'string'
      case 'boolean':
        return 'boolean'
      default:
        throw jsonError('INVALID_VALUE', `column ${label} holds a nested value`, line)
    }
  }
  return 'string'
}

function convert(value: unknown, column: ColumnMeta, line: number | undefined): Value {
  if (value === null || value === undefined) return null
  switch (column.type) {
    case 'dateTime':
      if (typeof value === 'string') {
        const ns = parseTime(value)
        if (ns !== undefined) return ns
      } else if (typeof value === 'number' && Number.isSafeInteger(value)) {
        return BigInt(value)
      } else if (typeof value === 'bigint') {
        return value
      }
      break
    case 'double':
      if (typeof value === 'number') return value
      if (typeof value === 'bigint') return Number(value)
      break
    case 'string':
      if (typeof value === 'string') return value
      break
    case 'boolean':
      if (typeof value === 'boolean') return value
      break
    default:
      break
  }
  const text = typeof value === 'bigint' ? value.toString() : JSON.stringify(value)
  throw jsonError('INVALID_VALUE', `column ${column.label}: expected ${column.type}, got ${text}`, line)
}
