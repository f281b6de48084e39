import { StringDecoder } from 'node:string_decoder'
import { DecodeError, QueryDiffError, toError } from '@querydiff/model'
import type { FixtureFormat } from './decoder.js'

/**
 * Splits a byte stream into lines as chunks arrive. `\r\n` and `\n` both end a line.
 * Read failures surface as `DecodeError` (`READ_FAILED`) unless they already
 * carry a harness error code.
 */
export async function* readLines(input: AsyncIterable<unknown>, format: FixtureFormat): AsyncGenerator<string> {
  const decoder = new StringDecoder('utf8')
  let pending = ''
  try {
    for await (const chunk of input) {
      pending += decodeChunk(decoder, chunk)
      const parts = pending.split('\n')
      pending = parts.pop() ?? ''
      for (const part of parts) {
        yield stripCr(part)
      }
    }
  } catch (err) {
    if (err instanceof QueryDiffError) throw err
    const cause = toError(err)
    throw new DecodeError('READ_FAILED', cause.message, { format }, cause)
  }
  pending += decoder.end()
  if (pending.length > 0) yield stripCr(pending)
}

function decodeChunk(decoder: StringDecoder, chunk: unknown): string {
  if (typeof chunk === 'string') return chunk
  if (Buffer.isBuffer(chunk)) return decoder.write(chunk)
  if (chunk instanceof Uint8Array) return decoder.write(Buffer.from(chunk))
  throw new TypeError(`Unsupported chunk type: ${typeof chunk}`)
}

function stripCr(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line
}

// --- CSV records ---

export interface CsvRecord {
  /** 1-based line on which the record starts. */
  readonly line: number
  readonly fields: readonly string[]
  readonly blank: boolean
}

/**
 * Tokenizes lines into CSV records. Quoted fields may contain commas,
 * doubled quotes and line breaks.
 */
export async function* readCsvRecords(lines: AsyncIterable<string>): AsyncGenerator<CsvRecord> {
  let lineNo = 0
  let start = 0
  let fields: string[] = []
  let field = ''
  let quoted = false

  for await (const line of lines) {
    lineNo++
    if (quoted) {
      field += '\n'
    } else {
      start = lineNo
      if (line.trim().length === 0) {
        yield { line: lineNo, fields: [], blank: true }
        continue
      }
    }

    for (let i = 0; i < line.length; i++) {
      const ch = line.charAt(i)
      if (quoted) {
        if (ch !== '"') {
          field += ch
        } else if (line.charAt(i + 1) === '"') {
          field += '"'
          i++
        } else {
          quoted = false
        }
      } else if (ch === '"') {
        quoted = true
      } else if (ch === ',') {
        fields.push(field)
        field = ''
      } else {
        field += ch
      }
    }

    if (!quoted) {
      fields.push(field)
      yield { line: start, fields, blank: false }
      fields = []
      field = ''
    }
  }

  if (quoted) {
    throw new DecodeError('MALFORMED_ROW', 'unterminated quoted field', { format: 'annotated-csv', line: start })
  }
}
