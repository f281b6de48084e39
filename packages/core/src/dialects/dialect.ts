import type { Writable } from 'node:stream'
import type { ResultStream } from '@querydiff/model'
import { AnnotatedCsvEncoder } from './annotatedCsv.js'
import { JsonEncoder } from './json.js'

// --- Dialects ---

export type CsvAnnotation = 'datatype' | 'group' | 'default'

export interface AnnotatedCsvDialect {
  readonly kind: 'annotated-csv'
  readonly annotations: readonly CsvAnnotation[]
  /** Emit the header row. Without it the output is only fit for raw comparison. */
  readonly header: boolean
}

export interface JsonDialect {
  readonly kind: 'json'
  /** `document` writes a single envelope, `lines` one envelope per table. */
  readonly mode: 'document' | 'lines'
}

export type Dialect = AnnotatedCsvDialect | JsonDialect

export function csvDialect(annotations: readonly CsvAnnotation[] = ['datatype', 'group', 'default']): AnnotatedCsvDialect {
  return { kind: 'annotated-csv', annotations, header: true }
}

export function jsonDialect(mode: JsonDialect['mode'] = 'document'): JsonDialect {
  return { kind: 'json', mode }
}

// --- Encoder ---

/**
 * Serializes a result stream.
 *
 * Error contract:
 * - `encode()` resolves with the number of rows written and releases the
 *   stream on every exit path.
 * - `out` is left open; ending it is the caller's job.
 */
export interface ResultEncoder {
  encode(stream: ResultStream, out: Writable): Promise<number>
}

export function encoderFor(dialect: Dialect): ResultEncoder {
  switch (dialect.kind) {
    case 'annotated-csv':
      return new AnnotatedCsvEncoder(dialect)
    case 'json':
      return new JsonEncoder(dialect)
  }
}
