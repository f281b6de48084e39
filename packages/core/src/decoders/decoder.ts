import type { Readable } from 'node:stream'
import type { ResultStream } from '@querydiff/model'
import { AnnotatedCsvDecoder } from './annotatedCsv.js'
import { JsonDecoder } from './json.js'

export type FixtureFormat = 'annotated-csv' | 'json'

/**
 * Turns a byte source into a result stream.
 *
 * Error contract:
 * - `decode()` rejects with `DecodeError` when the first table cannot be read;
 *   later failures surface while iterating the stream.
 * - The returned stream owns `input` and destroys it on release.
 */
export interface ResultDecoder {
  readonly format: FixtureFormat
  decode(input: Readable): Promise<ResultStream>
}

const decoders: Record<FixtureFormat, ResultDecoder> = {
  'annotated-csv': new AnnotatedCsvDecoder(),
  json: new JsonDecoder(),
}

export function decoderFor(format: FixtureFormat): ResultDecoder {
  return decoders[format]
}

/** Infers a fixture's format from its file name. */
export function formatForPath(path: string): FixtureFormat {
  return path.toLowerCase().endsWith('.json') ? 'json' : 'annotated-csv'
}
