import { StreamError } from './errors.js'
import type { BufferedResult, Result, ResultStream, Table } from './types/table.js'

/** A decoded table tagged with the name of the result it belongs to. */
export interface NamedTable {
  readonly result: string
  readonly table: Table
}

export type ReleaseFn = () => Promise<void> | void

// --- Construction ---

/**
 * Groups a forward-only source of tables into results. Consecutive tables
 * with the same result name form one result.
 */
export function createResultStream(source: AsyncIterator<NamedTable>, release: ReleaseFn): ResultStream {
  return new SequencedResultStream(source, release)
}

/**
 * Like `createResultStream`, but reads the first table before resolving.
 * A failure at that point releases the source and rejects, so callers never
 * receive a stream that is broken from the start.
 */
export async function openResultStream(source: AsyncIterator<NamedTable>, release: ReleaseFn): Promise<ResultStream> {
  const stream = new SequencedResultStream(source, release)
  try {
    await stream.peek()
  } catch (err) {
    await stream.release()
    throw err
  }
  return stream
}

export function fromBufferedResults(results: readonly BufferedResult[]): ResultStream {
  return new SequencedResultStream(namedTables(results), () => {})
}

async function* namedTables(results: readonly BufferedResult[]): AsyncGenerator<NamedTable> {
  for (const result of results) {
    for (const table of result.tables) {
      yield { result: result.name, table }
    }
  }
}

// --- Buffering ---

/**
 * Drains a stream into memory. The stream is released on every exit path.
 */
export async function bufferResults(stream: ResultStream): Promise<BufferedResult[]> {
  const out: BufferedResult[] = []
  try {
    for await (const result of stream) {
      const tables: Table[] = []
      for await (const table of result.tables()) {
        tables.push(table)
      }
      out.push({ name: result.name, tables })
    }
  } finally {
    await stream.release()
  }
  return out
}

// --- Implementation ---

interface TableCursor {
  peek(): Promise<NamedTable | undefined>
  advance(): void
}

class SequencedResultStream implements ResultStream, TableCursor {
  private readonly source: AsyncIterator<NamedTable>
  private readonly onRelease: ReleaseFn
  private head: NamedTable | undefined
  private exhausted = false
  private reading = false
  private consumed = false
  private releasing: Promise<void> | undefined

  constructor(source: AsyncIterator<NamedTable>, onRelease: ReleaseFn) {
    this.source = source
    this.onRelease = onRelease
  }

  get released(): boolean {
    return this.releasing !== undefined
  }

  release(): Promise<void> {
    if (this.releasing === undefined) {
      this.releasing = this.close()
    }
    return this.releasing
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Result> {
    if (this.consumed) throw new StreamError('ALREADY_CONSUMED')
    if (this.released) throw new StreamError('RELEASED')
    this.consumed = true

    try {
      for (;;) {
        const first = await this.peek()
        if (first === undefined) return

        const result = new CursorResult(first.result, this)
        yield result
        result.close()

        // skip whatever the consumer left unread
        for (let next = await this.peek(); next !== undefined && next.result === first.result; next = await this.peek()) {
          this.advance()
        }
      }
    } finally {
      await this.release()
    }
  }

  async peek(): Promise<NamedTable | undefined> {
    if (this.head !== undefined) return this.head
    if (this.exhausted) return undefined

    this.reading = true
    try {
      const next = await this.source.next()
      if (next.done === true) {
        this.exhausted = true
        return undefined
      }
      this.head = next.value
      return next.value
    } catch (err) {
      this.exhausted = true
      throw err
    } finally {
      this.reading = false
    }
  }

  advance(): void {
    this.head = undefined
  }

  private async close(): Promise<void> {
    const idle = !this.reading
    this.exhausted = true
    this.head = undefined
    try {
      if (idle) await this.source.return?.()
    } finally {
      await this.onRelease()
    }
  }
}

class CursorResult implements Result {
  readonly name: string
  private readonly cursor: TableCursor
  private opened = false
  private closed = false

  constructor(name: string, cursor: TableCursor) {
    this.name = name
    this.cursor = cursor
  }

  tables(): AsyncIterable<Table> {
    if (this.opened) throw new StreamError('ALREADY_CONSUMED')
    this.opened = true
    return this.iterate()
  }

  close(): void {
    this.closed = true
  }

  private async *iterate(): AsyncGenerator<Table> {
    for (;;) {
      if (this.closed) return
      const next = await this.cursor.peek()
      if (next === undefined || next.result !== this.name) return
      this.cursor.advance()
      yield next.table
    }
  }
}
