// --- Values ---

export type ColumnType = 'boolean' | 'long' | 'unsignedLong' | 'double' | 'string' | 'dateTime'

/**
 * A single cell. `dateTime` cells are nanoseconds since the Unix epoch,
 * every other numeric type is a `number`.
 */
export type Value = null | boolean | number | string | bigint

export type Row = readonly Value[]

// --- Tables ---

export interface ColumnMeta {
  readonly label: string
  readonly type: ColumnType
}

/**
 * The columns shared by every row of a table, with their values.
 * `columns[i]` holds `values[i]`.
 */
export interface GroupKey {
  readonly columns: readonly ColumnMeta[]
  readonly values: readonly Value[]
}

export interface Table {
  readonly key: GroupKey
  readonly columns: readonly ColumnMeta[]
  readonly rows: readonly Row[]
}

// --- Results ---

/**
 * One named result of a query. `tables()` may be iterated once,
 * and only while the owning stream is positioned on this result.
 */
export interface Result {
  readonly name: string
  tables(): AsyncIterable<Table>
}

/**
 * Forward-only sequence of results backed by an open byte source.
 *
 * Iterating to the end, or leaving the loop early, releases the source.
 * `release()` may be called any number of times; the source is closed once.
 */
export interface ResultStream extends AsyncIterable<Result> {
  readonly released: boolean
  release(): Promise<void>
}

export interface BufferedResult {
  readonly name: string
  readonly tables: readonly Table[]
}
