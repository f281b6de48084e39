import type { ColumnType, Value } from './types/table.js'

// --- Time ---

const NS_PER_SECOND = 1_000_000_000n
const NS_PER_MS = 1_000_000n

const RFC3339 = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:\d{2})$/

/**
 * Parses an RFC3339 timestamp with up to nanosecond precision into
 * nanoseconds since the epoch. Returns undefined when the text is not a timestamp.
 */
export function parseTime(text: string): bigint | undefined {
  const m = RFC3339.exec(text)
  if (m === null) return undefined
  const [, y, mo, d, h, mi, s, frac, zone] = m
  if (y === undefined || mo === undefined || d === undefined || h === undefined) return undefined
  if (mi === undefined || s === undefined || zone === undefined) return undefined

  const year = Number(y)
  const month = Number(mo)
  const day = Number(d)
  const hour = Number(h)
  const minute = Number(mi)
  const second = Number(s)
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return undefined
  if (hour > 23 || minute > 59 || second > 59) return undefined

  // setUTCFullYear keeps years 0-99 as written
  const date = new Date(0)
  date.setUTCFullYear(year, month - 1, day)
  date.setUTCHours(hour, minute, second, 0)
  let ms = date.getTime()
  if (zone !== 'Z') {
    const sign = zone.startsWith('-') ? -1 : 1
    const offsetMinutes = Number(zone.slice(1, 3)) * 60 + Number(zone.slice(4, 6))
    ms -= sign * offsetMinutes * 60_000
  }

  const fraction = frac === undefined ? 0n : BigInt(frac.padEnd(9, '0'))
  return BigInt(ms) * NS_PER_MS + fraction
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0) ? 29 : 28
  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31
}

/**
 * Formats nanoseconds since the epoch as RFC3339 in UTC, keeping only the
 * significant digits of the fraction.
 */
export function formatTime(ns: bigint): string {
  let seconds = ns / NS_PER_SECOND
  let fraction = ns % NS_PER_SECOND
  if (fraction < 0n) {
    fraction += NS_PER_SECOND
    seconds -= 1n
  }
  const base = new Date(Number(seconds) * 1000).toISOString().slice(0, 19)
  if (fraction === 0n) return `${base}Z`
  return `${base}.${fraction.toString().padStart(9, '0').replace(/0+$/, '')}Z`
}

// --- Cells ---

const LONG = /^-?\d+$/
const UNSIGNED = /^\d+$/
const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n
const UINT64_MAX = 2n ** 64n - 1n
const FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

/**
 * Parses the text of a non-empty cell. Returns undefined when the text is not
 * a valid value of the given type. `long` and `unsignedLong` are exact
 * bigints over the full 64-bit range, as are `dateTime` nanoseconds.
 */
export function parseCell(text: string, type: ColumnType): Value | undefined {
  switch (type) {
    case 'string':
      return text
    case 'boolean':
      if (text === 'true') return true
      if (text === 'false') return false
      return undefined
    case 'long': {
      if (!LONG.test(text)) return undefined
      const n = BigInt(text)
      return n >= INT64_MIN && n <= INT64_MAX ? n : undefined
    }
    case 'unsignedLong': {
      if (!UNSIGNED.test(text)) return undefined
      const n = BigInt(text)
      return n <= UINT64_MAX ? n : undefined
    }
    case 'double':
      if (text === 'NaN') return Number.NaN
      if (text === '+Inf' || text === 'Inf') return Number.POSITIVE_INFINITY
      if (text === '-Inf') return Number.NEGATIVE_INFINITY
      return FLOAT.test(text) ? Number(text) : undefined
    case 'dateTime':
      return parseTime(text)
  }
}

/** Renders a value as cell text. Bigints are times only in `dateTime` columns. */
export function formatCell(value: Value, type: ColumnType): string {
  if (value === null) return ''
  if (typeof value === 'bigint') return type === 'dateTime' ? formatTime(value) : value.toString()
  if (typeof value === 'number') {
    if (Number.isNaN(value)) return 'NaN'
    if (value === Number.POSITIVE_INFINITY) return '+Inf'
    if (value === Number.NEGATIVE_INFINITY) return '-Inf'
    return String(value)
  }
  return String(value)
}

/** Human-readable rendering used in mismatch descriptions. */
export function displayValue(value: Value, type: ColumnType): string {
  if (value === null) return 'null'
  if (typeof value === 'string') return JSON.stringify(value)
  return formatCell(value, type)
}

// --- Equality & ordering ---

export function valuesEqual(a: Value, b: Value): boolean {
  if (typeof a === 'number' && typeof b === 'number' && Number.isNaN(a) && Number.isNaN(b)) return true
  return a === b
}

const TYPE_RANK: Record<string, number> = { boolean: 1, number: 2, bigint: 2, string: 4 }

/**
 * Total order over values: null first, then by kind, then naturally. Numbers
 * and bigints share one numeric order, with NaN below everything else.
 */
export function compareValues(a: Value, b: Value): number {
  if (a === null || b === null) {
    if (a === b) return 0
    return a === null ? -1 : 1
  }
  const ra = TYPE_RANK[typeof a] ?? 0
  const rb = TYPE_RANK[typeof b] ?? 0
  if (ra !== rb) return ra - rb
  if (typeof a === 'number' && typeof b === 'number') {
    if (Number.isNaN(a) || Number.isNaN(b)) return Number.isNaN(a) ? (Number.isNaN(b) ? 0 : -1) : 1
    return a < b ? -1 : a > b ? 1 : 0
  }
  if (typeof a === 'bigint' && typeof b === 'bigint') return a < b ? -1 : a > b ? 1 : 0
  if (typeof a === 'number' && typeof b === 'bigint') return compareMixed(a, b)
  if (typeof a === 'bigint' && typeof b === 'number') return -compareMixed(b, a)
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b)
  const sa = String(a)
  const sb = String(b)
  return sa < sb ? -1 : sa > sb ? 1 : 0
}

function compareMixed(a: number, b: bigint): number {
  if (Number.isNaN(a) || a === Number.NEGATIVE_INFINITY) return -1
  if (a === Number.POSITIVE_INFINITY) return 1
  const whole = BigInt(Math.floor(a))
  if (whole !== b) return whole < b ? -1 : 1
  return Number.isInteger(a) ? 0 : 1
}
