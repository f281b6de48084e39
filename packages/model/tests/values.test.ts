import { describe, expect, it } from 'vitest'
import { compareValues, displayValue, formatCell, formatTime, parseCell, parseTime, valuesEqual } from '../src/index.js'

describe('time', () => {
  it('parses RFC3339 with nanoseconds', () => {
    expect(parseTime('1970-01-01T00:00:01.000000002Z')).toBe(1_000_000_002n)
  })

  it('applies zone offsets', () => {
    expect(parseTime('1970-01-01T01:00:00+01:00')).toBe(0n)
  })

  it('rejects malformed timestamps', () => {
    expect(parseTime('2018-13-01T00:00:00Z')).toBeUndefined()
    expect(parseTime('yesterday')).toBeUndefined()
  })

  it('rejects days past the end of the month', () => {
    expect(parseTime('2020-02-31T00:00:00Z')).toBeUndefined()
    expect(parseTime('2019-02-29T00:00:00Z')).toBeUndefined()
    expect(parseTime('2021-04-31T00:00:00Z')).toBeUndefined()
    expect(parseTime('2020-02-29T00:00:00Z')).toBe(1_582_934_400_000_000_000n)
  })

  it('keeps two-digit years as written', () => {
    expect(parseTime('0099-12-31T23:59:59Z')).toBe(-59_011_459_201_000_000_000n)
    expect(formatTime(-59_011_459_201_000_000_000n)).toBe('0099-12-31T23:59:59Z')
  })

  it('formats with a trimmed fraction', () => {
    expect(formatTime(1_500_000_000n)).toBe('1970-01-01T00:00:01.5Z')
    expect(formatTime(0n)).toBe('1970-01-01T00:00:00Z')
  })

  it('formats times before the epoch', () => {
    expect(formatTime(-1n)).toBe('1969-12-31T23:59:59.999999999Z')
  })
})

describe('cells', () => {
  it('parses each column type', () => {
    expect(parseCell('42', 'long')).toBe(42n)
    expect(parseCell('-42', 'unsignedLong')).toBeUndefined()
    expect(parseCell('1.5e3', 'double')).toBe(1500)
    expect(parseCell('+Inf', 'double')).toBe(Number.POSITIVE_INFINITY)
    expect(parseCell('true', 'boolean')).toBe(true)
    expect(parseCell('yes', 'boolean')).toBeUndefined()
    expect(parseCell('1.5', 'long')).toBeUndefined()
    expect(parseCell('2018-05-22T19:53:26Z', 'dateTime')).toBe(1_527_018_806_000_000_000n)
  })

  it('reads integers exactly across the 64-bit range', () => {
    expect(parseCell('9223372036854775807', 'long')).toBe(9_223_372_036_854_775_807n)
    expect(parseCell('-9223372036854775808', 'long')).toBe(-9_223_372_036_854_775_808n)
    expect(parseCell('9223372036854775808', 'long')).toBeUndefined()
    expect(parseCell('18446744073709551615', 'unsignedLong')).toBe(18_446_744_073_709_551_615n)
    expect(parseCell('18446744073709551616', 'unsignedLong')).toBeUndefined()
  })

  it('formats cells', () => {
    expect(formatCell(null, 'double')).toBe('')
    expect(formatCell(Number.NaN, 'double')).toBe('NaN')
    expect(formatCell(Number.NEGATIVE_INFINITY, 'double')).toBe('-Inf')
    expect(formatCell(false, 'boolean')).toBe('false')
    expect(formatCell(2.25, 'double')).toBe('2.25')
  })

  it('formats bigints by column type', () => {
    expect(formatCell(9_223_372_036_854_775_807n, 'long')).toBe('9223372036854775807')
    expect(formatCell(1_500_000_000n, 'dateTime')).toBe('1970-01-01T00:00:01.5Z')
  })

  it('displays strings quoted', () => {
    expect(displayValue('a', 'string')).toBe('"a"')
    expect(displayValue(null, 'string')).toBe('null')
    expect(displayValue(7n, 'long')).toBe('7')
  })
})

describe('equality and order', () => {
  it('treats NaN as equal to NaN', () => {
    expect(valuesEqual(Number.NaN, Number.NaN)).toBe(true)
    expect(valuesEqual(1, 1.0000001)).toBe(false)
  })

  it('orders null first', () => {
    const values = ['b', null, 'a']
    expect([...values].sort(compareValues)).toEqual([null, 'a', 'b'])
  })

  it('orders times and numbers naturally', () => {
    expect(compareValues(2n, 10n)).toBe(-1)
    expect(compareValues(10, 2)).toBe(1)
    expect(compareValues(false, true)).toBe(-1)
  })

  it('orders numbers and bigints on one scale', () => {
    expect(compareValues(2.5, 2n)).toBe(1)
    expect(compareValues(2, 2n)).toBe(0)
    expect(compareValues(3n, 3.5)).toBe(-1)
    expect(compareValues(Number.NaN, -9_223_372_036_854_775_808n)).toBe(-1)
    expect(compareValues(9_007_199_254_740_993n, 9_007_199_254_740_992)).toBe(1)
  })

  it('compares 64-bit integers exactly', () => {
    expect(valuesEqual(9_223_372_036_854_775_807n, 9_223_372_036_854_775_806n)).toBe(false)
    expect(valuesEqual(9_223_372_036_854_775_807n, 9_223_372_036_854_775_807n)).toBe(true)
  })
})
