import type { Value } from '@querydiff/model'
import type { FixtureFormat } from '../decoders/decoder.js'
import type { Dialect } from '../dialects/dialect.js'

// --- Source ---

export type QueryLanguage = 'tql' | 'lql'

export type PlanSource =
  | { readonly kind: 'bucket'; readonly bucket: string }
  | { readonly kind: 'fixture'; readonly path: string; readonly format: FixtureFormat }

// --- Operations ---

export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>='

export interface Predicate {
  readonly column: string
  readonly operator: ComparisonOperator
  readonly value: Exclude<Value, null>
}

export type AggregateFn = 'count' | 'sum' | 'mean' | 'min' | 'max' | 'first' | 'last'

export const AGGREGATE_FNS: readonly AggregateFn[] = ['count', 'sum', 'mean', 'min', 'max', 'first', 'last']

export type Operation =
  /** Keeps rows with `start <= _time < stop`. */
  | { readonly op: 'range'; readonly start: bigint; readonly stop?: bigint | undefined }
  /** Keeps rows matching every predicate. */
  | { readonly op: 'filter'; readonly predicates: readonly Predicate[] }
  | { readonly op: 'group'; readonly columns: readonly string[] }
  | { readonly op: 'keep'; readonly columns: readonly string[] }
  | { readonly op: 'rename'; readonly columns: Readonly<Record<string, string>> }
  | { readonly op: 'sort'; readonly columns: readonly string[]; readonly desc: boolean }
  | { readonly op: 'limit'; readonly n: number }
  | { readonly op: 'aggregate'; readonly fn: AggregateFn; readonly column: string; readonly as: string }

// --- Plan ---

/**
 * A compiled query: where rows come from, what to do with them and how to
 * encode the output. Plans are plain data and compare with deep equality.
 */
export interface Plan {
  readonly language: QueryLanguage
  readonly source: PlanSource
  readonly operations: readonly Operation[]
  readonly dialect: Dialect
}

export function isAggregateFn(name: string): name is AggregateFn {
  return AGGREGATE_FNS.some((fn) => fn === name)
}

const INTEGER = /^-?\d+$/

/** Integer literals beyond the double's exact range stay exact as bigint. */
export function numberLiteral(text: string): number | bigint {
  const n = Number(text)
  return INTEGER.test(text) && !Number.isSafeInteger(n) ? BigInt(text) : n
}
