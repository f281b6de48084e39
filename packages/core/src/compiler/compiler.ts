import { CompileError, toError } from '@querydiff/model'
import type { FixtureFormat } from '../decoders/decoder.js'
import { formatForPath } from '../decoders/decoder.js'
import type { Dialect } from '../dialects/dialect.js'
import type { MappingService } from '../types/interfaces.js'
import { transpileLql } from './lql.js'
import type { Plan, PlanSource, QueryLanguage } from './plan.js'
import type { TqlQuery } from './tql.js'
import { parseTql } from './tql.js'

// ── Compilers ──────────────────────────────────────────────────

/** Compiles pipe-forward queries directly. */
export interface NativeCompiler {
  readonly kind: 'native'
}

/** Translates legacy queries, resolving buckets through a mapping service. */
export interface TranspilingCompiler {
  readonly kind: 'transpiling'
  readonly cluster: string
  readonly database?: string | undefined
  readonly mappings: MappingService
}

export type Compiler = NativeCompiler | TranspilingCompiler

export function languageOf(compiler: Compiler): QueryLanguage {
  return compiler.kind === 'native' ? 'tql' : 'lql'
}

// ── compile ────────────────────────────────────────────────────

export interface InputOverride {
  readonly path: string
  /** Inferred from the file name when omitted. */
  readonly format?: FixtureFormat | undefined
}

export interface CompileRequest {
  readonly compiler: Compiler
  readonly query: string
  readonly dialect: Dialect
  /** Reads rows from a fixture file instead of the bucket the query names. */
  readonly input?: InputOverride | undefined
}

/**
 * Compiles a query into a plan. Has no side effects apart from mapping
 * lookups; every failure is a `CompileError`.
 */
export async function compile(request: CompileRequest): Promise<Plan> {
  const language = languageOf(request.compiler)
  let query: TqlQuery
  try {
    query =
      request.compiler.kind === 'native'
        ? parseTql(request.query)
        : await transpileLql(request.query, request.compiler)
  } catch (err) {
    if (err instanceof CompileError) throw err
    const cause = toError(err)
    throw new CompileError('PARSE_FAILED', cause.message, { language }, cause)
  }

  return {
    language,
    source: planSource(query.bucket, request.input),
    operations: query.operations,
    dialect: request.dialect,
  }
}

function planSource(bucket: string, input: InputOverride | undefined): PlanSource {
  if (input === undefined) return { kind: 'bucket', bucket }
  return { kind: 'fixture', path: input.path, format: input.format ?? formatForPath(input.path) }
}
