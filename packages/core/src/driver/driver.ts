import { PassThrough } from 'node:stream'
import { text } from 'node:stream/consumers'
import type { CompareOptions, ResultStream } from '@querydiff/model'
import { ComparisonMismatchError, QueryDiffError, toError } from '@querydiff/model'
import type { ComparisonVerdict } from '../compare/comparator.js'
import { compareResults } from '../compare/comparator.js'
import { unifiedDiff } from '../compare/diff.js'
import type { Compiler } from '../compiler/compiler.js'
import { compile } from '../compiler/compiler.js'
import type { Plan, QueryLanguage } from '../compiler/plan.js'
import type { DebugLogEntry } from '../debug/logger.js'
import { debugEntry, withDebugLog } from '../debug/logger.js'
import { decoderFor } from '../decoders/decoder.js'
import type { Dialect } from '../dialects/dialect.js'
import type { MappingService, QueryExecutor } from '../types/interfaces.js'
import { fixtureExists, openFixture, readFixtureText } from './fixtures.js'
import type { SkipRegistry } from './skips.js'
import { createSkipRegistry } from './skips.js'

// ── Public Types ───────────────────────────────────────────────

/**
 * One golden-file case: a query, the input rows it runs over and the output
 * it must produce under `dialect`.
 */
export interface GoldenCase {
  /** Key in the skip registry. */
  readonly name: string
  readonly language: QueryLanguage
  readonly queryPath: string
  readonly inputPath: string
  readonly expectedPath: string
  readonly dialect: Dialect
}

export type CaseOutcome =
  | { readonly status: 'pass' }
  | { readonly status: 'skip'; readonly reason: string }
  | { readonly status: 'fail'; readonly error: QueryDiffError }

export interface CaseReport {
  readonly name: string
  readonly language: QueryLanguage
  readonly dialect: Dialect['kind']
  readonly outcome: CaseOutcome
  readonly debugLog?: readonly DebugLogEntry[] | undefined
}

export type CompareMode = 'decoded' | 'raw'

export interface GoldenDriverOptions {
  readonly executor: QueryExecutor
  readonly mappings: MappingService
  /** Cluster and default database used to transpile legacy queries. */
  readonly cluster: string
  readonly database?: string | undefined
  readonly skips?: SkipRegistry | undefined
  readonly compare?: CompareOptions | undefined
  readonly debug?: boolean | undefined
}

export interface GoldenDriver {
  /** Runs a case and compares decoded results. */
  runCase(goldenCase: GoldenCase): Promise<CaseReport>
  /** Runs a case and compares output text after trimming surrounding whitespace. */
  runRawCase(goldenCase: GoldenCase): Promise<CaseReport>
  runAll(cases: readonly GoldenCase[], mode?: CompareMode): Promise<CaseReport[]>
}

export const SKIP_QUERY_MISSING = 'query file is missing'
export const SKIP_EXPECTED_MISSING = 'expected output is missing'

// ── createGoldenDriver ─────────────────────────────────────────

export function createGoldenDriver(options: GoldenDriverOptions): GoldenDriver {
  const skips = options.skips ?? createSkipRegistry()

  const compilerFor = (language: QueryLanguage): Compiler =>
    language === 'tql'
      ? { kind: 'native' }
      : { kind: 'transpiling', cluster: options.cluster, database: options.database, mappings: options.mappings }

  async function run(goldenCase: GoldenCase, mode: CompareMode): Promise<CaseReport> {
    const log: DebugLogEntry[] | undefined = options.debug === true ? [] : undefined
    let outcome: CaseOutcome
    try {
      outcome = await runSteps(goldenCase, mode, log)
    } catch (err) {
      outcome = { status: 'fail', error: asHarnessError(err) }
    }
    return {
      name: goldenCase.name,
      language: goldenCase.language,
      dialect: goldenCase.dialect.kind,
      outcome,
      ...(log !== undefined && log.length > 0 ? { debugLog: log } : {}),
    }
  }

  async function runSteps(
    goldenCase: GoldenCase,
    mode: CompareMode,
    log: DebugLogEntry[] | undefined,
  ): Promise<CaseOutcome> {
    // 1. Skip registry
    const reason = skips.reasonFor(goldenCase.name)
    if (reason !== undefined) {
      log?.push(debugEntry('skip-check', `Skipped: ${reason}`, 0))
      return skip(reason)
    }

    // 2. Fixtures
    const query = await withDebugLog(log, 'fixture', 'Query read', () => readFixtureText(goldenCase.queryPath))
    if (query === undefined) return skip(SKIP_QUERY_MISSING)
    if (!(await fixtureExists(goldenCase.expectedPath))) return skip(SKIP_EXPECTED_MISSING)

    // 3. Compile
    const plan = await withDebugLog(
      log,
      'compile',
      'Compiled',
      () =>
        compile({
          compiler: compilerFor(goldenCase.language),
          query,
          dialect: goldenCase.dialect,
          input: { path: goldenCase.inputPath },
        }),
      (p) => ({ source: p.source, operations: p.operations.length }),
    )

    // 4. Execute and compare
    if (mode === 'raw') {
      const [got, want] = await Promise.all([
        withDebugLog(log, 'execution', 'Executed', () => renderPlan(options.executor, plan)),
        readFixtureText(goldenCase.expectedPath),
      ])
      return compareText(want ?? '', got)
    }

    const verdict = await withDebugLog(
      log,
      'comparison',
      'Compared',
      () => executeAndCompare(plan, goldenCase),
      (v) => ({ equal: v.equal }),
    )
    if (verdict.equal) return pass()
    return fail(new ComparisonMismatchError(verdict.reason, verdict.diff))
  }

  /**
   * Streams executor output straight into the decoder. The execution is
   * always awaited; when it fails its error wins over whatever the broken
   * pipe caused on the reading side.
   */
  async function executeAndCompare(plan: Plan, goldenCase: GoldenCase): Promise<ComparisonVerdict> {
    const pipe = new PassThrough()
    let aborted = false

    // settles with the execution's own failure, or undefined once the reader gave up
    const execution: Promise<Error | undefined> = options.executor.execute(plan, pipe).then(
      () => {
        pipe.end()
        return undefined
      },
      (err: unknown) => {
        if (aborted) return undefined
        const error = toError(err)
        pipe.destroy(error)
        return error
      },
    )

    const decoder = decoderFor(goldenCase.dialect.kind)
    let got: ResultStream | undefined
    let want: ResultStream | undefined
    try {
      got = await decoder.decode(pipe)
      want = await decoder.decode(openFixture(goldenCase.expectedPath))
      const verdict = await compareResults(want, got, options.compare)
      const failure = await execution
      if (failure !== undefined) throw failure
      return verdict
    } catch (err) {
      aborted = true
      pipe.destroy()
      throw (await execution) ?? err
    } finally {
      await Promise.all([got?.release(), want?.release()])
    }
  }

  return {
    runCase: (goldenCase) => run(goldenCase, 'decoded'),
    runRawCase: (goldenCase) => run(goldenCase, 'raw'),
    async runAll(cases, mode = 'decoded') {
      const reports: CaseReport[] = []
      for (const goldenCase of cases) {
        reports.push(await run(goldenCase, mode))
      }
      return reports
    },
  }
}

// ── Helpers ────────────────────────────────────────────────────

/** Executes a plan and collects its encoded output as text. */
export async function renderPlan(executor: QueryExecutor, plan: Plan): Promise<string> {
  const pipe = new PassThrough()
  const [, output] = await Promise.all([
    executor.execute(plan, pipe).then(
      () => {
        pipe.end()
      },
      (err: unknown) => {
        pipe.destroy()
        throw err
      },
    ),
    text(pipe),
  ])
  return output
}

function compareText(want: string, got: string): CaseOutcome {
  const expected = want.trim()
  const actual = got.trim()
  if (expected === actual) return pass()
  return fail(new ComparisonMismatchError('output text differs', unifiedDiff(`${expected}\n`, `${actual}\n`)))
}

function asHarnessError(err: unknown): QueryDiffError {
  if (err instanceof QueryDiffError) return err
  const cause = toError(err)
  return new QueryDiffError('INTERNAL', cause.message, { cause })
}

function pass(): CaseOutcome {
  return { status: 'pass' }
}

function skip(reason: string): CaseOutcome {
  return { status: 'skip', reason }
}

function fail(error: QueryDiffError): CaseOutcome {
  return { status: 'fail', error }
}
