import type { CompareMode, GoldenCase, GoldenDriverOptions } from '@querydiff/core'
import { ComparisonMismatchError, createGoldenDriver } from '@querydiff/core'
import type { QueryDiffError } from '@querydiff/model'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'

// ── Types ──────────────────────────────────────────────────────

export interface GoldenSuiteOptions {
  /** Compare decoded results (default) or trimmed output text. */
  readonly mode?: CompareMode | undefined
}

// ── describeGoldenSuite ────────────────────────────────────────

/**
 * Registers one test per golden case. Skipped cases are reported as skipped
 * tests; failures carry the mismatch reason and its diff.
 *
 * The executor named by the options `factory` returns is closed after the suite.
 */
export function describeGoldenSuite(
  name: string,
  cases: readonly GoldenCase[],
  factory: () => GoldenDriverOptions | Promise<GoldenDriverOptions>,
  options: GoldenSuiteOptions = {},
): void {
  const mode = options.mode ?? 'decoded'

  describe(`GoldenSuite: ${name}`, () => {
    let driverOptions: GoldenDriverOptions | undefined

    beforeAll(async () => {
      driverOptions = await factory()
    })

    afterAll(async () => {
      await driverOptions?.executor.close()
    })

    for (const goldenCase of cases) {
      it(`${goldenCase.name} [${goldenCase.dialect.kind}]`, async (ctx) => {
        if (driverOptions === undefined) throw new Error('Golden suite factory did not run')
        const driver = createGoldenDriver(driverOptions)
        const report = mode === 'raw' ? await driver.runRawCase(goldenCase) : await driver.runCase(goldenCase)
        const { outcome } = report
        if (outcome.status === 'skip') {
          ctx.skip()
          return
        }
        if (outcome.status === 'fail') expect.fail(describeFailure(outcome.error))
      })
    }
  })
}

export function describeFailure(error: QueryDiffError): string {
  if (error instanceof ComparisonMismatchError) return `${error.message}\n${error.diff}`
  return `${error.code}: ${error.message}`
}
