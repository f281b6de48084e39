import { readFile } from 'node:fs/promises'
import { Readable } from 'node:stream'
import type { Compiler, MappingService, Plan, QueryExecutor } from '@querydiff/core'
import { compareResults, compile, csvDialect, decoderFor, renderPlan } from '@querydiff/core'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import type { CompilerPair } from './discovery.js'

// ── Types ──────────────────────────────────────────────────────

export interface CompilerContractTarget {
  readonly executor: QueryExecutor
  readonly mappings: MappingService
  readonly cluster: string
  readonly database?: string | undefined
}

// ── describeCompilerContract ───────────────────────────────────

/**
 * Checks that each query written in both languages compiles to plans that
 * produce the same results over the same input.
 */
export function describeCompilerContract(
  name: string,
  pairs: readonly CompilerPair[],
  factory: () => CompilerContractTarget | Promise<CompilerContractTarget>,
): void {
  describe(`CompilerContract: ${name}`, () => {
    let target: CompilerContractTarget | undefined

    beforeAll(async () => {
      target = await factory()
    })

    afterAll(async () => {
      await target?.executor.close()
    })

    async function plans(pair: CompilerPair): Promise<{ native: Plan; transpiled: Plan }> {
      if (target === undefined) throw new Error('Compiler contract factory did not run')
      const transpiling: Compiler = {
        kind: 'transpiling',
        cluster: target.cluster,
        database: target.database,
        mappings: target.mappings,
      }
      const input = { path: pair.inputPath }
      const [tql, lql] = await Promise.all([readFile(pair.tqlPath, 'utf8'), readFile(pair.lqlPath, 'utf8')])
      const [native, transpiled] = await Promise.all([
        compile({ compiler: { kind: 'native' }, query: tql, dialect: csvDialect(), input }),
        compile({ compiler: transpiling, query: lql, dialect: csvDialect(), input }),
      ])
      return { native, transpiled }
    }

    for (const pair of pairs) {
      it(`C100: ${pair.name} gives the same results in both languages`, async () => {
        if (target === undefined) throw new Error('Compiler contract factory did not run')
        const { native, transpiled } = await plans(pair)
        const decoder = decoderFor('annotated-csv')
        const [want, got] = await Promise.all([
          renderPlan(target.executor, native),
          renderPlan(target.executor, transpiled),
        ])
        const verdict = await compareResults(
          await decoder.decode(Readable.from([want])),
          await decoder.decode(Readable.from([got])),
        )
        if (!verdict.equal) expect.fail(`${verdict.reason}\n${verdict.diff}`)
      })

      it(`C101: ${pair.name} compiles to the same plan every time`, async () => {
        const first = await plans(pair)
        const second = await plans(pair)
        expect(second).toEqual(first)
      })
    }
  })
}
