import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import {
  ComparisonMismatchError,
  createGoldenDriver,
  createSkipRegistry,
  ExecutionError,
  loadHarnessConfig,
  staticMappings,
} from '@querydiff/core'
import { createMemoryExecutor } from '@querydiff/engine'
import { describe, expect, it } from 'vitest'
import { describeFailure, discoverCases, discoverCompilerPairs } from '../src/index.js'

const TESTDATA = fileURLToPath(new URL('../testdata', import.meta.url))

describe('discoverCases', () => {
  it('yields a case per language and expected output, ordered by stem', async () => {
    const cases = await discoverCases(TESTDATA)
    expect(cases.map((c) => `${c.name} ${c.dialect.kind}`)).toEqual([
      'tql/count_single_group annotated-csv',
      'tql/count_single_group json',
      'lql/count_single_group annotated-csv',
      'lql/count_single_group json',
      'tql/count_ungrouped annotated-csv',
      'lql/count_ungrouped annotated-csv',
      'tql/derivative_mean annotated-csv',
      'lql/derivative_mean annotated-csv',
      'tql/generated_sum json',
      'lql/generated_sum json',
      'tql/mean_by_host annotated-csv',
      'lql/mean_by_host annotated-csv',
      'tql/missing_golden annotated-csv',
      'lql/missing_golden annotated-csv',
      'tql/raw_select_desc annotated-csv',
      'tql/raw_select_desc json',
      'lql/raw_select_desc annotated-csv',
      'lql/raw_select_desc json',
    ])
  })

  it('points each case at its files', async () => {
    const cases = await discoverCases(TESTDATA)
    expect(cases.find((c) => c.name === 'lql/generated_sum')).toMatchObject({
      language: 'lql',
      queryPath: join(TESTDATA, 'generated_sum.lql'),
      inputPath: join(TESTDATA, 'generated_sum.in.json'),
      expectedPath: join(TESTDATA, 'generated_sum.out.json'),
    })
  })

  it('pairs stems written in both languages', async () => {
    const pairs = await discoverCompilerPairs(TESTDATA)
    expect(pairs.map((p) => p.name)).toEqual(['count_single_group', 'generated_sum', 'mean_by_host', 'raw_select_desc'])
  })
})

describe('golden testdata', () => {
  it('reports every case with the expected status', async () => {
    const config = await loadHarnessConfig(join(TESTDATA, 'harness.json'))
    const driver = createGoldenDriver({
      executor: createMemoryExecutor(),
      mappings: staticMappings(config.mappings),
      cluster: config.cluster,
      database: config.database,
      skips: createSkipRegistry(config.skips),
    })
    const reports = await driver.runAll(await discoverCases(TESTDATA))
    const skipped = reports.flatMap((r) => (r.outcome.status === 'skip' ? [`${r.name}: ${r.outcome.reason}`] : []))
    expect(skipped).toEqual([
      'lql/count_ungrouped: query file is missing',
      'tql/derivative_mean: query file is missing',
      'lql/derivative_mean: derivative() is not transpiled yet',
      'tql/missing_golden: expected output is missing',
      'lql/missing_golden: query file is missing',
    ])
    expect(reports.filter((r) => r.outcome.status === 'fail')).toEqual([])
  })
})

describe('describeFailure', () => {
  it('appends the diff of a mismatch', () => {
    const error = new ComparisonMismatchError('table {} [n:long]: want 1 rows, got 2', '-a\n+b\n')
    expect(describeFailure(error)).toBe('Result not as expected: table {} [n:long]: want 1 rows, got 2\n-a\n+b\n')
  })

  it('prefixes other errors with their code', () => {
    const error = new ExecutionError({ code: 'SOURCE_UNAVAILABLE', source: 'b' })
    expect(describeFailure(error)).toBe('SOURCE_UNAVAILABLE: Source unavailable: b')
  })
})
