import { fileURLToPath } from 'node:url'
import type { GoldenDriverOptions } from '@querydiff/core'
import { createSkipRegistry, loadHarnessConfig, staticMappings } from '@querydiff/core'
import { createMemoryExecutor } from '@querydiff/engine'
import { describeCompilerContract, describeGoldenSuite, discoverCases, discoverCompilerPairs } from '../src/index.js'

const TESTDATA = fileURLToPath(new URL('../testdata', import.meta.url))

const config = await loadHarnessConfig(`${TESTDATA}/harness.json`)
const cases = await discoverCases(TESTDATA)

function driverOptions(): GoldenDriverOptions {
  return {
    executor: createMemoryExecutor(),
    mappings: staticMappings(config.mappings),
    cluster: config.cluster,
    database: config.database,
    skips: createSkipRegistry(config.skips),
    compare: config.compare,
  }
}

// ── Golden files ───────────────────────────────────────────────

describeGoldenSuite('memory executor', cases, driverOptions)

describeGoldenSuite(
  'memory executor (raw text)',
  cases.filter((c) => c.dialect.kind === 'annotated-csv'),
  driverOptions,
  { mode: 'raw' },
)

// ── Both languages ─────────────────────────────────────────────

describeCompilerContract('memory executor', await discoverCompilerPairs(TESTDATA), () => ({
  executor: createMemoryExecutor(),
  mappings: staticMappings(config.mappings),
  cluster: config.cluster,
  database: config.database,
}))
