import { createReadStream } from 'node:fs'
import type { Writable } from 'node:stream'
import type { BufferedResult, Plan, PlanSource, QueryExecutor, Table } from '@querydiff/core'
import { bufferResults, DecodeError, decoderFor, encoderFor, ExecutionError, fromBufferedResults } from '@querydiff/core'
import { toError } from '@querydiff/model'
import { applyOperations } from './operations.js'
import { unpivot } from './unpivot.js'

export interface MemoryExecutorConfig {
  /** Tables served for `from(bucket: ...)` sources, keyed by bucket. */
  readonly buckets?: Readonly<Record<string, readonly Table[]>> | undefined
  /** Result name written to the output. */
  readonly resultName?: string | undefined
}

/**
 * Executes plans in process over buffered tables: rows come from a fixture
 * file or a configured bucket and are encoded in the plan's dialect.
 */
export function createMemoryExecutor(config: MemoryExecutorConfig = {}): QueryExecutor {
  const buckets = new Map(Object.entries(config.buckets ?? {}))
  const resultName = config.resultName ?? '_result'
  let closed = false

  async function load(source: PlanSource): Promise<readonly Table[]> {
    if (source.kind === 'bucket') {
      const tables = buckets.get(source.bucket)
      if (tables === undefined) throw new ExecutionError({ code: 'SOURCE_UNAVAILABLE', source: source.bucket })
      return tables
    }

    let results: BufferedResult[]
    try {
      results = await bufferResults(await decoderFor(source.format).decode(createReadStream(source.path)))
    } catch (err) {
      if (err instanceof DecodeError && err.code === 'READ_FAILED') {
        throw new ExecutionError({ code: 'SOURCE_UNAVAILABLE', source: source.path }, undefined, err)
      }
      const cause = toError(err)
      throw new ExecutionError({ code: 'QUERY_FAILED', operation: 'read', cause }, `read: ${cause.message}`, cause)
    }
    const tables = results.flatMap((r) => r.tables)
    return source.format === 'json' ? tables.flatMap(unpivot) : tables
  }

  return {
    async execute(plan: Plan, out: Writable): Promise<number> {
      if (closed) throw new ExecutionError({ code: 'QUERY_FAILED' }, 'Executor is closed')
      try {
        const tables = applyOperations(await load(plan.source), plan.operations)
        const stream = fromBufferedResults([{ name: resultName, tables }])
        return await encoderFor(plan.dialect).encode(stream, out)
      } catch (err) {
        if (err instanceof ExecutionError) throw err
        const cause = toError(err)
        throw new ExecutionError({ code: 'QUERY_FAILED', cause }, cause.message, cause)
      }
    },

    async close(): Promise<void> {
      closed = true
    },
  }
}
