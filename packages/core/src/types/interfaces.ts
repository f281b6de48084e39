import type { Writable } from 'node:stream'
import type { Mapping, MappingFilter } from '@querydiff/model'
import type { Plan } from '../compiler/plan.js'

// --- QueryExecutor (implemented by executor packages) ---

/**
 * Runs compiled plans.
 *
 * Error contract:
 * - `execute()` writes the encoded output to `out`, resolves with the row
 *   count and leaves `out` open. It must throw `ExecutionError` on any failure.
 * - `close()` should attempt cleanup; failures may propagate as raw errors.
 */
export interface QueryExecutor {
  execute(plan: Plan, out: Writable): Promise<number>
  close(): Promise<void>
}

// --- MappingService (implemented by mapping packages) ---

export interface MappingList {
  readonly mappings: readonly Mapping[]
  readonly count: number
}

/**
 * Resolves legacy database/retention-policy pairs to buckets.
 *
 * Error contract:
 * - Lookups throw `MappingError` (`MAPPING_NOT_FOUND`) when nothing matches and
 *   `MappingError` (`MAPPING_LOAD_FAILED`) when the backing store fails.
 * - An empty `retentionPolicy` selects the default mapping of the database.
 */
export interface MappingService {
  findDefaultMapping(cluster: string, database: string, retentionPolicy: string): Promise<Mapping>
  findMapping(filter: MappingFilter): Promise<Mapping>
  findAllMappings(filter: MappingFilter): Promise<MappingList>
}
