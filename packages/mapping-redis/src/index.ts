import type { Mapping, MappingFilter, MappingList, MappingService } from '@querydiff/core'
import { ConfigError, listMappings, MappingError } from '@querydiff/core'
import type { MappingErrorDetails } from '@querydiff/model'
import { mappingSchema, toError } from '@querydiff/model'
import { Redis } from 'ioredis'

export interface RedisMappingsConfig {
  readonly url?: string | undefined
  readonly host?: string | undefined
  readonly port?: number | undefined
  readonly password?: string | undefined
  readonly db?: number | undefined
  /** Namespace of every key written or read. Defaults to `mappings`. */
  readonly prefix?: string | undefined
}

export interface RedisMappingService extends MappingService {
  /** Writes a mapping, indexes it and, when it is the default, records its retention policy. */
  store(mapping: Mapping): Promise<void>
  ping(): Promise<void>
  close(): Promise<void>
}

/**
 * Mappings stored in Redis:
 *
 *   <prefix>:<cluster>:<db>:<rp>    mapping as JSON
 *   <prefix>:default:<cluster>:<db> retention policy of the default mapping
 *   <prefix>:index                  set of mapping keys
 */
export function createRedisMappings(config: RedisMappingsConfig): RedisMappingService {
  const redis =
    config.url !== undefined
      ? new Redis(config.url)
      : new Redis({
          host: config.host ?? 'localhost',
          port: config.port ?? 6379,
          password: config.password,
          db: config.db,
        })
  const prefix = config.prefix ?? 'mappings'
  const indexKey = `${prefix}:index`
  const mappingKey = (cluster: string, database: string, rp: string): string =>
    `${prefix}:${cluster}:${database}:${rp}`
  const defaultKey = (cluster: string, database: string): string => `${prefix}:default:${cluster}:${database}`

  async function loadAll(): Promise<Mapping[]> {
    const keys = (await redis.smembers(indexKey)).sort()
    if (keys.length === 0) return []
    const values = await redis.mget(...keys)
    return values.flatMap((raw) => (raw === null ? [] : [parseMapping(raw)]))
  }

  async function findAll(filter: MappingFilter): Promise<MappingList> {
    return withLoadFailure(filter, async () => listMappings(await loadAll(), filter))
  }

  return {
    async findDefaultMapping(cluster: string, database: string, retentionPolicy: string): Promise<Mapping> {
      const details = { cluster, database, retentionPolicy }
      const mapping = await withLoadFailure(details, async () => {
        const rp = retentionPolicy === '' ? await redis.get(defaultKey(cluster, database)) : retentionPolicy
        if (rp === null) return undefined
        const raw = await redis.get(mappingKey(cluster, database, rp))
        return raw === null ? undefined : parseMapping(raw)
      })
      if (mapping === undefined) throw new MappingError('MAPPING_NOT_FOUND', details)
      return mapping
    },

    async findMapping(filter: MappingFilter): Promise<Mapping> {
      const { mappings } = await findAll(filter)
      const [first] = mappings
      if (first === undefined) throw new MappingError('MAPPING_NOT_FOUND', filter)
      return first
    },

    findAllMappings: findAll,

    async store(mapping: Mapping): Promise<void> {
      const parsed = mappingSchema.safeParse(mapping)
      if (!parsed.success) {
        throw new ConfigError(
          parsed.error.issues.map((issue) => ({
            code: 'INVALID_FIELD',
            message: issue.message,
            details: { path: issue.path.join('.') },
          })),
        )
      }
      const { cluster, database, retentionPolicy } = parsed.data
      const key = mappingKey(cluster, database, retentionPolicy)
      await withLoadFailure({ cluster, database, retentionPolicy }, async () => {
        await redis.set(key, JSON.stringify(parsed.data))
        await redis.sadd(indexKey, key)
        if (parsed.data.default) await redis.set(defaultKey(cluster, database), retentionPolicy)
      })
    },

    async ping(): Promise<void> {
      await redis.ping()
    },

    async close(): Promise<void> {
      await redis.quit()
    },
  }
}

// ── Helpers ────────────────────────────────────────────────────

function parseMapping(raw: string): Mapping {
  const parsed = mappingSchema.safeParse(JSON.parse(raw))
  if (!parsed.success) {
    throw new Error(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '))
  }
  return parsed.data
}

async function withLoadFailure<T>(details: MappingErrorDetails, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn()
  } catch (err) {
    if (err instanceof MappingError) throw err
    throw new MappingError('MAPPING_LOAD_FAILED', details, toError(err))
  }
}

export type { MappingService } from '@querydiff/core'
