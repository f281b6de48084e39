import { z } from 'zod'
import type { ConfigErrorEntry } from './errors.js'
import { ConfigError } from './errors.js'
import type { HarnessConfig } from './types/config.js'
import type { Mapping } from './types/mapping.js'

// --- Schemas ---

const ID_REGEX = /^[0-9a-f]{16}$/

export const mappingSchema = z.object({
  cluster: z.string().min(1),
  database: z.string().min(1),
  retentionPolicy: z.string().min(1),
  default: z.boolean().default(false),
  organizationId: z.string().regex(ID_REGEX, 'must be 16 lowercase hex digits'),
  bucketId: z.string().regex(ID_REGEX, 'must be 16 lowercase hex digits'),
})

const harnessConfigSchema = z.object({
  cluster: z.string().min(1),
  database: z.string().min(1),
  skips: z.record(z.string().min(1)).default({}),
  mappings: z.array(mappingSchema).default([]),
  compare: z
    .object({
      rowOrder: z.enum(['significant', 'ignore']).default('significant'),
    })
    .default({}),
})

// --- Harness Config ---

/**
 * Parses and validates a harness config. Throws `ConfigError` listing
 * every problem found.
 */
export function parseHarnessConfig(raw: unknown): HarnessConfig {
  const parsed = harnessConfigSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => ({
        code: 'INVALID_FIELD',
        message: issue.message,
        details: { path: issue.path.join('.') },
      })),
    )
  }

  const config: HarnessConfig = parsed.data
  const errors = validateMappings(config.mappings, config.cluster, config.database)
  if (errors.length > 0) throw new ConfigError(errors)
  return config
}

/**
 * Checks mapping uniqueness: one mapping per cluster/database/retention policy,
 * at most one default per cluster/database, and a default for the harness'
 * own cluster/database.
 */
export function validateMappings(
  mappings: readonly Mapping[],
  cluster?: string | undefined,
  database?: string | undefined,
): ConfigErrorEntry[] {
  const errors: ConfigErrorEntry[] = []
  const seen = new Set<string>()
  const defaults = new Map<string, number>()

  mappings.forEach((m, i) => {
    const key = `${m.cluster}/${m.database}/${m.retentionPolicy}`
    if (seen.has(key)) {
      errors.push({
        code: 'DUPLICATE_MAPPING',
        message: `Duplicate mapping for ${key}`,
        details: { path: `mappings.${String(i)}`, actual: key },
      })
    }
    seen.add(key)

    if (m.default) {
      const dbKey = `${m.cluster}/${m.database}`
      const count = (defaults.get(dbKey) ?? 0) + 1
      defaults.set(dbKey, count)
      if (count > 1) {
        errors.push({
          code: 'DUPLICATE_MAPPING',
          message: `More than one default mapping for ${dbKey}`,
          details: { path: `mappings.${String(i)}.default`, actual: dbKey },
        })
      }
    }
  })

  if (cluster !== undefined && database !== undefined && !defaults.has(`${cluster}/${database}`)) {
    errors.push({
      code: 'MISSING_DEFAULT',
      message: `No default mapping for ${cluster}/${database}`,
      details: { path: 'mappings', expected: `${cluster}/${database}` },
    })
  }

  return errors
}
