import { describe, expect, it } from 'vitest'
import { ConfigError, parseHarnessConfig } from '../src/index.js'

const mapping = {
  cluster: 'cluster',
  database: 'db0',
  retentionPolicy: 'autogen',
  default: true,
  organizationId: 'cadecadecadecade',
  bucketId: 'da7aba5e5eedca5e',
}

function configErrors(raw: unknown): ConfigError {
  try {
    parseHarnessConfig(raw)
  } catch (err) {
    if (err instanceof ConfigError) return err
    throw err
  }
  throw new Error('Expected ConfigError')
}

describe('parseHarnessConfig', () => {
  it('fills defaults', () => {
    const config = parseHarnessConfig({ cluster: 'cluster', database: 'db0', mappings: [mapping] })
    expect(config.skips).toEqual({})
    expect(config.compare.rowOrder).toBe('significant')
    expect(config.mappings[0]?.bucketId).toBe('da7aba5e5eedca5e')
  })

  it('reports the path of each invalid field', () => {
    const err = configErrors({ cluster: '', database: 'db0', mappings: [{ ...mapping, bucketId: 'nope' }] })
    expect(err.code).toBe('CONFIG_INVALID')
    expect(err.errors.map((e) => e.details.path)).toEqual(['cluster', 'mappings.0.bucketId'])
  })

  it('rejects duplicate mappings', () => {
    const err = configErrors({ cluster: 'cluster', database: 'db0', mappings: [mapping, mapping] })
    expect(err.errors.map((e) => e.code)).toEqual(['DUPLICATE_MAPPING', 'DUPLICATE_MAPPING'])
  })

  it('requires a default mapping for the harness database', () => {
    const err = configErrors({ cluster: 'cluster', database: 'db0', mappings: [{ ...mapping, default: false }] })
    expect(err.errors).toHaveLength(1)
    expect(err.errors[0]?.code).toBe('MISSING_DEFAULT')
  })

  it('rejects an unknown row order', () => {
    const err = configErrors({
      cluster: 'cluster',
      database: 'db0',
      mappings: [mapping],
      compare: { rowOrder: 'random' },
    })
    expect(err.errors[0]?.details.path).toBe('compare.rowOrder')
  })
})
