import type { HarnessConfig } from '@querydiff/model'
import { ConfigError, FixtureError, parseHarnessConfig } from '@querydiff/model'
import { readFixtureText } from './fixtures.js'

/**
 * Loads and validates a harness config file (JSON).
 * Throws `FixtureError` when the file is missing or unreadable and
 * `ConfigError` when its content is invalid.
 */
export async function loadHarnessConfig(path: string): Promise<HarnessConfig> {
  const content = await readFixtureText(path)
  if (content === undefined) throw new FixtureError('FIXTURE_MISSING', path)

  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (err) {
    throw new ConfigError([
      {
        code: 'INVALID_FIELD',
        message: err instanceof Error ? err.message : String(err),
        details: { path: '', expected: 'JSON document' },
      },
    ])
  }
  return parseHarnessConfig(raw)
}
