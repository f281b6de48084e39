import { createReadStream } from 'node:fs'
import { readFile, stat } from 'node:fs/promises'
import type { Readable } from 'node:stream'
import { FixtureError, toError } from '@querydiff/model'

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')
}

/** Reads a text fixture. Resolves undefined when the file does not exist. */
export async function readFixtureText(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf8')
  } catch (err) {
    if (isNotFound(err)) return undefined
    throw new FixtureError('FIXTURE_UNREADABLE', path, toError(err))
  }
}

/** Resolves whether a fixture file exists. */
export async function fixtureExists(path: string): Promise<boolean> {
  try {
    const info = await stat(path)
    if (!info.isFile()) throw new FixtureError('FIXTURE_UNREADABLE', path)
    return true
  } catch (err) {
    if (err instanceof FixtureError) throw err
    if (isNotFound(err)) return false
    throw new FixtureError('FIXTURE_UNREADABLE', path, toError(err))
  }
}

export function openFixture(path: string): Readable {
  return createReadStream(path)
}
