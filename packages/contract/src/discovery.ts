import { readdir } from 'node:fs/promises'
import { join } from 'node:path'
import type { Dialect, GoldenCase, QueryLanguage } from '@querydiff/core'
import { csvDialect, jsonDialect } from '@querydiff/core'

// ── Naming ─────────────────────────────────────────────────────

const LANGUAGES: readonly QueryLanguage[] = ['tql', 'lql']

const SUFFIXES = ['.tql', '.lql', '.in.csv', '.in.json', '.out.csv', '.out.json'] as const

type Suffix = (typeof SUFFIXES)[number]

interface Stem {
  readonly name: string
  readonly files: ReadonlySet<Suffix>
}

async function scan(dir: string): Promise<Stem[]> {
  const stems = new Map<string, Set<Suffix>>()
  for (const file of await readdir(dir)) {
    const suffix = SUFFIXES.find((s) => file.endsWith(s) && file.length > s.length)
    if (suffix === undefined) continue
    const name = file.slice(0, -suffix.length)
    const files = stems.get(name) ?? new Set<Suffix>()
    files.add(suffix)
    stems.set(name, files)
  }
  return [...stems.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([name, files]) => ({ name, files }))
}

function inputPath(dir: string, stem: Stem): string {
  const suffix = stem.files.has('.in.json') && !stem.files.has('.in.csv') ? '.in.json' : '.in.csv'
  return join(dir, `${stem.name}${suffix}`)
}

// ── discoverCases ──────────────────────────────────────────────

/**
 * Builds golden cases from a directory of fixtures named
 * `<stem>.tql`, `<stem>.lql`, `<stem>.in.csv|.in.json` and
 * `<stem>.out.csv|.out.json`.
 *
 * Every stem yields a case per language and per expected output, named
 * `<language>/<stem>`. Files that are absent are left for the driver to
 * report as skips.
 */
export async function discoverCases(dir: string): Promise<GoldenCase[]> {
  const cases: GoldenCase[] = []
  for (const stem of await scan(dir)) {
    const outputs: { suffix: Suffix; dialect: Dialect }[] = []
    if (stem.files.has('.out.csv') || !stem.files.has('.out.json')) {
      outputs.push({ suffix: '.out.csv', dialect: csvDialect() })
    }
    if (stem.files.has('.out.json')) outputs.push({ suffix: '.out.json', dialect: jsonDialect() })

    for (const language of LANGUAGES) {
      for (const { suffix, dialect } of outputs) {
        cases.push({
          name: `${language}/${stem.name}`,
          language,
          queryPath: join(dir, `${stem.name}.${language}`),
          inputPath: inputPath(dir, stem),
          expectedPath: join(dir, `${stem.name}${suffix}`),
          dialect,
        })
      }
    }
  }
  return cases
}

// ── discoverCompilerPairs ──────────────────────────────────────

/** The same query written in both languages, run over one input. */
export interface CompilerPair {
  readonly name: string
  readonly tqlPath: string
  readonly lqlPath: string
  readonly inputPath: string
}

/** Finds stems that have a query in both languages. */
export async function discoverCompilerPairs(dir: string): Promise<CompilerPair[]> {
  return (await scan(dir))
    .filter((stem) => stem.files.has('.tql') && stem.files.has('.lql'))
    .map((stem) => ({
      name: stem.name,
      tqlPath: join(dir, `${stem.name}.tql`),
      lqlPath: join(dir, `${stem.name}.lql`),
      inputPath: inputPath(dir, stem),
    }))
}
