/**
 * Cases that are known not to pass yet, keyed by case name, each with the
 * reason it is skipped. Built once and never changed.
 */
export interface SkipRegistry {
  readonly size: number
  reasonFor(caseName: string): string | undefined
}

export function createSkipRegistry(entries: Readonly<Record<string, string>> = {}): SkipRegistry {
  const reasons = new Map(Object.entries(entries))
  return {
    size: reasons.size,
    reasonFor: (caseName) => reasons.get(caseName),
  }
}
