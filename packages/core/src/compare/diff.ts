import { createTwoFilesPatch } from 'diff'

/** Unified line diff of two renderings, labelled `want` and `got`. */
export function unifiedDiff(want: string, got: string): string {
  return createTwoFilesPatch('want', 'got', want, got, undefined, undefined, { context: 3 })
}
