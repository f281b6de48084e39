import type { Mapping } from './mapping.js'

export type RowOrder = 'significant' | 'ignore'

export interface CompareOptions {
  readonly rowOrder?: RowOrder | undefined
}

export interface HarnessConfig {
  readonly cluster: string
  readonly database: string
  readonly skips: Readonly<Record<string, string>>
  readonly mappings: readonly Mapping[]
  readonly compare: CompareOptions
}
