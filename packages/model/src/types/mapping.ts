/**
 * Binds a legacy cluster/database/retention-policy triple to a storage bucket.
 */
export interface Mapping {
  readonly cluster: string
  readonly database: string
  readonly retentionPolicy: string
  readonly default: boolean
  readonly organizationId: string
  readonly bucketId: string
}

export interface MappingFilter {
  readonly cluster?: string | undefined
  readonly database?: string | undefined
  readonly retentionPolicy?: string | undefined
  readonly default?: boolean | undefined
}
