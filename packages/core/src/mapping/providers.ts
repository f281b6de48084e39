import type { Mapping, MappingFilter } from '@querydiff/model'
import { MappingError } from '@querydiff/model'
import type { MappingList, MappingService } from '../types/interfaces.js'

/**
 * Creates a MappingService over a fixed list of mappings.
 */
export function staticMappings(mappings: readonly Mapping[]): MappingService {
  return {
    findDefaultMapping: (cluster, database, retentionPolicy) => {
      const found = selectDefaultMapping(mappings, cluster, database, retentionPolicy)
      return found !== undefined
        ? Promise.resolve(found)
        : Promise.reject(new MappingError('MAPPING_NOT_FOUND', { cluster, database, retentionPolicy }))
    },
    findMapping: (filter) => {
      const found = mappings.find((m) => matchesFilter(m, filter))
      return found !== undefined ? Promise.resolve(found) : Promise.reject(new MappingError('MAPPING_NOT_FOUND', filter))
    },
    findAllMappings: (filter) => Promise.resolve(listMappings(mappings, filter)),
  }
}

/**
 * Picks the mapping for a cluster/database/retention policy. An empty
 * retention policy picks the database's default mapping.
 */
export function selectDefaultMapping(
  mappings: readonly Mapping[],
  cluster: string,
  database: string,
  retentionPolicy: string,
): Mapping | undefined {
  return mappings.find(
    (m) =>
      m.cluster === cluster &&
      m.database === database &&
      (retentionPolicy === '' ? m.default : m.retentionPolicy === retentionPolicy),
  )
}

export function matchesFilter(mapping: Mapping, filter: MappingFilter): boolean {
  return (
    (filter.cluster === undefined || mapping.cluster === filter.cluster) &&
    (filter.database === undefined || mapping.database === filter.database) &&
    (filter.retentionPolicy === undefined || mapping.retentionPolicy === filter.retentionPolicy) &&
    (filter.default === undefined || mapping.default === filter.default)
  )
}

export function listMappings(mappings: readonly Mapping[], filter: MappingFilter): MappingList {
  const matched = mappings.filter((m) => matchesFilter(m, filter))
  return { mappings: matched, count: matched.length }
}
