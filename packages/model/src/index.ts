// Config validation
export { mappingSchema, parseHarnessConfig, validateMappings } from './configValidation.js'

// Errors
export type {
  CompileErrorCode,
  CompileErrorDetails,
  ConfigErrorEntry,
  DecodeErrorCode,
  DecodeErrorDetails,
  ExecutionErrorDetails,
  MappingErrorDetails,
} from './errors.js'
export {
  CompileError,
  ComparisonMismatchError,
  ConfigError,
  DecodeError,
  ExecutionError,
  FixtureError,
  MappingError,
  QueryDiffError,
  StreamError,
  toError,
} from './errors.js'

// Stream model
export type { NamedTable, ReleaseFn } from './stream.js'
export { bufferResults, createResultStream, fromBufferedResults, openResultStream } from './stream.js'

// Types
export type { CompareOptions, HarnessConfig, RowOrder } from './types/config.js'
export type { Mapping, MappingFilter } from './types/mapping.js'
export type {
  BufferedResult,
  ColumnMeta,
  ColumnType,
  GroupKey,
  Result,
  ResultStream,
  Row,
  Table,
  Value,
} from './types/table.js'

// Values
export {
  compareValues,
  displayValue,
  formatCell,
  formatTime,
  parseCell,
  parseTime,
  valuesEqual,
} from './values.js'
