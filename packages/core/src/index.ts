// Re-export the shared model
export type {
  BufferedResult,
  ColumnMeta,
  ColumnType,
  CompareOptions,
  GroupKey,
  HarnessConfig,
  Mapping,
  MappingFilter,
  NamedTable,
  Result,
  ResultStream,
  Row,
  RowOrder,
  Table,
  Value,
} from '@querydiff/model'
export {
  bufferResults,
  CompileError,
  ComparisonMismatchError,
  ConfigError,
  DecodeError,
  ExecutionError,
  FixtureError,
  fromBufferedResults,
  MappingError,
  QueryDiffError,
  StreamError,
} from '@querydiff/model'
// Comparison
export type { ComparisonVerdict } from './compare/comparator.js'
export { compareBuffered, compareResults } from './compare/comparator.js'
export { unifiedDiff } from './compare/diff.js'
export type { RenderOptions } from './compare/render.js'
export { canonicalTable, renderCanonical, tableKey } from './compare/render.js'
// Compilation
export type { Compiler, CompileRequest, InputOverride, NativeCompiler, TranspilingCompiler } from './compiler/compiler.js'
export { compile, languageOf } from './compiler/compiler.js'
export type { LqlStatement, TranspileContext } from './compiler/lql.js'
export { parseLql, transpileLql } from './compiler/lql.js'
export type {
  AggregateFn,
  ComparisonOperator,
  Operation,
  Plan,
  PlanSource,
  Predicate,
  QueryLanguage,
} from './compiler/plan.js'
export { AGGREGATE_FNS, isAggregateFn } from './compiler/plan.js'
export type { TqlQuery } from './compiler/tql.js'
export { parseTql } from './compiler/tql.js'
// Debug
export type { DebugLogEntry, DebugPhase } from './debug/logger.js'
// Decoding
export type { FixtureFormat, ResultDecoder } from './decoders/decoder.js'
export { decoderFor, formatForPath } from './decoders/decoder.js'
// Encoding
export type { AnnotatedCsvDialect, CsvAnnotation, Dialect, JsonDialect, ResultEncoder } from './dialects/dialect.js'
export { csvDialect, encoderFor, jsonDialect } from './dialects/dialect.js'
export type { LegacySeries } from './dialects/json.js'
// Golden-file driver
export { loadHarnessConfig } from './driver/config.js'
export type {
  CaseOutcome,
  CaseReport,
  CompareMode,
  GoldenCase,
  GoldenDriver,
  GoldenDriverOptions,
} from './driver/driver.js'
export { createGoldenDriver, renderPlan, SKIP_EXPECTED_MISSING, SKIP_QUERY_MISSING } from './driver/driver.js'
export type { SkipRegistry } from './driver/skips.js'
export { createSkipRegistry } from './driver/skips.js'
// Mapping
export { listMappings, matchesFilter, selectDefaultMapping, staticMappings } from './mapping/providers.js'
// Interfaces
export type { MappingList, MappingService, QueryExecutor } from './types/interfaces.js'
