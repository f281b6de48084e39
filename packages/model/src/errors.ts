// --- Base Error ---

export class QueryDiffError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'QueryDiffError'
    this.code = code
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    }
    if (this.cause !== undefined) {
      json.cause = serializeError(this.cause)
    }
    return json
  }
}

// --- Config Error ---

export interface ConfigErrorEntry {
  code: 'INVALID_FIELD' | 'DUPLICATE_MAPPING' | 'MISSING_DEFAULT'
  message: string
  details: {
    path?: string | undefined
    expected?: string | undefined
    actual?: string | undefined
  }
}

export class ConfigError extends QueryDiffError {
  declare readonly code: 'CONFIG_INVALID'
  readonly errors: readonly ConfigErrorEntry[]

  constructor(errors: readonly ConfigErrorEntry[]) {
    super('CONFIG_INVALID', `Config invalid: ${errors.length} error${errors.length === 1 ? '' : 's'}`)
    this.name = 'ConfigError'
    this.errors = errors
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    }
  }
}

// --- Decode Error ---

export type DecodeErrorCode =
  | 'MALFORMED_HEADER'
  | 'MALFORMED_ROW'
  | 'INVALID_VALUE'
  | 'GROUP_KEY_MISMATCH'
  | 'INVALID_JSON'
  | 'INVALID_SHAPE'
  | 'RESULT_ERROR'
  | 'READ_FAILED'

export interface DecodeErrorDetails {
  format: 'annotated-csv' | 'json'
  line?: number | undefined
  path?: string | undefined
}

export class DecodeError extends QueryDiffError {
  declare readonly code: DecodeErrorCode
  readonly details: DecodeErrorDetails

  constructor(code: DecodeErrorCode, reason: string, details: DecodeErrorDetails, cause?: Error | undefined) {
    super(code, formatDecodeMessage(reason, details), cause ? { cause } : undefined)
    this.name = 'DecodeError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Compile Error ---

export type CompileErrorCode = 'PARSE_FAILED' | 'UNKNOWN_IDENTIFIER' | 'UNSUPPORTED' | 'MAPPING_UNRESOLVED'

export interface CompileErrorDetails {
  language: 'tql' | 'lql'
  position?: number | undefined
  identifier?: string | undefined
}

export class CompileError extends QueryDiffError {
  declare readonly code: CompileErrorCode
  readonly details: CompileErrorDetails

  constructor(code: CompileErrorCode, message: string, details: CompileErrorDetails, cause?: Error | undefined) {
    super(code, message, cause ? { cause } : undefined)
    this.name = 'CompileError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Execution Error ---

export type ExecutionErrorDetails =
  | { code: 'SOURCE_UNAVAILABLE'; source: string }
  | { code: 'QUERY_FAILED'; operation?: string | undefined; cause?: Error | undefined }

export class ExecutionError extends QueryDiffError {
  declare readonly code: 'SOURCE_UNAVAILABLE' | 'QUERY_FAILED'
  readonly details: ExecutionErrorDetails

  constructor(details: ExecutionErrorDetails, message?: string | undefined, cause?: Error | undefined) {
    super(details.code, message ?? defaultExecutionMessage(details), cause ? { cause } : undefined)
    this.name = 'ExecutionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: serializeExecutionDetails(this.details),
    }
  }
}

// --- Fixture Error ---

export class FixtureError extends QueryDiffError {
  declare readonly code: 'FIXTURE_MISSING' | 'FIXTURE_UNREADABLE'
  readonly path: string

  constructor(code: 'FIXTURE_MISSING' | 'FIXTURE_UNREADABLE', path: string, cause?: Error | undefined) {
    super(
      code,
      code === 'FIXTURE_MISSING' ? `Fixture missing: ${path}` : `Fixture unreadable: ${path}`,
      cause ? { cause } : undefined,
    )
    this.name = 'FixtureError'
    this.path = path
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      path: this.path,
    }
  }
}

// --- Comparison Mismatch ---

export class ComparisonMismatchError extends QueryDiffError {
  declare readonly code: 'RESULT_MISMATCH'
  readonly reason: string
  readonly diff: string

  constructor(reason: string, diff: string) {
    super('RESULT_MISMATCH', `Result not as expected: ${reason}`)
    this.name = 'ComparisonMismatchError'
    this.reason = reason
    this.diff = diff
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      reason: this.reason,
      diff: this.diff,
    }
  }
}

// --- Mapping Error ---

export interface MappingErrorDetails {
  cluster?: string | undefined
  database?: string | undefined
  retentionPolicy?: string | undefined
}

export class MappingError extends QueryDiffError {
  declare readonly code: 'MAPPING_NOT_FOUND' | 'MAPPING_LOAD_FAILED'
  readonly details: MappingErrorDetails

  constructor(
    code: 'MAPPING_NOT_FOUND' | 'MAPPING_LOAD_FAILED',
    details: MappingErrorDetails,
    cause?: Error | undefined,
  ) {
    super(code, defaultMappingMessage(code, details), cause ? { cause } : undefined)
    this.name = 'MappingError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Stream Error ---

export class StreamError extends QueryDiffError {
  declare readonly code: 'ALREADY_CONSUMED' | 'RELEASED'

  constructor(code: 'ALREADY_CONSUMED' | 'RELEASED') {
    super(code, code === 'ALREADY_CONSUMED' ? 'Stream is single-pass and was already consumed' : 'Stream was released')
    this.name = 'StreamError'
  }
}

// --- Helpers ---

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

function serializeError(err: unknown): Record<string, unknown> | unknown {
  if (err instanceof QueryDiffError) {
    return err.toJSON()
  }
  if (err instanceof Error) {
    const json: Record<string, unknown> = {
      message: err.message,
      name: err.name,
    }
    if (err.cause !== undefined) {
      json.cause = serializeError(err.cause)
    }
    return json
  }
  return err
}

function serializeExecutionDetails(details: ExecutionErrorDetails): unknown {
  if (details.code === 'QUERY_FAILED' && details.cause !== undefined) {
    const { cause, ...rest } = details
    return { ...rest, cause: serializeError(cause) }
  }
  return details
}

function formatDecodeMessage(reason: string, details: DecodeErrorDetails): string {
  if (details.line !== undefined) return `${details.format}: line ${String(details.line)}: ${reason}`
  if (details.path !== undefined) return `${details.format}: ${details.path}: ${reason}`
  return `${details.format}: ${reason}`
}

function defaultExecutionMessage(details: ExecutionErrorDetails): string {
  switch (details.code) {
    case 'SOURCE_UNAVAILABLE':
      return `Source unavailable: ${details.source}`
    case 'QUERY_FAILED':
      return details.operation !== undefined ? `Query failed in ${details.operation}` : 'Query failed'
  }
}

function defaultMappingMessage(code: MappingError['code'], details: MappingErrorDetails): string {
  const target = [details.cluster, details.database, details.retentionPolicy]
    .filter((p): p is string => p !== undefined && p !== '')
    .join('/')
  switch (code) {
    case 'MAPPING_NOT_FOUND':
      return target.length > 0 ? `No mapping for ${target}` : 'No mapping found'
    case 'MAPPING_LOAD_FAILED':
      return target.length > 0 ? `Failed to load mapping for ${target}` : 'Failed to load mappings'
  }
}
