import type { Mapping } from '@querydiff/model'
import { CompileError, parseTime, toError } from '@querydiff/model'
import type { MappingService } from '../types/interfaces.js'
import type { AggregateFn, ComparisonOperator, Operation, Predicate } from './plan.js'
import { isAggregateFn, numberLiteral } from './plan.js'
import type { TqlQuery } from './tql.js'

// --- Statement ---

export interface LqlSource {
  readonly database?: string | undefined
  readonly retentionPolicy?: string | undefined
  readonly measurement: string
}

export interface LqlCondition {
  readonly column: string
  readonly operator: ComparisonOperator
  readonly value: string | number | bigint | boolean
  readonly position: number
}

export interface LqlStatement {
  readonly field: string
  readonly fn?: AggregateFn | undefined
  readonly alias?: string | undefined
  readonly source: LqlSource
  readonly conditions: readonly LqlCondition[]
  readonly dimensions: readonly string[]
  readonly descending: boolean
  readonly limit?: number | undefined
}

/** Functions of the legacy language that the transpiler does not translate. */
const UNSUPPORTED_FUNCTIONS = new Set([
  'bottom',
  'derivative',
  'difference',
  'distinct',
  'elapsed',
  'integral',
  'median',
  'mode',
  'moving_average',
  'non_negative_derivative',
  'percentile',
  'spread',
  'stddev',
  'top',
])

const UNSUPPORTED_CLAUSES = new Set(['fill', 'into', 'offset', 'slimit', 'soffset', 'tz'])

const OPERATORS = new Map<string, ComparisonOperator>([
  ['=', '=='],
  ['!=', '!='],
  ['<>', '!='],
  ['<', '<'],
  ['<=', '<='],
  ['>', '>'],
  ['>=', '>='],
])

const MIN_TIME = -9_223_372_036_854_775_808n

function parseError(message: string, position?: number): CompileError {
  return new CompileError('PARSE_FAILED', message, { language: 'lql', position })
}

function unsupported(message: string, position?: number): CompileError {
  return new CompileError('UNSUPPORTED', message, { language: 'lql', position })
}

// --- Lexer ---

type TokenKind = 'ident' | 'quoted' | 'string' | 'regex' | 'number' | 'punct' | 'eof'

interface Token {
  readonly kind: TokenKind
  readonly text: string
  readonly position: number
}

const PUNCTUATION = ['=~', '!~', '!=', '<>', '<=', '>=', '=', '<', '>', '(', ')', ',', '.', '*', ';']
const NUMBER_LITERAL = /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/y
const IDENTIFIER = /[A-Za-z_][A-Za-z0-9_]*/y

function matchAt(re: RegExp, source: string, position: number): string | undefined {
  re.lastIndex = position
  return re.exec(source)?.[0]
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = []
  let i = 0
  while (i < source.length) {
    const ch = source.charAt(i)
    if (/\s/.test(ch)) {
      i++
      continue
    }
    if (ch === '"' || ch === "'") {
      const [text, next] = readQuoted(source, i, ch)
      tokens.push({ kind: ch === '"' ? 'quoted' : 'string', text, position: i })
      i = next
      continue
    }
    if (ch === '/') {
      const [text, next] = readQuoted(source, i, ch)
      tokens.push({ kind: 'regex', text, position: i })
      i = next
      continue
    }
    const number = matchAt(NUMBER_LITERAL, source, i)
    if (number !== undefined) {
      tokens.push({ kind: 'number', text: number, position: i })
      i += number.length
      continue
    }
    const ident = matchAt(IDENTIFIER, source, i)
    if (ident !== undefined) {
      tokens.push({ kind: 'ident', text: ident, position: i })
      i += ident.length
      continue
    }
    const punct = PUNCTUATION.find((p) => source.startsWith(p, i))
    if (punct === undefined) throw parseError(`unexpected character ${JSON.stringify(ch)}`, i)
    tokens.push({ kind: 'punct', text: punct, position: i })
    i += punct.length
  }
  tokens.push({ kind: 'eof', text: '', position: source.length })
  return tokens
}

function readQuoted(source: string, start: number, quote: string): [string, number] {
  let text = ''
  for (let i = start + 1; i < source.length; i++) {
    const ch = source.charAt(i)
    if (ch === quote) return [text, i + 1]
    if (ch === '\\' && i + 1 < source.length) {
      text += source.charAt(i + 1)
      i++
    } else {
      text += ch
    }
  }
  throw parseError('unterminated quoted text', start)
}

// --- Parser ---

class LqlParser {
  private readonly tokens: Token[]
  private index = 0

  constructor(tokens: Token[]) {
    this.tokens = tokens
  }

  statement(): LqlStatement {
    this.keyword('select')
    const { field, fn } = this.selection()
    const alias = this.acceptKeyword('as') ? this.name() : undefined
    if (this.acceptPunct(',')) throw unsupported('selecting more than one field', this.peek().position)

    this.keyword('from')
    const source = this.source()
    const conditions = this.acceptKeyword('where') ? this.conditions() : []

    let dimensions: string[] = []
    if (this.acceptKeyword('group')) {
      this.keyword('by')
      dimensions = this.dimensions()
    }

    let descending = false
    if (this.acceptKeyword('order')) {
      this.keyword('by')
      const column = this.next()
      if (!isWord(column, 'time')) throw unsupported('ORDER BY is only supported on time', column.position)
      if (this.acceptKeyword('desc')) descending = true
      else this.acceptKeyword('asc')
    }

    let limit: number | undefined
    if (this.acceptKeyword('limit')) {
      const token = this.next()
      const n = Number(token.text)
      if (token.kind !== 'number' || !Number.isSafeInteger(n) || n < 0) {
        throw parseError('LIMIT takes a non-negative integer', token.position)
      }
      limit = n
    }

    this.acceptPunct(';')
    const rest = this.peek()
    if (rest.kind === 'ident' && UNSUPPORTED_CLAUSES.has(rest.text.toLowerCase())) {
      throw unsupported(`${rest.text.toUpperCase()} is not supported`, rest.position)
    }
    if (rest.kind !== 'eof') throw parseError(`unexpected ${describe(rest)}`, rest.position)

    return { field, fn, alias, source, conditions, dimensions, descending, limit }
  }

  private selection(): { field: string; fn?: AggregateFn | undefined } {
    const token = this.peek()
    if (token.kind === 'punct' && token.text === '*') throw unsupported('SELECT * is not supported', token.position)

    const name = this.name()
    if (!this.acceptPunct('(')) return { field: name }

    const fn = name.toLowerCase()
    if (UNSUPPORTED_FUNCTIONS.has(fn)) throw unsupported(`${fn}() is not supported`, token.position)
    if (!isAggregateFn(fn)) {
      throw new CompileError('UNKNOWN_IDENTIFIER', `unknown function ${name}`, {
        language: 'lql',
        position: token.position,
        identifier: name,
      })
    }
    const inner = this.peek()
    if (inner.kind === 'punct' && inner.text === '*') throw unsupported(`${fn}(*) is not supported`, inner.position)
    const field = this.name()
    if (this.acceptPunct('(')) throw unsupported('nested function calls are not supported', inner.position)
    this.expectPunct(')')
    return { field, fn }
  }

  private source(): LqlSource {
    const parts = [this.name()]
    while (this.acceptPunct('.')) {
      const token = this.peek()
      parts.push(token.kind === 'punct' && token.text === '.' ? '' : this.name())
    }
    const [a, b, c] = parts
    if (parts.length === 1 && a !== undefined) return { measurement: a }
    if (parts.length === 2 && a !== undefined && b !== undefined) return { retentionPolicy: a, measurement: b }
    if (parts.length === 3 && a !== undefined && b !== undefined && c !== undefined) {
      return { database: a, retentionPolicy: b === '' ? undefined : b, measurement: c }
    }
    throw parseError(`invalid measurement ${parts.join('.')}`)
  }

  private conditions(): LqlCondition[] {
    const conditions = [this.condition()]
    for (;;) {
      if (this.acceptKeyword('and')) {
        conditions.push(this.condition())
        continue
      }
      const token = this.peek()
      if (isWord(token, 'or')) throw unsupported('OR is not supported', token.position)
      return conditions
    }
  }

  private condition(): LqlCondition {
    const start = this.peek()
    if (start.kind === 'punct' && start.text === '(') {
      throw unsupported('parenthesized conditions are not supported', start.position)
    }
    const column = this.name()

    const op = this.next()
    if (op.kind === 'punct' && (op.text === '=~' || op.text === '!~')) {
      throw unsupported('regular expressions are not supported', op.position)
    }
    const operator = op.kind === 'punct' ? OPERATORS.get(op.text) : undefined
    if (operator === undefined) throw parseError(`expected a comparison, found ${describe(op)}`, op.position)

    const value = this.next()
    switch (value.kind) {
      case 'string':
        return { column, operator, value: value.text, position: start.position }
      case 'number':
        return { column, operator, value: numberLiteral(value.text), position: start.position }
      case 'ident':
        if (isWord(value, 'true') || isWord(value, 'false')) {
          return { column, operator, value: isWord(value, 'true'), position: start.position }
        }
        if (isWord(value, 'now')) throw unsupported('now() is not supported', value.position)
        break
      default:
        break
    }
    throw parseError(`expected a literal, found ${describe(value)}`, value.position)
  }

  private dimensions(): string[] {
    const dimensions: string[] = []
    do {
      const token = this.peek()
      if (token.kind === 'punct' && token.text === '*') throw unsupported('GROUP BY * is not supported', token.position)
      const name = this.name()
      if (this.acceptPunct('(')) throw unsupported(`GROUP BY ${name}() is not supported`, token.position)
      dimensions.push(name)
    } while (this.acceptPunct(','))
    return dimensions
  }

  private peek(): Token {
    return this.tokens[this.index] ?? { kind: 'eof', text: '', position: 0 }
  }

  private next(): Token {
    const token = this.peek()
    if (token.kind !== 'eof') this.index++
    return token
  }

  private name(): string {
    const token = this.next()
    if (token.kind !== 'ident' && token.kind !== 'quoted') {
      throw parseError(`expected an identifier, found ${describe(token)}`, token.position)
    }
    return token.text
  }

  private acceptPunct(punct: string): boolean {
    const token = this.peek()
    if (token.kind !== 'punct' || token.text !== punct) return false
    this.index++
    return true
  }

  private expectPunct(punct: string): void {
    const token = this.peek()
    if (!this.acceptPunct(punct)) throw parseError(`expected ${punct}, found ${describe(token)}`, token.position)
  }

  private acceptKeyword(word: string): boolean {
    if (!isWord(this.peek(), word)) return false
    this.index++
    return true
  }

  private keyword(word: string): void {
    const token = this.peek()
    if (!this.acceptKeyword(word)) {
      throw parseError(`expected ${word.toUpperCase()}, found ${describe(token)}`, token.position)
    }
  }
}

function isWord(token: Token, word: string): boolean {
  return token.kind === 'ident' && token.text.toLowerCase() === word
}

function describe(token: Token): string {
  return token.kind === 'eof' ? 'end of query' : JSON.stringify(token.text)
}

export function parseLql(source: string): LqlStatement {
  return new LqlParser(tokenize(source)).statement()
}

// --- Transpilation ---

export interface TranspileContext {
  readonly cluster: string
  /** Database used when the statement does not name one. */
  readonly database?: string | undefined
  readonly mappings: MappingService
}

/**
 * Translates a statement into the pipe-forward operations, resolving the
 * bucket through the mapping service.
 */
export async function transpileLql(source: string, context: TranspileContext): Promise<TqlQuery> {
  const statement = parseLql(source)
  const operations = lowerStatement(statement)
  const mapping = await resolveMapping(statement.source, context)
  return { bucket: mapping.bucketId, operations }
}

async function resolveMapping(source: LqlSource, context: TranspileContext): Promise<Mapping> {
  const database = source.database ?? context.database
  if (database === undefined || database === '') {
    throw new CompileError('MAPPING_UNRESOLVED', 'database name required', { language: 'lql' })
  }
  const retentionPolicy = source.retentionPolicy ?? ''
  try {
    return await context.mappings.findDefaultMapping(context.cluster, database, retentionPolicy)
  } catch (err) {
    const cause = toError(err)
    const target = retentionPolicy === '' ? `${database} (default retention policy)` : `${database}/${retentionPolicy}`
    throw new CompileError(
      'MAPPING_UNRESOLVED',
      `no bucket for ${target}: ${cause.message}`,
      { language: 'lql', identifier: database },
      cause,
    )
  }
}

function lowerStatement(statement: LqlStatement): Operation[] {
  const operations: Operation[] = []

  const times = statement.conditions.filter((c) => c.column === 'time')
  if (times.length > 0) {
    const { start, stop } = timeBounds(times)
    operations.push({ op: 'range', start: start ?? MIN_TIME, stop })
  }

  const predicates: Predicate[] = [
    { column: '_measurement', operator: '==', value: statement.source.measurement },
    { column: '_field', operator: '==', value: statement.field },
  ]
  for (const condition of statement.conditions) {
    if (condition.column === 'time') continue
    if (condition.column === statement.field) {
      predicates.push({ column: '_value', operator: condition.operator, value: condition.value })
    } else if (typeof condition.value === 'string') {
      predicates.push({ column: condition.column, operator: condition.operator, value: condition.value })
    } else {
      throw unsupported(`conditions on field ${condition.column} are not supported`, condition.position)
    }
  }
  operations.push({ op: 'filter', predicates })
  operations.push({ op: 'group', columns: ['_measurement', ...statement.dimensions] })

  if (statement.descending) operations.push({ op: 'sort', columns: ['_time'], desc: true })

  if (statement.fn !== undefined) {
    operations.push({ op: 'aggregate', fn: statement.fn, column: '_value', as: statement.alias ?? statement.fn })
  } else {
    operations.push({ op: 'keep', columns: ['_time', '_value', '_measurement', ...statement.dimensions] })
    operations.push({ op: 'rename', columns: { _value: statement.alias ?? statement.field } })
  }

  if (statement.limit !== undefined) operations.push({ op: 'limit', n: statement.limit })
  return operations
}

function timeBounds(conditions: readonly LqlCondition[]): { start?: bigint | undefined; stop?: bigint | undefined } {
  let start: bigint | undefined
  let stop: bigint | undefined
  const raise = (t: bigint): void => {
    if (start === undefined || t > start) start = t
  }
  const lower = (t: bigint): void => {
    if (stop === undefined || t < stop) stop = t
  }

  for (const condition of conditions) {
    const t = toTime(condition)
    switch (condition.operator) {
      case '>=':
        raise(t)
        break
      case '>':
        raise(t + 1n)
        break
      case '<':
        lower(t)
        break
      case '<=':
        lower(t + 1n)
        break
      case '==':
        raise(t)
        lower(t + 1n)
        break
      case '!=':
        throw unsupported('time != is not supported', condition.position)
    }
  }
  return { start, stop }
}

function toTime(condition: LqlCondition): bigint {
  if (typeof condition.value === 'string') {
    const ns = parseTime(condition.value)
    if (ns !== undefined) return ns
  } else if (typeof condition.value === 'bigint') {
    return condition.value
  } else if (typeof condition.value === 'number' && Number.isSafeInteger(condition.value)) {
    return BigInt(condition.value)
  }
  throw parseError(`invalid time ${String(condition.value)}`, condition.position)
}
