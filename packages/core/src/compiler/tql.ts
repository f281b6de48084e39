import { CompileError, parseTime } from '@querydiff/model'
import type { AggregateFn, ComparisonOperator, Operation, Predicate } from './plan.js'
import { isAggregateFn, numberLiteral } from './plan.js'

// ── Public API ─────────────────────────────────────────────────

export interface TqlQuery {
  readonly bucket: string
  readonly operations: readonly Operation[]
}

/**
 * Parses a pipe-forward query:
 *
 *   from(bucket: "db/rp")
 *     |> range(start: 2018-05-22T19:53:26Z)
 *     |> filter(fn: (r) => r._measurement == "cpu" and r.host != "a")
 *     |> group(columns: ["host"])
 *     |> count()
 */
export function parseTql(source: string): TqlQuery {
  const calls = new TqlParser(tokenize(source)).parse()
  return lower(calls)
}

function parseError(message: string, position?: number): CompileError {
  return new CompileError('PARSE_FAILED', message, { language: 'tql', position })
}

function unknownIdentifier(identifier: string, position: number): CompileError {
  return new CompileError('UNKNOWN_IDENTIFIER', `unknown identifier ${identifier}`, {
    language: 'tql',
    position,
    identifier,
  })
}

// ── Lexer ──────────────────────────────────────────────────────

type TokenKind = 'ident' | 'string' | 'number' | 'time' | 'punct' | 'eof'

interface Token {
  readonly kind: TokenKind
  readonly text: string
  readonly position: number
}

const PUNCTUATION = ['|>', '=>', '==', '!=', '<=', '>=', '<', '>', '(', ')', '[', ']', '{', '}', ',', ':', '.']
const TIME_LITERAL = /\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})/y
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
    if (source.startsWith('//', i)) {
      const end = source.indexOf('\n', i)
      i = end < 0 ? source.length : end
      continue
    }
    if (ch === '"') {
      const [text, next] = readString(source, i)
      tokens.push({ kind: 'string', text, position: i })
      i = next
      continue
    }

    const time = matchAt(TIME_LITERAL, source, i)
    if (time !== undefined) {
      tokens.push({ kind: 'time', text: time, position: i })
      i += time.length
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

const ESCAPES: Record<string, string> = { '"': '"', '\\': '\\', n: '\n', t: '\t', r: '\r' }

function readString(source: string, start: number): [string, number] {
  let text = ''
  for (let i = start + 1; i < source.length; i++) {
    const ch = source.charAt(i)
    if (ch === '"') return [text, i + 1]
    if (ch === '\\') {
      const escaped = ESCAPES[source.charAt(i + 1)]
      if (escaped === undefined) throw parseError('invalid escape sequence', i)
      text += escaped
      i++
    } else {
      text += ch
    }
  }
  throw parseError('unterminated string literal', start)
}

// ── Parser ─────────────────────────────────────────────────────

type Expr =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'number'; readonly value: number | bigint }
  | { readonly kind: 'time'; readonly value: bigint }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'array'; readonly items: readonly Expr[] }
  | { readonly kind: 'record'; readonly fields: ReadonlyMap<string, Expr> }
  | { readonly kind: 'fn'; readonly predicates: readonly Predicate[] }

interface Argument {
  readonly expr: Expr
  readonly position: number
}

interface Call {
  readonly name: string
  readonly position: number
  readonly args: ReadonlyMap<string, Argument>
}

const OPERATORS: readonly ComparisonOperator[] = ['==', '!=', '<', '<=', '>', '>=']

class TqlParser {
  private readonly tokens: Token[]
  private index = 0

  constructor(tokens: Token[]) {
    this.tokens = tokens
  }

  parse(): Call[] {
    const calls = [this.call()]
    while (this.accept('|>')) calls.push(this.call())
    const rest = this.peek()
    if (rest.kind !== 'eof') throw parseError(`unexpected ${describe(rest)}`, rest.position)
    return calls
  }

  private call(): Call {
    const name = this.ident()
    this.expect('(')
    const args = new Map<string, Argument>()
    if (!this.accept(')')) {
      do {
        const arg = this.ident()
        if (args.has(arg.text)) throw parseError(`duplicate argument ${arg.text}`, arg.position)
        this.expect(':')
        args.set(arg.text, { expr: this.expr(), position: arg.position })
      } while (this.accept(','))
      this.expect(')')
    }
    return { name: name.text, position: name.position, args }
  }

  private expr(): Expr {
    const token = this.next()
    switch (token.kind) {
      case 'string':
        return { kind: 'string', value: token.text }
      case 'number':
        return { kind: 'number', value: numberLiteral(token.text) }
      case 'time':
        return { kind: 'time', value: this.time(token) }
      case 'ident':
        if (token.text === 'true' || token.text === 'false') return { kind: 'bool', value: token.text === 'true' }
        throw unknownIdentifier(token.text, token.position)
      case 'punct':
        if (token.text === '[') return this.array()
        if (token.text === '{') return this.record()
        if (token.text === '(') return this.fn()
        break
      case 'eof':
        break
    }
    throw parseError(`unexpected ${describe(token)}`, token.position)
  }

  private array(): Expr {
    const items: Expr[] = []
    if (this.accept(']')) return { kind: 'array', items }
    do {
      items.push(this.expr())
    } while (this.accept(','))
    this.expect(']')
    return { kind: 'array', items }
  }

  private record(): Expr {
    const fields = new Map<string, Expr>()
    if (this.accept('}')) return { kind: 'record', fields }
    do {
      const key = this.next()
      if (key.kind !== 'ident' && key.kind !== 'string') throw parseError(`unexpected ${describe(key)}`, key.position)
      this.expect(':')
      fields.set(key.text, this.expr())
    } while (this.accept(','))
    this.expect('}')
    return { kind: 'record', fields }
  }

  private fn(): Expr {
    const param = this.ident()
    this.expect(')')
    this.expect('=>')
    const predicates = [this.predicate(param.text)]
    for (;;) {
      const token = this.peek()
      if (token.kind !== 'ident') break
      if (token.text === 'or') {
        throw new CompileError('UNSUPPORTED', 'or is not supported in filter predicates', {
          language: 'tql',
          position: token.position,
        })
      }
      if (token.text !== 'and') break
      this.next()
      predicates.push(this.predicate(param.text))
    }
    return { kind: 'fn', predicates }
  }

  private predicate(param: string): Predicate {
    const record = this.ident()
    if (record.text !== param) throw unknownIdentifier(record.text, record.position)

    let column: string
    if (this.accept('.')) {
      column = this.ident().text
    } else {
      this.expect('[')
      const key = this.next()
      if (key.kind !== 'string') throw parseError(`unexpected ${describe(key)}`, key.position)
      column = key.text
      this.expect(']')
    }

    const op = this.next()
    const operator = OPERATORS.find((o) => op.kind === 'punct' && o === op.text)
    if (operator === undefined) throw parseError(`expected a comparison, found ${describe(op)}`, op.position)

    const value = this.expr()
    switch (value.kind) {
      case 'string':
      case 'number':
      case 'time':
      case 'bool':
        return { column, operator, value: value.value }
      default:
        throw parseError(`cannot compare ${column} with a ${value.kind}`, op.position)
    }
  }

  private time(token: Token): bigint {
    const ns = parseTime(token.text)
    if (ns === undefined) throw parseError(`invalid time ${token.text}`, token.position)
    return ns
  }

  private peek(): Token {
    return this.tokens[this.index] ?? { kind: 'eof', text: '', position: 0 }
  }

  private next(): Token {
    const token = this.peek()
    if (token.kind !== 'eof') this.index++
    return token
  }

  private accept(punct: string): boolean {
    const token = this.peek()
    if (token.kind !== 'punct' || token.text !== punct) return false
    this.index++
    return true
  }

  private expect(punct: string): void {
    const token = this.peek()
    if (!this.accept(punct)) throw parseError(`expected ${punct}, found ${describe(token)}`, token.position)
  }

  private ident(): Token {
    const token = this.next()
    if (token.kind !== 'ident') throw parseError(`expected an identifier, found ${describe(token)}`, token.position)
    return token
  }
}

function describe(token: Token): string {
  return token.kind === 'eof' ? 'end of query' : JSON.stringify(token.text)
}

// ── Lowering ───────────────────────────────────────────────────

/** Typed access to a call's named arguments. */
class CallArgs {
  private readonly call: Call

  constructor(call: Call, allowed: readonly string[]) {
    this.call = call
    for (const [name, arg] of call.args) {
      if (!allowed.includes(name)) throw unknownIdentifier(name, arg.position)
    }
  }

  string(name: string): string | undefined {
    const arg = this.call.args.get(name)
    if (arg === undefined) return undefined
    if (arg.expr.kind !== 'string') throw this.mismatch(name, 'a string', arg)
    return arg.expr.value
  }

  strings(name: string): string[] | undefined {
    const arg = this.call.args.get(name)
    if (arg === undefined) return undefined
    if (arg.expr.kind !== 'array') throw this.mismatch(name, 'an array of strings', arg)
    return arg.expr.items.map((item) => {
      if (item.kind !== 'string') throw this.mismatch(name, 'an array of strings', arg)
      return item.value
    })
  }

  labels(name: string): Record<string, string> | undefined {
    const arg = this.call.args.get(name)
    if (arg === undefined) return undefined
    if (arg.expr.kind !== 'record') throw this.mismatch(name, 'a record of strings', arg)
    const out: Record<string, string> = {}
    for (const [key, value] of arg.expr.fields) {
      if (value.kind !== 'string') throw this.mismatch(name, 'a record of strings', arg)
      out[key] = value.value
    }
    return out
  }

  time(name: string): bigint | undefined {
    const arg = this.call.args.get(name)
    if (arg === undefined) return undefined
    if (arg.expr.kind === 'time') return arg.expr.value
    if (arg.expr.kind === 'number') {
      if (typeof arg.expr.value === 'bigint') return arg.expr.value
      if (Number.isSafeInteger(arg.expr.value)) return BigInt(arg.expr.value)
    }
    throw this.mismatch(name, 'a time', arg)
  }

  count(name: string): number | undefined {
    const arg = this.call.args.get(name)
    if (arg === undefined) return undefined
    const value = arg.expr.kind === 'number' ? arg.expr.value : undefined
    if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
      throw this.mismatch(name, 'a non-negative integer', arg)
    }
    return value
  }

  bool(name: string): boolean | undefined {
    const arg = this.call.args.get(name)
    if (arg === undefined) return undefined
    if (arg.expr.kind !== 'bool') throw this.mismatch(name, 'a boolean', arg)
    return arg.expr.value
  }

  predicates(name: string): readonly Predicate[] | undefined {
    const arg = this.call.args.get(name)
    if (arg === undefined) return undefined
    if (arg.expr.kind !== 'fn') throw this.mismatch(name, 'a predicate function', arg)
    return arg.expr.predicates
  }

  required<T>(name: string, value: T | undefined): T {
    if (value === undefined) throw parseError(`${this.call.name}() requires ${name}`, this.call.position)
    return value
  }

  private mismatch(name: string, expected: string, arg: Argument): CompileError {
    return parseError(`${this.call.name}(): ${name} must be ${expected}`, arg.position)
  }
}

function lower(calls: readonly Call[]): TqlQuery {
  const [first, ...rest] = calls
  if (first === undefined || first.name !== 'from') {
    throw parseError('query must start with from()', first?.position ?? 0)
  }
  const from = new CallArgs(first, ['bucket'])
  return {
    bucket: from.required('bucket', from.string('bucket')),
    operations: rest.map(lowerCall),
  }
}

function lowerCall(call: Call): Operation {
  if (isAggregateFn(call.name)) return lowerAggregate(call, call.name)

  switch (call.name) {
    case 'from':
      throw parseError('from() may only start a query', call.position)
    case 'range': {
      const args = new CallArgs(call, ['start', 'stop'])
      return { op: 'range', start: args.required('start', args.time('start')), stop: args.time('stop') }
    }
    case 'filter': {
      const args = new CallArgs(call, ['fn'])
      return { op: 'filter', predicates: args.required('fn', args.predicates('fn')) }
    }
    case 'group': {
      const args = new CallArgs(call, ['columns'])
      return { op: 'group', columns: args.strings('columns') ?? [] }
    }
    case 'keep': {
      const args = new CallArgs(call, ['columns'])
      return { op: 'keep', columns: args.required('columns', args.strings('columns')) }
    }
    case 'rename': {
      const args = new CallArgs(call, ['columns'])
      return { op: 'rename', columns: args.required('columns', args.labels('columns')) }
    }
    case 'sort': {
      const args = new CallArgs(call, ['columns', 'desc'])
      return { op: 'sort', columns: args.strings('columns') ?? ['_value'], desc: args.bool('desc') ?? false }
    }
    case 'limit': {
      const args = new CallArgs(call, ['n'])
      return { op: 'limit', n: args.required('n', args.count('n')) }
    }
    default:
      throw unknownIdentifier(call.name, call.position)
  }
}

function lowerAggregate(call: Call, fn: AggregateFn): Operation {
  const args = new CallArgs(call, ['column', 'as'])
  return { op: 'aggregate', fn, column: args.string('column') ?? '_value', as: args.string('as') ?? fn }
}
