/**
 * Step gate expressions: the `if:` predicate on a pipeline step.
 *
 * Grammar (lowest to highest precedence):
 *
 *   expr       := or
 *   or         := and ( '||' and )*
 *   and        := equality ( '&&' equality )*
 *   equality   := unary ( ( '==' | '!=' ) unary )?
 *   unary      := '!' unary | primary
 *   primary    := '(' expr ')' | literal | reference
 *   literal    := 'true' | 'false' | string | number
 *   reference  := 'success' | 'skipped' | 'event'
 *               | 'matrix.' axis ( '.' key )?
 *               | 'steps.' name '.outcome'
 *
 * Expressions are compiled once, when the pipeline definition is loaded, so
 * syntax errors and unknown identifiers surface before any job starts.
 */

import { InvalidGateExpressionError } from '../../core/errors.js'
import type { GateContext, StepGate } from '../../core/types.js'
import { isVariantRecord, resolveReference } from '../matrix/exclusion-rules.js'

/** Implicit gate of a step without `if:` */
export const DEFAULT_GATE_SOURCE = '!skipped && success'

// ---------------------------------------------------------------------------
// Tokens
// ---------------------------------------------------------------------------

type Token =
  | { type: 'lparen' | 'rparen' | 'and' | 'or' | 'not' | 'eq' | 'neq'; pos: number }
  | { type: 'string'; value: string; pos: number }
  | { type: 'number'; value: number; pos: number }
  | { type: 'ident'; value: string; pos: number }

const IDENT_START = /[A-Za-z_]/
const IDENT_PART = /[A-Za-z0-9_.-]/
const NUMBER = /^-?\d+(\.\d+)?/

function tokenize(source: string): Token[] {
  const tokens: Token[] = []
  let i = 0

  while (i < source.length) {
    const ch = source.charAt(i)
    const next = source.charAt(i + 1)

    if (/\s/.test(ch)) {
      i++
      continue
    }
    if (ch === '(') {
      tokens.push({ type: 'lparen', pos: i })
      i++
      continue
    }
    if (ch === ')') {
      tokens.push({ type: 'rparen', pos: i })
      i++
      continue
    }
    if (ch === '&' && next === '&') {
      tokens.push({ type: 'and', pos: i })
      i += 2
      continue
    }
    if (ch === '|' && next === '|') {
      tokens.push({ type: 'or', pos: i })
      i += 2
      continue
    }
    if (ch === '=' && next === '=') {
      tokens.push({ type: 'eq', pos: i })
      i += 2
      continue
    }
    if (ch === '!' && next === '=') {
      tokens.push({ type: 'neq', pos: i })
      i += 2
      continue
    }
    if (ch === '!') {
      tokens.push({ type: 'not', pos: i })
      i++
      continue
    }
    if (ch === "'" || ch === '"') {
      const end = source.indexOf(ch, i + 1)
      if (end === -1) {
        throw new InvalidGateExpressionError(source, `unterminated string at position ${i}`)
      }
      tokens.push({ type: 'string', value: source.slice(i + 1, end), pos: i })
      i = end + 1
      continue
    }
    const numberMatch = NUMBER.exec(source.slice(i))
    if (numberMatch !== null) {
      tokens.push({ type: 'number', value: Number(numberMatch[0]), pos: i })
      i += numberMatch[0].length
      continue
    }
    if (IDENT_START.test(ch)) {
      let end = i + 1
      while (end < source.length && IDENT_PART.test(source.charAt(end))) end++
      tokens.push({ type: 'ident', value: source.slice(i, end), pos: i })
      i = end
      continue
    }
    throw new InvalidGateExpressionError(source, `unexpected character "${ch}" at position ${i}`)
  }

  return tokens
}

// ---------------------------------------------------------------------------
// AST
// ---------------------------------------------------------------------------

type Reference =
  | { kind: 'success' }
  | { kind: 'skipped' }
  | { kind: 'event' }
  | { kind: 'matrix'; path: string }
  | { kind: 'step'; name: string }

type Node =
  | { type: 'literal'; value: string | number | boolean }
  | { type: 'ref'; ref: Reference }
  | { type: 'not'; operand: Node }
  | { type: 'and' | 'or' | 'eq' | 'neq'; left: Node; right: Node }

/** Names the compiler may check references against */
export interface GateScope {
  /** Axis names of the job's matrix; undefined skips the check */
  axisNames?: readonly string[]
  /** Names of the steps declared before the gated one; undefined skips the check */
  stepNames?: readonly string[]
}

function parseReference(source: string, name: string, scope: GateScope): Reference {
  if (name === 'success') return { kind: 'success' }
  if (name === 'skipped') return { kind: 'skipped' }
  if (name === 'event') return { kind: 'event' }

  if (name.startsWith('matrix.')) {
    const path = name.slice('matrix.'.length)
    const axis = path.split('.')[0] ?? ''
    if (axis === '') {
      throw new InvalidGateExpressionError(source, `"${name}" does not name an axis`)
    }
    if (scope.axisNames !== undefined && !scope.axisNames.includes(axis)) {
      throw new InvalidGateExpressionError(source, `unknown matrix axis "${axis}"`)
    }
    return { kind: 'matrix', path }
  }

  if (name.startsWith('steps.') && name.endsWith('.outcome')) {
    const stepName = name.slice('steps.'.length, -'.outcome'.length)
    if (stepName === '') {
      throw new InvalidGateExpressionError(source, `"${name}" does not name a step`)
    }
    if (scope.stepNames !== undefined && !scope.stepNames.includes(stepName)) {
      throw new InvalidGateExpressionError(source, `unknown or later step "${stepName}"`)
    }
    return { kind: 'step', name: stepName }
  }

  throw new InvalidGateExpressionError(source, `unknown identifier "${name}"`)
}

class Parser {
  private _pos = 0

  constructor(
    private readonly _source: string,
    private readonly _tokens: Token[],
    private readonly _scope: GateScope,
  ) {}

  parse(): Node {
    if (this._tokens.length === 0) {
      throw new InvalidGateExpressionError(this._source, 'expression is empty')
    }
    const node = this._parseOr()
    const extra = this._tokens[this._pos]
    if (extra !== undefined) {
      throw new InvalidGateExpressionError(this._source, `unexpected token at position ${extra.pos}`)
    }
    return node
  }

  private _peek(): Token | undefined {
    return this._tokens[this._pos]
  }

  private _parseOr(): Node {
    let left = this._parseAnd()
    while (this._peek()?.type === 'or') {
      this._pos++
      left = { type: 'or', left, right: this._parseAnd() }
    }
    return left
  }

  private _parseAnd(): Node {
    let left = this._parseEquality()
    while (this._peek()?.type === 'and') {
      this._pos++
      left = { type: 'and', left, right: this._parseEquality() }
    }
    return left
  }

  private _parseEquality(): Node {
    const left = this._parseUnary()
    const op = this._peek()?.type
    if (op === 'eq' || op === 'neq') {
      this._pos++
      return { type: op, left, right: this._parseUnary() }
    }
    return left
  }

  private _parseUnary(): Node {
    if (this._peek()?.type === 'not') {
      this._pos++
      return { type: 'not', operand: this._parseUnary() }
    }
    return this._parsePrimary()
  }

  private _parsePrimary(): Node {
    const token = this._peek()
    if (token === undefined) {
      throw new InvalidGateExpressionError(this._source, 'unexpected end of expression')
    }
    this._pos++

    switch (token.type) {
      case 'lparen': {
        const inner = this._parseOr()
        if (this._peek()?.type !== 'rparen') {
          throw new InvalidGateExpressionError(this._source, `missing ")" for "(" at position ${token.pos}`)
        }
        this._pos++
        return inner
      }
      case 'string':
      case 'number':
        return { type: 'literal', value: token.value }
      case 'ident':
        if (token.value === 'true') return { type: 'literal', value: true }
        if (token.value === 'false') return { type: 'literal', value: false }
        return { type: 'ref', ref: parseReference(this._source, token.value, this._scope) }
      default:
        throw new InvalidGateExpressionError(this._source, `unexpected token at position ${token.pos}`)
    }
  }
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

type Value = string | number | boolean

function resolve(ref: Reference, context: GateContext): Value {
  switch (ref.kind) {
    case 'success':
      return context.success
    case 'skipped':
      return context.skipped
    case 'event':
      return context.event
    case 'matrix': {
      const value = resolveReference(context.matrix, ref.path)
      if (value === undefined) return ''
      return isVariantRecord(value) ? JSON.stringify(value) : value
    }
    case 'step':
      return context.steps[ref.name] ?? 'pending'
  }
}

function truthy(value: Value): boolean {
  if (typeof value === 'boolean') return value
  if (typeof value === 'number') return value !== 0
  return value !== ''
}

function evaluateNode(node: Node, context: GateContext): Value {
  switch (node.type) {
    case 'literal':
      return node.value
    case 'ref':
      return resolve(node.ref, context)
    case 'not':
      return !truthy(evaluateNode(node.operand, context))
    case 'and':
      return truthy(evaluateNode(node.left, context)) && truthy(evaluateNode(node.right, context))
    case 'or':
      return truthy(evaluateNode(node.left, context)) || truthy(evaluateNode(node.right, context))
    case 'eq':
      return String(evaluateNode(node.left, context)) === String(evaluateNode(node.right, context))
    case 'neq':
      return String(evaluateNode(node.left, context)) !== String(evaluateNode(node.right, context))
  }
}

// ---------------------------------------------------------------------------
// compileGate
// ---------------------------------------------------------------------------

/**
 * Compile an `if:` expression into a StepGate.
 * An absent or blank source compiles the implicit `!skipped && success` gate.
 *
 * Equality compares the string forms of both sides, so `matrix.cross == true`
 * holds for a boolean variant and for the string "true".
 *
 * @throws {InvalidGateExpressionError} on syntax errors or unknown identifiers
 */
export function compileGate(source?: string, scope: GateScope = {}): StepGate {
  const text = source === undefined || source.trim() === '' ? DEFAULT_GATE_SOURCE : source.trim()
  const ast = new Parser(text, tokenize(text), scope).parse()
  return {
    source: text,
    evaluate: (context: GateContext): boolean => truthy(evaluateNode(ast, context)),
  }
}
