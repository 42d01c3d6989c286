/**
 * Unit tests for gate-expression.ts
 */

import { describe, it, expect } from 'vitest'
import { compileGate, DEFAULT_GATE_SOURCE } from '../gate-expression.js'
import { InvalidGateExpressionError } from '../../../core/errors.js'
import type { GateContext } from '../../../core/types.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeContext(overrides: Partial<GateContext> = {}): GateContext {
  return {
    skipped: false,
    success: true,
    event: 'pull_request',
    matrix: { info: { os: 'ubuntu-latest', cross: false }, features: '--all-features', shard: 2 },
    steps: { fmt: 'succeeded', clippy: 'not_run' },
    ...overrides,
  }
}

// ---------------------------------------------------------------------------
// Default gate
// ---------------------------------------------------------------------------

describe('default gate', () => {
  it('is used when no source is given', () => {
    expect(compileGate().source).toBe(DEFAULT_GATE_SOURCE)
    expect(compileGate('   ').source).toBe(DEFAULT_GATE_SOURCE)
  })

  it('passes for a non-skipped successful job', () => {
    expect(compileGate().evaluate(makeContext())).toBe(true)
  })

  it('fails when the job is skipped', () => {
    expect(compileGate().evaluate(makeContext({ skipped: true }))).toBe(false)
  })

  it('fails after an earlier failure', () => {
    expect(compileGate().evaluate(makeContext({ success: false }))).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// Operators and references
// ---------------------------------------------------------------------------

describe('evaluation', () => {
  it.each([
    ['true', true],
    ['false', false],
    ['!false', true],
    ['true && false', false],
    ['false || true', true],
    ['!(true && false)', true],
    ['false || true && false', false],
    ['(false || true) && true', true],
    ["event == 'pull_request'", true],
    ['event != "push"', true],
    ["matrix.features == '--all-features'", true],
    ["matrix.info.os == 'macOS-latest'", false],
    ['matrix.info.cross == false', true],
    ['!matrix.info.cross', true],
    ['matrix.shard == 2', true],
    ["matrix.shard == '2'", true],
    ["steps.fmt.outcome == 'succeeded'", true],
    ["steps.clippy.outcome == 'not_run'", true],
    ["steps.later.outcome == 'pending'", true],
    ['matrix.missing', false],
  ])('%s evaluates to %s', (source, expected) => {
    expect(compileGate(source).evaluate(makeContext())).toBe(expected)
  })

  it('evaluates against the context it is given', () => {
    const gate = compileGate("event == 'push' || matrix.features == '--no-default-features'")
    expect(gate.evaluate(makeContext())).toBe(false)
    expect(gate.evaluate(makeContext({ event: 'push' }))).toBe(true)
    expect(gate.evaluate(makeContext({ matrix: { features: '--no-default-features' } }))).toBe(true)
  })

  it('keeps the trimmed source', () => {
    expect(compileGate('  success  ').source).toBe('success')
  })
})

// ---------------------------------------------------------------------------
// Compile errors
// ---------------------------------------------------------------------------

describe('compile errors', () => {
  it.each([
    ['success &&', 'unexpected end of expression'],
    ['(success', 'missing ")"'],
    ['success success', 'unexpected token at position 8'],
    ["event == 'push", 'unterminated string'],
    ['success & skipped', 'unexpected character "&"'],
    ['github.ref', 'unknown identifier "github.ref"'],
    ['steps..outcome', 'does not name a step'],
    ['matrix.', 'does not name an axis'],
  ])('rejects %s', (source, message) => {
    expect(() => compileGate(source)).toThrow(InvalidGateExpressionError)
    expect(() => compileGate(source)).toThrow(message)
  })

  it('checks references against the given scope', () => {
    const scope = { axisNames: ['os'], stepNames: ['fmt'] }
    expect(() => compileGate("matrix.os == 'a' && steps.fmt.outcome == 'failed'", scope)).not.toThrow()
    expect(() => compileGate('matrix.arch', scope)).toThrow('unknown matrix axis "arch"')
    expect(() => compileGate("steps.test.outcome == 'failed'", scope)).toThrow(
      'unknown or later step "test"',
    )
  })

  it('carries the expression in the error context', () => {
    try {
      compileGate('nope')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidGateExpressionError)
      expect(err).toMatchObject({ code: 'INVALID_GATE_EXPRESSION', context: { expression: 'nope' } })
    }
  })
})
