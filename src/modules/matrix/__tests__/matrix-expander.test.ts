/**
 * Unit tests for matrix-expander.ts
 *
 * Covers:
 *  - cross-product size, order and distinctness
 *  - exclusion monotonicity and record-subset matching
 *  - idempotence and frozen output
 *  - InvalidAxisSetError / InvalidExclusionRuleError cases
 *  - placeholder interpolation, job ids and history keys
 */

import { describe, it, expect } from 'vitest'
import {
  expandMatrix,
  expandCombinations,
  formatJobId,
  computeHistoryKey,
} from '../matrix-expander.js'
import type { JobTemplate } from '../matrix-expander.js'
import { InvalidAxisSetError, InvalidExclusionRuleError } from '../../../core/errors.js'
import type { AxisSet, ExclusionRule, StepGate } from '../../../core/types.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const alwaysGate: StepGate = { source: 'true', evaluate: () => true }

function makeTemplate(overrides: Partial<JobTemplate> = {}): JobTemplate {
  return {
    pipeline: 'ci',
    group: 'supported',
    policy: 'required',
    failFast: false,
    steps: [
      {
        name: 'build',
        gate: alwaysGate,
        invocation: { kind: 'exec', command: 'cargo', args: ['build', '${{ matrix.features }}'], env: {} },
      },
    ],
    ...overrides,
  }
}

const OS_FEATURES: AxisSet = [
  { name: 'os', variants: ['ubuntu-latest', 'macOS-latest'] },
  { name: 'features', variants: ['--all-features', '--no-default-features'] },
]

const INFO_FEATURES: AxisSet = [
  {
    name: 'info',
    variants: [
      { os: 'ubuntu-latest', target: 'x86_64-unknown-linux-gnu' },
      { os: 'macOS-latest', target: 'x86_64-apple-darwin' },
    ],
  },
  { name: 'features', variants: ['--all-features', '--no-default-features'] },
]

// ---------------------------------------------------------------------------
// expandCombinations
// ---------------------------------------------------------------------------

describe('expandCombinations', () => {
  it('produces the full cross-product with the first axis varying slowest', () => {
    expect(expandCombinations(OS_FEATURES)).toEqual([
      { os: 'ubuntu-latest', features: '--all-features' },
      { os: 'ubuntu-latest', features: '--no-default-features' },
      { os: 'macOS-latest', features: '--all-features' },
      { os: 'macOS-latest', features: '--no-default-features' },
    ])
  })

  it('has size equal to the product of axis sizes and no duplicates', () => {
    const axes: AxisSet = [
      { name: 'a', variants: [1, 2, 3] },
      { name: 'b', variants: [true, false] },
      { name: 'c', variants: ['x', 'y', 'z', 'w'] },
    ]
    const combos = expandCombinations(axes)
    expect(combos).toHaveLength(24)
    expect(new Set(combos.map((c) => JSON.stringify(c))).size).toBe(24)
  })

  it('yields one empty combination for an empty axis set', () => {
    expect(expandCombinations([])).toEqual([{}])
  })

  it('drops combinations matching an exclusion rule', () => {
    const combos = expandCombinations(OS_FEATURES, [{ os: 'macOS-latest', features: '--no-default-features' }])
    expect(combos).toHaveLength(3)
    expect(combos).not.toContainEqual({ os: 'macOS-latest', features: '--no-default-features' })
  })

  it('matches dotted references into record variants', () => {
    const combos = expandCombinations(INFO_FEATURES, [{ 'info.os': 'macOS-latest' }])
    expect(combos).toHaveLength(2)
    expect(combos.every((c) => JSON.stringify(c).includes('ubuntu-latest'))).toBe(true)
  })

  it('matches record expectations as a subset of the variant', () => {
    const combos = expandCombinations(INFO_FEATURES, [{ info: { os: 'ubuntu-latest' } }])
    expect(combos).toEqual([
      { info: { os: 'macOS-latest', target: 'x86_64-apple-darwin' }, features: '--all-features' },
      { info: { os: 'macOS-latest', target: 'x86_64-apple-darwin' }, features: '--no-default-features' },
    ])
  })

  it('is monotonic: adding a rule never adds combinations', () => {
    const rules: ExclusionRule[] = [{ os: 'ubuntu-latest', features: '--all-features' }]
    const fewer = expandCombinations(OS_FEATURES, rules)
    const evenFewer = expandCombinations(OS_FEATURES, [...rules, { features: '--no-default-features' }])
    expect(fewer).toHaveLength(3)
    expect(evenFewer).toHaveLength(1)
    for (const combo of evenFewer) {
      expect(fewer).toContainEqual(combo)
    }
  })

  it('does not match a scalar rule against a record axis', () => {
    const combos = expandCombinations(INFO_FEATURES, [{ info: 'ubuntu-latest' }])
    expect(combos).toHaveLength(4)
  })
})

// ---------------------------------------------------------------------------
// Validation errors
// ---------------------------------------------------------------------------

describe('axis set validation', () => {
  it('rejects an axis with zero variants', () => {
    expect(() => expandCombinations([{ name: 'os', variants: [] }])).toThrow(InvalidAxisSetError)
  })

  it('rejects duplicated axis names', () => {
    const axes: AxisSet = [
      { name: 'os', variants: ['a'] },
      { name: 'os', variants: ['b'] },
    ]
    expect(() => expandCombinations(axes)).toThrow('Axis "os" is declared more than once')
  })

  it('rejects axis names containing a dot', () => {
    expect(() => expandCombinations([{ name: 'a.b', variants: [1] }])).toThrow(InvalidAxisSetError)
  })

  it('rejects an empty exclusion rule', () => {
    expect(() => expandCombinations(OS_FEATURES, [{}])).toThrow(InvalidExclusionRuleError)
    expect(() => expandCombinations(OS_FEATURES, [{}])).toThrow('Exclusion rule #1 is empty')
  })

  it('rejects a rule naming an unknown axis', () => {
    const run = (): unknown => expandCombinations(OS_FEATURES, [{ os: 'ubuntu-latest' }, { arch: 'arm64' }])
    expect(run).toThrow('Exclusion rule #2 references unknown axis "arch"')
  })

  it('rejects a dotted key no record variant defines', () => {
    expect(() => expandCombinations(INFO_FEATURES, [{ 'info.cross': true }])).toThrow(InvalidExclusionRuleError)
  })

  it('exclusion errors are also InvalidAxisSetErrors', () => {
    try {
      expandCombinations(OS_FEATURES, [{ arch: 'arm64' }])
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidAxisSetError)
      expect(err).toMatchObject({ code: 'INVALID_EXCLUSION_RULE' })
    }
  })
})

// ---------------------------------------------------------------------------
// formatJobId / computeHistoryKey
// ---------------------------------------------------------------------------

describe('formatJobId', () => {
  it('lists variant labels in axis order', () => {
    expect(formatJobId('supported', OS_FEATURES, { features: '--all-features', os: 'ubuntu-latest' })).toBe(
      'supported (ubuntu-latest, --all-features)',
    )
  })

  it('joins record values', () => {
    const combo = { info: { os: 'ubuntu-latest', target: 'x86_64-unknown-linux-gnu' }, features: '--all-features' }
    expect(formatJobId('supported', INFO_FEATURES, combo)).toBe(
      'supported (ubuntu-latest, x86_64-unknown-linux-gnu, --all-features)',
    )
  })

  it('uses the bare group name without axes', () => {
    expect(formatJobId('lint', [], {})).toBe('lint')
  })
})

describe('computeHistoryKey', () => {
  it('is namespaced by pipeline and group', () => {
    expect(computeHistoryKey('ci', 'lint', {})).toMatch(/^ci\/lint\/[0-9a-f]{16}$/)
  })

  it('ignores key order inside the combination and its records', () => {
    const a = computeHistoryKey('ci', 'g', { x: 1, info: { os: 'a', target: 'b' } })
    const b = computeHistoryKey('ci', 'g', { info: { target: 'b', os: 'a' }, x: 1 })
    expect(a).toBe(b)
  })

  it('differs between combinations', () => {
    expect(computeHistoryKey('ci', 'g', { x: 1 })).not.toBe(computeHistoryKey('ci', 'g', { x: 2 }))
    expect(computeHistoryKey('ci', 'g', { x: 1 })).not.toBe(computeHistoryKey('ci', 'g', { x: '1' }))
  })
})

// ---------------------------------------------------------------------------
// expandMatrix
// ---------------------------------------------------------------------------

describe('expandMatrix', () => {
  it('materializes one JobSpec per surviving combination', () => {
    const jobs = expandMatrix(OS_FEATURES, [{ os: 'macOS-latest', features: '--no-default-features' }], makeTemplate())
    expect(jobs.map((j) => j.id)).toEqual([
      'supported (ubuntu-latest, --all-features)',
      'supported (ubuntu-latest, --no-default-features)',
      'supported (macOS-latest, --all-features)',
    ])
    expect(jobs.map((j) => j.index)).toEqual([0, 1, 2])
    expect(jobs.every((j) => j.group === 'supported' && j.policy === 'required')).toBe(true)
  })

  it('interpolates matrix placeholders into step invocations', () => {
    const jobs = expandMatrix(OS_FEATURES, [], makeTemplate())
    const invocation = jobs[1]?.steps[0]?.invocation
    expect(invocation).toEqual({
      kind: 'exec',
      command: 'cargo',
      args: ['build', '--no-default-features'],
      env: {},
    })
  })

  it('interpolates record keys into names, env, scripts and toolchains', () => {
    const template = makeTemplate({
      steps: [
        {
          name: 'test on ${{ matrix.info.os }}',
          gate: alwaysGate,
          invocation: {
            kind: 'shell',
            script: 'cargo test --target ${{matrix.info.target}}',
            env: { TARGET: '${{ matrix.info.target }}' },
          },
        },
      ],
      toolchain: {
        name: 'stable',
        components: [],
        targets: ['${{ matrix.info.target }}'],
        setup: { kind: 'shell', script: 'rustup target add ${{ matrix.info.target }}', env: {} },
      },
    })
    const [job] = expandMatrix(INFO_FEATURES, [], template)
    expect(job?.steps[0]?.name).toBe('test on ubuntu-latest')
    expect(job?.steps[0]?.invocation).toEqual({
      kind: 'shell',
      script: 'cargo test --target x86_64-unknown-linux-gnu',
      env: { TARGET: 'x86_64-unknown-linux-gnu' },
    })
    expect(job?.toolchain).toEqual({
      name: 'stable',
      components: [],
      targets: ['x86_64-unknown-linux-gnu'],
      setup: { kind: 'shell', script: 'rustup target add x86_64-unknown-linux-gnu', env: {} },
    })
  })

  it('rejects placeholders that do not resolve', () => {
    const template = makeTemplate({
      steps: [
        {
          name: 'build',
          gate: alwaysGate,
          invocation: { kind: 'shell', script: 'echo ${{ matrix.arch }}', env: {} },
        },
      ],
    })
    expect(() => expandMatrix(OS_FEATURES, [], template)).toThrow(
      'Placeholder "${{ matrix.arch }}" does not resolve in this matrix',
    )
  })

  it('rejects placeholders that are not matrix references', () => {
    const template = makeTemplate({
      steps: [
        {
          name: 'build',
          gate: alwaysGate,
          invocation: { kind: 'shell', script: 'echo ${{ secrets.token }}', env: {} },
        },
      ],
    })
    expect(() => expandMatrix(OS_FEATURES, [], template)).toThrow(InvalidAxisSetError)
  })

  it('rejects placeholders that resolve to a whole record', () => {
    const template = makeTemplate({
      steps: [
        { name: 'build', gate: alwaysGate, invocation: { kind: 'shell', script: 'echo ${{ matrix.info }}', env: {} } },
      ],
    })
    expect(() => expandMatrix(INFO_FEATURES, [], template)).toThrow(/resolves to a record/)
  })

  it('is idempotent', () => {
    const first = expandMatrix(INFO_FEATURES, [{ 'info.os': 'macOS-latest', features: '--all-features' }], makeTemplate())
    const second = expandMatrix(INFO_FEATURES, [{ 'info.os': 'macOS-latest', features: '--all-features' }], makeTemplate())
    expect(second).toEqual(first)
  })

  it('returns frozen JobSpecs', () => {
    const [job] = expandMatrix(OS_FEATURES, [], makeTemplate())
    expect(Object.isFrozen(job)).toBe(true)
    expect(Object.isFrozen(job?.variants)).toBe(true)
    expect(Object.isFrozen(job?.steps)).toBe(true)
  })

  it('suffixes colliding display ids', () => {
    const axes: AxisSet = [
      {
        name: 'info',
        variants: [
          { os: 'ubuntu-latest', cross: false },
          { os: 'ubuntu-latest', cross: false, note: 'dup' },
        ],
      },
    ]
    const jobs = expandMatrix(axes, [], makeTemplate({ steps: [] }))
    expect(jobs.map((j) => j.id)).toEqual([
      'supported (ubuntu-latest, false)',
      'supported (ubuntu-latest, false, dup)',
    ])
    const same: AxisSet = [{ name: 'n', variants: ['a', 'a'] }]
    expect(expandMatrix(same, [], makeTemplate({ steps: [] })).map((j) => j.id)).toEqual([
      'supported (a)',
      'supported (a) #2',
    ])
  })

  it('gives a job without axes a single spec named after its group', () => {
    const jobs = expandMatrix([], [], makeTemplate({ group: 'lint', steps: [] }))
    expect(jobs).toHaveLength(1)
    expect(jobs[0]?.id).toBe('lint')
    expect(jobs[0]?.variants).toEqual({})
  })
})
