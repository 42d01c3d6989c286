/**
 * MatrixExpander: turns an axis set into concrete JobSpecs.
 *
 * Expansion is a pure function of its inputs:
 *  - axes are iterated in declaration order, the first axis varying slowest,
 *    so the resulting order is reproducible across runs
 *  - exclusion rules drop combinations before any JobSpec exists
 *  - matrix placeholders in the job template are substituted per combination
 */

import { createHash } from 'node:crypto'
import { InvalidAxisSetError } from '../../core/errors.js'
import type {
  AxisSet,
  ExclusionRule,
  Invocation,
  JobPolicy,
  JobSpec,
  StepGate,
  ToolchainRequest,
  Variant,
  VariantCombination,
} from '../../core/types.js'
import { deepFreeze } from '../../utils/helpers.js'
import { isExcluded, isVariantRecord, validateExclusionRules } from './exclusion-rules.js'
import { interpolateInvocation, interpolateMatrix, interpolateToolchain } from './interpolate.js'

// ---------------------------------------------------------------------------
// Job template
// ---------------------------------------------------------------------------

/** Step before matrix interpolation */
export interface StepTemplate {
  name: string
  gate: StepGate
  invocation: Invocation
}

/** Everything a JobSpec carries besides its variant combination */
export interface JobTemplate {
  /** Pipeline name; namespaces the history key */
  pipeline: string
  group: string
  policy: JobPolicy
  failFast: boolean
  steps: readonly StepTemplate[]
  toolchain?: ToolchainRequest
}

// ---------------------------------------------------------------------------
// validateAxisSet
// ---------------------------------------------------------------------------

/**
 * @throws {InvalidAxisSetError} for an axis with no variants or a duplicated axis name
 */
export function validateAxisSet(axisSet: AxisSet): void {
  const seen = new Set<string>()
  for (const axis of axisSet) {
    if (axis.name === '' || axis.name.includes('.')) {
      throw new InvalidAxisSetError(`Axis name "${axis.name}" must be non-empty and must not contain "."`, {
        axis: axis.name,
      })
    }
    if (seen.has(axis.name)) {
      throw new InvalidAxisSetError(`Axis "${axis.name}" is declared more than once`, { axis: axis.name })
    }
    seen.add(axis.name)
    if (axis.variants.length === 0) {
      throw new InvalidAxisSetError(`Axis "${axis.name}" has no variants`, { axis: axis.name })
    }
  }
}

// ---------------------------------------------------------------------------
// expandCombinations
// ---------------------------------------------------------------------------

/**
 * Cross-product of all axes minus excluded combinations.
 * An empty axis set yields exactly one empty combination.
 *
 * @throws {InvalidAxisSetError} / {InvalidExclusionRuleError} before any combination is built
 */
export function expandCombinations(
  axisSet: AxisSet,
  exclusions: readonly ExclusionRule[] = [],
): VariantCombination[] {
  validateAxisSet(axisSet)
  validateExclusionRules(axisSet, exclusions)

  const results: VariantCombination[] = []
  const current: Record<string, Variant> = {}

  const walk = (depth: number): void => {
    const axis = axisSet[depth]
    if (axis === undefined) {
      const combination = { ...current }
      if (!isExcluded(combination, exclusions)) {
        results.push(combination)
      }
      return
    }
    for (const variant of axis.variants) {
      current[axis.name] = variant
      walk(depth + 1)
    }
    delete current[axis.name]
  }

  walk(0)
  return results
}

// ---------------------------------------------------------------------------
// Identity helpers
// ---------------------------------------------------------------------------

function variantLabel(variant: Variant): string {
  if (isVariantRecord(variant)) {
    return Object.values(variant).map(String).join(', ')
  }
  return String(variant)
}

/** `group (v1, v2, ...)`, or the bare group name when there are no axes */
export function formatJobId(group: string, axisSet: AxisSet, combination: VariantCombination): string {
  const labels: string[] = []
  for (const axis of axisSet) {
    const variant = combination[axis.name]
    if (variant !== undefined) labels.push(variantLabel(variant))
  }
  return labels.length === 0 ? group : `${group} (${labels.join(', ')})`
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize)
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    return Object.fromEntries(entries.map(([k, v]) => [k, canonicalize(v)]))
  }
  return value
}

/**
 * Stable identity of a job group + variant combination.
 * Key order inside variants does not affect the result.
 */
export function computeHistoryKey(pipeline: string, group: string, combination: VariantCombination): string {
  const digest = createHash('sha256')
    .update(JSON.stringify(canonicalize(combination)))
    .digest('hex')
    .slice(0, 16)
  return `${pipeline}/${group}/${digest}`
}

// ---------------------------------------------------------------------------
// expandMatrix
// ---------------------------------------------------------------------------

/**
 * Expand(AxisSet, exclusions) → JobSpec[].
 *
 * JobSpecs are deep-frozen. Display ids that would collide get a ` #n` suffix.
 *
 * @throws {InvalidAxisSetError} for invalid axes or unresolvable placeholders
 * @throws {InvalidExclusionRuleError} for invalid exclusion rules
 */
export function expandMatrix(
  axisSet: AxisSet,
  exclusions: readonly ExclusionRule[],
  template: JobTemplate,
): JobSpec[] {
  const combinations = expandCombinations(axisSet, exclusions)
  const idCounts = new Map<string, number>()

  return combinations.map((combination, index) => {
    const baseId = formatJobId(template.group, axisSet, combination)
    const seen = idCounts.get(baseId) ?? 0
    idCounts.set(baseId, seen + 1)
    const id = seen === 0 ? baseId : `${baseId} #${seen + 1}`

    const job: JobSpec = {
      id,
      group: template.group,
      index,
      variants: combination,
      policy: template.policy,
      failFast: template.failFast,
      steps: template.steps.map((step) => ({
        name: interpolateMatrix(step.name, combination),
        gate: step.gate,
        invocation: interpolateInvocation(step.invocation, combination),
      })),
      ...(template.toolchain !== undefined && {
        toolchain: interpolateToolchain(template.toolchain, combination),
      }),
      historyKey: computeHistoryKey(template.pipeline, template.group, combination),
    }
    return deepFreeze(job)
  })
}
