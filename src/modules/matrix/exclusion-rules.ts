/**
 * Exclusion rule validation and matching for matrix expansion.
 *
 * A rule maps axis references to expected values. A reference is either the
 * axis name itself (`features`) or the axis name followed by a key into a
 * record-shaped variant (`info.os`). A combination is excluded when every
 * entry of the rule matches.
 */

import { InvalidExclusionRuleError } from '../../core/errors.js'
import type { AxisSet, ExclusionRule, Variant, VariantCombination, VariantRecord } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isVariantRecord(value: Variant | undefined): value is VariantRecord {
  return typeof value === 'object' && value !== null
}

/** Split `info.os` into `['info', 'os']`; keys may themselves contain dots */
export function splitReference(reference: string): { axis: string; key: string | null } {
  const dot = reference.indexOf('.')
  if (dot === -1) return { axis: reference, key: null }
  return { axis: reference.slice(0, dot), key: reference.slice(dot + 1) }
}

/**
 * Resolve an axis reference against a combination.
 * Returns undefined when the axis or the key is absent.
 */
export function resolveReference(combination: VariantCombination, reference: string): Variant | undefined {
  const { axis, key } = splitReference(reference)
  const value = combination[axis]
  if (key === null) return value
  if (!isVariantRecord(value)) return undefined
  return value[key]
}

/**
 * Match an actual variant against an expected one.
 * Record expectations match as a subset of a record variant.
 */
export function variantMatches(actual: Variant | undefined, expected: Variant): boolean {
  if (actual === undefined) return false
  if (isVariantRecord(expected)) {
    if (!isVariantRecord(actual)) return false
    return Object.entries(expected).every(([k, v]) => actual[k] === v)
  }
  return actual === expected
}

// ---------------------------------------------------------------------------
// validateExclusionRules
// ---------------------------------------------------------------------------

/**
 * Check every rule against the axis set before any combination is built.
 *
 * @throws {InvalidExclusionRuleError} for an empty rule, an unknown axis, or a
 *   key that no record variant of the axis defines
 */
export function validateExclusionRules(axisSet: AxisSet, rules: readonly ExclusionRule[]): void {
  const axes = new Map(axisSet.map((axis) => [axis.name, axis]))

  rules.forEach((rule, ruleIndex) => {
    const references = Object.keys(rule)
    if (references.length === 0) {
      throw new InvalidExclusionRuleError(`Exclusion rule #${ruleIndex + 1} is empty`, { ruleIndex })
    }

    for (const reference of references) {
      const { axis: axisName, key } = splitReference(reference)
      const axis = axes.get(axisName)
      if (axis === undefined) {
        throw new InvalidExclusionRuleError(
          `Exclusion rule #${ruleIndex + 1} references unknown axis "${axisName}"`,
          { ruleIndex, reference, knownAxes: [...axes.keys()] },
        )
      }
      if (key !== null) {
        const keyDefined = axis.variants.some((v) => isVariantRecord(v) && key in v)
        if (!keyDefined) {
          throw new InvalidExclusionRuleError(
            `Exclusion rule #${ruleIndex + 1} references key "${key}" which no variant of axis "${axisName}" defines`,
            { ruleIndex, reference },
          )
        }
      }
    }
  })
}

// ---------------------------------------------------------------------------
// isExcluded
// ---------------------------------------------------------------------------

/** True if any rule matches the combination in full */
export function isExcluded(combination: VariantCombination, rules: readonly ExclusionRule[]): boolean {
  return rules.some((rule) =>
    Object.entries(rule).every(([reference, expected]) =>
      variantMatches(resolveReference(combination, reference), expected),
    ),
  )
}
