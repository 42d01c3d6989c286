/**
 * `${{ matrix.<axis>[.<key>] }}` placeholder substitution.
 *
 * Applied to step names, invocations and toolchain requests when a
 * combination is materialized into a JobSpec.
 */

import { InvalidAxisSetError } from '../../core/errors.js'
import type { Invocation, ToolchainRequest, VariantCombination } from '../../core/types.js'
import { isVariantRecord, resolveReference } from './exclusion-rules.js'

const PLACEHOLDER = /\$\{\{\s*([^}]*?)\s*\}\}/g
const MATRIX_PREFIX = 'matrix.'

/**
 * Replace every matrix placeholder in `template`.
 *
 * @throws {InvalidAxisSetError} when a placeholder is not a matrix reference,
 *   names an unknown axis/key, or resolves to a whole record
 */
export function interpolateMatrix(template: string, combination: VariantCombination): string {
  return template.replace(PLACEHOLDER, (_match: string, expression: string) => {
    if (!expression.startsWith(MATRIX_PREFIX)) {
      throw new InvalidAxisSetError(`Unsupported placeholder "\${{ ${expression} }}"`, { expression })
    }
    const value = resolveReference(combination, expression.slice(MATRIX_PREFIX.length))
    if (value === undefined) {
      throw new InvalidAxisSetError(`Placeholder "\${{ ${expression} }}" does not resolve in this matrix`, {
        expression,
      })
    }
    if (isVariantRecord(value)) {
      throw new InvalidAxisSetError(
        `Placeholder "\${{ ${expression} }}" resolves to a record; reference one of its keys`,
        { expression },
      )
    }
    return String(value)
  })
}

function interpolateEnv(
  env: Readonly<Record<string, string>>,
  combination: VariantCombination,
): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    out[key] = interpolateMatrix(value, combination)
  }
  return out
}

/** Interpolate every string field of an invocation */
export function interpolateInvocation(invocation: Invocation, combination: VariantCombination): Invocation {
  const env = interpolateEnv(invocation.env, combination)
  const cwd = invocation.cwd !== undefined ? interpolateMatrix(invocation.cwd, combination) : undefined
  if (invocation.kind === 'shell') {
    return {
      ...invocation,
      env,
      ...(cwd !== undefined && { cwd }),
      script: interpolateMatrix(invocation.script, combination),
    }
  }
  return {
    ...invocation,
    env,
    ...(cwd !== undefined && { cwd }),
    command: interpolateMatrix(invocation.command, combination),
    args: invocation.args.map((arg) => interpolateMatrix(arg, combination)),
  }
}

/** Interpolate a toolchain request (name, targets, components, setup) */
export function interpolateToolchain(
  request: ToolchainRequest,
  combination: VariantCombination,
): ToolchainRequest {
  return {
    name: interpolateMatrix(request.name, combination),
    components: request.components.map((c) => interpolateMatrix(c, combination)),
    targets: request.targets.map((t) => interpolateMatrix(t, combination)),
    ...(request.setup !== undefined && { setup: interpolateInvocation(request.setup, combination) }),
  }
}
