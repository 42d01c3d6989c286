/**
 * Credential masking utilities for step output and Pino logger redaction.
 *
 * Captured step output is scrubbed before it is logged, emitted as an
 * event or stored in a StepResult.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Regex patterns that identify credential-looking values in free text.
 */
export const SECRET_PATTERNS: RegExp[] = [
  // GitHub tokens: ghp_, gho_, ghs_, ghu_, ghr_
  /gh[posur]_[A-Za-z0-9]{30,}/g,
  // npm automation tokens
  /npm_[A-Za-z0-9]{30,}/g,
  // Generic key=value assignments of obvious secrets
  /((?:token|secret|password|api[_-]?key)\s*[=:]\s*)[^\s'"]+/gi,
  // Generic 40-char hex tokens
  /\b[A-Fa-f0-9]{40}\b/g,
]

/**
 * Known Pino redaction paths.
 * Pass this array to the `pino({ redact: ... })` option.
 */
export const PINO_REDACT_PATHS: string[] = [
  'token',
  'password',
  'secret',
  '*.token',
  '*.password',
  '*.secret',
  'env.GITHUB_TOKEN',
  'env.NPM_TOKEN',
  'invocation.env',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

/**
 * Replace any known secret patterns in a string with `***`.
 *
 * Best-effort only; it does not recognize every secret format.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of SECRET_PATTERNS) {
    // Reset lastIndex in case the regex is reused (global flag)
    pattern.lastIndex = 0
    result = result.replace(pattern, (match: string, prefix?: unknown) =>
      typeof prefix === 'string' && match.startsWith(prefix) ? `${prefix}${MASKED_VALUE}` : MASKED_VALUE,
    )
  }
  return result
}
