/**
 * Pipeline definition validator.
 *
 * Combines Zod schema validation, step name checks, matrix checks and gate
 * compilation into a single ValidationResult, so every problem in a file is
 * reported at once and before any job starts.
 */

import { InvalidAxisSetError, InvalidGateExpressionError, PipelineDefinitionError } from '../../core/errors.js'
import { expandCombinations } from '../matrix/matrix-expander.js'
import { compileGate } from '../step-gates/gate-expression.js'
import { createLogger } from '../../utils/logger.js'
import { parsePipelineFile } from './pipeline-parser.js'
import { jobPolicy, toAxisSet, toExclusions } from './pipeline-builder.js'
import { PipelineFileSchema, SUPPORTED_PIPELINE_VERSIONS } from './schemas.js'
import type { JobDefinition, PipelineFile } from './schemas.js'

const logger = createLogger('pipeline-validator')

// ---------------------------------------------------------------------------
// ValidationResult
// ---------------------------------------------------------------------------

export interface ValidationResult {
  valid: boolean
  errors: string[]
  warnings: string[]
  /** The validated and typed pipeline (only present when valid === true) */
  pipeline?: PipelineFile
}

// ---------------------------------------------------------------------------
// Per-job checks
// ---------------------------------------------------------------------------

function checkJob(group: string, job: JobDefinition, errors: string[], warnings: string[]): void {
  const seen = new Set<string>()
  for (const step of job.steps) {
    if (seen.has(step.name)) {
      errors.push(`Job "${group}" declares step "${step.name}" more than once`)
    }
    seen.add(step.name)
  }

  const axisSet = toAxisSet(job)
  try {
    expandCombinations(axisSet, toExclusions(job))
  } catch (err) {
    if (!(err instanceof InvalidAxisSetError)) throw err
    errors.push(`Job "${group}": ${err.message}`)
  }

  const axisNames = axisSet.map((axis) => axis.name)
  job.steps.forEach((step, index) => {
    if (step.if === undefined) return
    const stepNames = job.steps.slice(0, index).map((s) => s.name)
    try {
      compileGate(step.if, { axisNames, stepNames })
    } catch (err) {
      if (!(err instanceof InvalidGateExpressionError)) throw err
      errors.push(`Job "${group}" step "${step.name}": ${err.message}`)
    }
  })

  if (job.fail_fast && jobPolicy(job) === 'best-effort') {
    warnings.push(`Job "${group}" sets fail_fast but is best-effort; fail_fast has no effect`)
  }
}

// ---------------------------------------------------------------------------
// validatePipeline
// ---------------------------------------------------------------------------

/**
 * Validate a raw (unknown) pipeline object.
 *
 * Runs in order:
 *  1. Version field check (before full schema parse) for a clear message
 *  2. Zod schema validation
 *  3. Per-job checks: duplicate step names, matrix, gate expressions
 */
export function validatePipeline(raw: unknown): ValidationResult {
  const errors: string[] = []
  const warnings: string[] = []
  const supported = SUPPORTED_PIPELINE_VERSIONS.join(', ')

  if (typeof raw === 'object' && raw !== null && !Array.isArray(raw) && 'version' in raw) {
    const version = raw.version
    if (
      (typeof version === 'string' || typeof version === 'number') &&
      !(SUPPORTED_PIPELINE_VERSIONS as readonly string[]).includes(String(version))
    ) {
      errors.push(`Pipeline version '${String(version)}' is not supported. Supported versions: ${supported}`)
      return { valid: false, errors, warnings }
    }
  } else {
    errors.push(`Pipeline version is missing. Supported versions: ${supported}`)
    return { valid: false, errors, warnings }
  }

  const parseResult = PipelineFileSchema.safeParse(raw)
  if (!parseResult.success) {
    for (const issue of parseResult.error.issues) {
      const path = issue.path.length > 0 ? ` (at ${issue.path.join('.')})` : ''
      errors.push(`${issue.message}${path}`)
    }
    return { valid: false, errors, warnings }
  }

  const pipeline = parseResult.data
  for (const [group, job] of Object.entries(pipeline.jobs)) {
    checkJob(group, job, errors, warnings)
  }

  if (pipeline.skip.enabled && pipeline.skip.paths.length === 0) {
    warnings.push('skip.paths is empty; the fingerprint covers the whole workspace')
  }

  if (errors.length > 0) {
    return { valid: false, errors, warnings }
  }
  return { valid: true, errors, warnings, pipeline }
}

// ---------------------------------------------------------------------------
// loadPipeline
// ---------------------------------------------------------------------------

/**
 * Read, parse and validate a pipeline file.
 *
 * @throws {PipelineDefinitionError} listing every problem found
 */
export function loadPipeline(filePath: string): PipelineFile {
  const result = validatePipeline(parsePipelineFile(filePath))
  for (const warning of result.warnings) {
    logger.warn({ filePath }, warning)
  }
  if (!result.valid || result.pipeline === undefined) {
    throw new PipelineDefinitionError(
      `Pipeline definition ${filePath} is invalid:\n${result.errors.map((e) => `  - ${e}`).join('\n')}`,
      result.errors,
      { filePath },
    )
  }
  logger.debug({ filePath, name: result.pipeline.name }, 'Loaded pipeline definition')
  return result.pipeline
}
