/**
 * pipeline-definition module: pipeline files to JobSpecs and TriggerContext.
 */

export {
  PipelineFileSchema,
  JobDefinitionSchema,
  StepDefinitionSchema,
  SUPPORTED_PIPELINE_VERSIONS,
  isTriggerKind,
} from './schemas.js'
export type { PipelineFile, JobDefinition, StepDefinition, RawPipeline } from './schemas.js'
export { parsePipelineString, parsePipelineFile, detectFormat } from './pipeline-parser.js'
export type { PipelineFormat } from './pipeline-parser.js'
export { validatePipeline, loadPipeline } from './pipeline-validator.js'
export type { ValidationResult } from './pipeline-validator.js'
export { buildJobs, toAxisSet, toExclusions, jobPolicy } from './pipeline-builder.js'
export type { BuildOptions } from './pipeline-builder.js'
export { computeFingerprint, globToRegExp, matchesAny, listWorkspaceFiles, IGNORED_DIRECTORIES } from './fingerprint.js'
export type { FingerprintInput } from './fingerprint.js'
export { resolveTrigger } from './trigger.js'
export type { ResolveTriggerOptions } from './trigger.js'
