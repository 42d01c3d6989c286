/**
 * Trigger source: builds the TriggerContext for one pipeline run.
 */

import { ConfigError } from '../../core/errors.js'
import { TRIGGER_KINDS } from '../../core/types.js'
import type { TriggerContext, TriggerKind } from '../../core/types.js'
import { computeFingerprint } from './fingerprint.js'
import { isTriggerKind } from './schemas.js'
import type { PipelineFile } from './schemas.js'

export interface ResolveTriggerOptions {
  pipeline: PipelineFile
  /** Workspace root the skip paths are relative to */
  root: string
  /** Trigger kind; falls back to LATTICE_EVENT, then `manual` */
  event?: string
  /** Ref; falls back to LATTICE_REF, then the empty string */
  ref?: string
  /** Used when the pipeline does not set `skip.do_not_skip` */
  doNotSkip: readonly TriggerKind[]
  env?: NodeJS.ProcessEnv
}

/**
 * @throws {ConfigError} for an unknown trigger kind
 */
export async function resolveTrigger(options: ResolveTriggerOptions): Promise<TriggerContext> {
  const env = options.env ?? process.env
  const event = options.event ?? env['LATTICE_EVENT'] ?? 'manual'
  if (!isTriggerKind(event)) {
    throw new ConfigError(`Unknown trigger event "${event}". Expected one of: ${TRIGGER_KINDS.join(', ')}`, {
      event,
    })
  }

  const ref = options.ref ?? env['LATTICE_REF'] ?? ''
  const skip = options.pipeline.skip
  const fingerprint = await computeFingerprint({ root: options.root, paths: skip.paths, ref })

  return {
    kind: event,
    ref,
    pathFilters: skip.paths,
    fingerprint,
    doNotSkip: skip.do_not_skip ?? options.doNotSkip,
  }
}
