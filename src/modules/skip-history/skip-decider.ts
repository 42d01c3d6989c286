/**
 * SkipDecider: decides whether a job can reuse a previous successful run.
 *
 * A job is skipped only when its trigger kind may be skipped and the last
 * successful run of the same group + variant combination was computed
 * against the same input fingerprint. Any trouble reading history means
 * the job runs.
 */

import type { JobSpec, SkipDecision, TriggerContext } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { HistoryEntry, HistoryStore } from './history-store.js'

const logger = createLogger('skip-history:decider')

export interface SkipOptions {
  /** False disables skipping for the whole run. Default: true */
  enabled?: boolean
}

/**
 * Compute the SkipDecision for one job. Never rejects.
 */
export async function shouldSkip(
  job: JobSpec,
  trigger: TriggerContext,
  history: HistoryStore,
  options: SkipOptions = {},
): Promise<SkipDecision> {
  const fingerprint = trigger.fingerprint

  if (options.enabled === false) {
    return { skip: false, fingerprint, reason: 'skipping-disabled' }
  }

  if (trigger.doNotSkip.includes(trigger.kind)) {
    return { skip: false, fingerprint, reason: 'trigger-not-skippable' }
  }

  let entry: HistoryEntry | undefined
  try {
    entry = await history.lookup(job.historyKey)
  } catch (err) {
    logger.warn(
      { jobId: job.id, historyKey: job.historyKey, err },
      'Skip history unavailable; running job',
    )
    return { skip: false, fingerprint, reason: 'history-unavailable' }
  }

  if (entry === undefined) {
    return { skip: false, fingerprint, reason: 'no-prior-success' }
  }
  if (entry.fingerprint !== fingerprint) {
    return { skip: false, fingerprint, reason: 'fingerprint-changed' }
  }

  logger.debug({ jobId: job.id, fingerprint }, 'Job matches a previous successful run')
  return { skip: true, fingerprint, reason: 'duplicate-of-successful-run' }
}
