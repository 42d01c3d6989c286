/**
 * ResultAggregator: folds terminal JobResults into one pipeline verdict.
 *
 * The verdict is `failure` iff some required job failed or was cancelled.
 * Best-effort outcomes appear in the report but never change the verdict.
 */

import type {
  JobResult,
  PipelineVerdict,
  ReportLine,
  TerminalJobStatus,
} from '../../core/types.js'
import { ANSI, bold, colorize, dim, padOrTruncate } from '../../utils/ansi.js'
import { formatDuration } from '../../utils/helpers.js'

// ---------------------------------------------------------------------------
// aggregate
// ---------------------------------------------------------------------------

function isDecisive(result: JobResult): boolean {
  return result.job.policy === 'required' && (result.status === 'failed' || result.status === 'cancelled')
}

/**
 * Build the verdict and per-job report. Total over any result sequence;
 * an empty sequence is a success.
 */
export function aggregate(results: readonly JobResult[]): PipelineVerdict {
  const counts: Record<TerminalJobStatus, number> = { succeeded: 0, failed: 0, skipped: 0, cancelled: 0 }
  const report: ReportLine[] = []
  const decisive: string[] = []

  for (const result of results) {
    counts[result.status]++
    const line: ReportLine = {
      jobId: result.job.id,
      group: result.job.group,
      policy: result.job.policy,
      status: result.status,
      durationMs: result.durationMs,
      ...(result.failedStep !== undefined && { failedStep: result.failedStep }),
      decisive: isDecisive(result),
    }
    if (line.decisive) decisive.push(line.jobId)
    report.push(line)
  }

  return {
    verdict: decisive.length > 0 ? 'failure' : 'success',
    report,
    counts,
    decisive,
  }
}

// ---------------------------------------------------------------------------
// formatReport
// ---------------------------------------------------------------------------

export interface FormatReportOptions {
  /** Emit ANSI colors. Default: false */
  color?: boolean
}

const STATUS_ICON: Record<TerminalJobStatus, string> = {
  succeeded: '✔',
  failed: '✘',
  skipped: '↷',
  cancelled: '⊘',
}

const STATUS_COLOR: Record<TerminalJobStatus, string> = {
  succeeded: ANSI.GREEN,
  failed: ANSI.RED,
  skipped: ANSI.CYAN,
  cancelled: ANSI.YELLOW,
}

/**
 * Render the human-readable report: one line per job, then a summary line.
 * Decisive lines carry a `(decisive)` marker and are bold when color is on.
 */
export function formatReport(verdict: PipelineVerdict, options: FormatReportOptions = {}): string {
  const color = options.color ?? false
  const idWidth = Math.max(0, ...verdict.report.map((line) => line.jobId.length))
  const lines: string[] = []

  for (const line of verdict.report) {
    const status = colorize(`${STATUS_ICON[line.status]} ${padOrTruncate(line.status, 9)}`, STATUS_COLOR[line.status], color)
    let text = `  ${status} ${padOrTruncate(line.jobId, idWidth)}  ${formatDuration(line.durationMs)}`
    if (line.policy === 'best-effort') text += dim(' [best-effort]', color)
    if (line.failedStep !== undefined) text += ` (step: ${line.failedStep})`
    if (line.decisive) text = bold(`${text} (decisive)`, color)
    lines.push(text)
  }

  const { succeeded, failed, skipped, cancelled } = verdict.counts
  const summary =
    `Pipeline ${verdict.verdict}: ${String(succeeded)} succeeded, ${String(failed)} failed, ` +
    `${String(skipped)} skipped, ${String(cancelled)} cancelled`
  lines.push(colorize(summary, verdict.verdict === 'success' ? ANSI.GREEN : ANSI.RED, color))

  return lines.join('\n')
}
