/**
 * Core types for Lattice
 * Shared domain types used across the matrix, skip, runner, dispatch and report modules
 */

// ---------------------------------------------------------------------------
// Matrix
// ---------------------------------------------------------------------------

/** Scalar value allowed inside a variant */
export type Scalar = string | number | boolean

/** Record-shaped variant, e.g. { os: 'ubuntu-latest', target: 'x86_64-unknown-linux-gnu', cross: false } */
export type VariantRecord = Readonly<Record<string, Scalar>>

/** One concrete value along an axis */
export type Variant = Scalar | VariantRecord

/** One dimension of variation in the build matrix */
export interface Axis {
  name: string
  variants: readonly Variant[]
}

/** Ordered axes; declaration order drives expansion order */
export type AxisSet = readonly Axis[]

/**
 * Exclusion rule: axis reference → expected value.
 * A reference is an axis name (`features`) or a dotted path into a record variant (`info.os`).
 */
export type ExclusionRule = Readonly<Record<string, Variant>>

/** One variant chosen per axis */
export type VariantCombination = Readonly<Record<string, Variant>>

// ---------------------------------------------------------------------------
// Steps and jobs
// ---------------------------------------------------------------------------

/** Job policy: required jobs decide the verdict, best-effort jobs are only reported */
export type JobPolicy = 'required' | 'best-effort'

interface InvocationBase {
  env: Readonly<Record<string, string>>
  cwd?: string
  /** Hard limit for the invocation; 0 or undefined means no limit */
  timeoutMs?: number
}

/** Shell line handed to the platform shell */
export interface ShellInvocation extends InvocationBase {
  kind: 'shell'
  script: string
}

/** Binary + argument vector, no shell involved */
export interface ExecInvocation extends InvocationBase {
  kind: 'exec'
  command: string
  args: readonly string[]
}

/** Opaque descriptor passed to the external task runner */
export type Invocation = ShellInvocation | ExecInvocation

/** Outcome of a single step within a job */
export type StepStatus = 'succeeded' | 'failed' | 'not_run' | 'cancelled'

/** Values visible to a step gate */
export interface GateContext {
  /** Skip verdict for the job */
  skipped: boolean
  /** True while every previously executed step succeeded */
  success: boolean
  event: TriggerKind
  matrix: VariantCombination
  /** Outcome of every earlier step; later steps read as 'pending' */
  steps: Readonly<Record<string, StepStatus | 'pending'>>
}

/** Compiled `if:` predicate */
export interface StepGate {
  readonly source: string
  evaluate(context: GateContext): boolean
}

export interface StepSpec {
  name: string
  gate: StepGate
  invocation: Invocation
}

/** Toolchain the provisioner must make available before the first step */
export interface ToolchainRequest {
  name: string
  components: readonly string[]
  targets: readonly string[]
  /** Command that installs/activates the toolchain; absent means nothing to do */
  setup?: Invocation
}

/** Fully resolved job instance produced by matrix expansion. Frozen. */
export interface JobSpec {
  /** Display id, e.g. `supported (ubuntu-latest, --all-features)` */
  id: string
  /** Name of the job group in the pipeline definition */
  group: string
  /** Position in its group's expansion order */
  index: number
  variants: VariantCombination
  policy: JobPolicy
  /** Cancel required siblings of the same group when this job fails */
  failFast: boolean
  steps: readonly StepSpec[]
  toolchain?: ToolchainRequest
  /** Stable identity of group + variant combination, used for skip history */
  historyKey: string
}

// ---------------------------------------------------------------------------
// Triggers and skip decisions
// ---------------------------------------------------------------------------

export type TriggerKind = 'manual' | 'pull_request' | 'push'

export const TRIGGER_KINDS: readonly TriggerKind[] = ['manual', 'pull_request', 'push']

/** Supplied once per pipeline run; read-only */
export interface TriggerContext {
  kind: TriggerKind
  ref: string
  /** Changed-path globs relevant to this pipeline */
  pathFilters: readonly string[]
  /** Content fingerprint of the input set */
  fingerprint: string
  /** Trigger kinds that always force execution */
  doNotSkip: readonly TriggerKind[]
}

export type SkipReason =
  | 'duplicate-of-successful-run'
  | 'trigger-not-skippable'
  | 'no-prior-success'
  | 'fingerprint-changed'
  | 'history-unavailable'
  | 'skipping-disabled'

export interface SkipDecision {
  skip: boolean
  fingerprint: string
  reason: SkipReason
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export type JobStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'skipped' | 'cancelled'

export type TerminalJobStatus = Exclude<JobStatus, 'pending' | 'running'>

export interface StepResult {
  name: string
  status: StepStatus
  exitCode?: number
  durationMs: number
  /** Tail of the captured output, secrets masked */
  output: string
  error?: string
}

/** Immutable record published by a JobRunner on termination */
export interface JobResult {
  job: JobSpec
  status: TerminalJobStatus
  steps: readonly StepResult[]
  durationMs: number
  /** Absent when the job was cancelled before it was dispatched */
  skipDecision?: SkipDecision
  failedStep?: string
  cancelReason?: string
  /** Unexpected error that failed the job outside any step */
  error?: string
}

export type Verdict = 'success' | 'failure'

export interface ReportLine {
  jobId: string
  group: string
  policy: JobPolicy
  status: TerminalJobStatus
  durationMs: number
  failedStep?: string
  /** Required failure or cancellation that determined a failure verdict */
  decisive: boolean
}

export interface PipelineVerdict {
  verdict: Verdict
  report: ReportLine[]
  counts: Record<TerminalJobStatus, number>
  /** Ids of the decisive jobs, in report order */
  decisive: string[]
}
