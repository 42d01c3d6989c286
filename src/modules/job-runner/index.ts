/**
 * job-runner module: per-job state machine.
 */

export { JobRunnerImpl, createJobRunner, SETUP_STEP_NAME } from './job-runner.js'
export type { JobRunner, JobRunnerDeps } from './job-runner.js'
