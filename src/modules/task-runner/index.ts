/**
 * task-runner module: process-backed step execution and toolchain setup.
 */

export { ProcessTaskRunner, createProcessTaskRunner } from './process-task-runner.js'
export type { ProcessTaskRunnerOptions } from './process-task-runner.js'
export { CommandToolchainProvisioner, createToolchainProvisioner } from './toolchain-provisioner.js'
export { StepProcess, TIMEOUT_EXIT_CODE, CANCELLED_EXIT_CODE } from './step-process.js'
export type {
  TaskRunner,
  InvokeOptions,
  InvocationResult,
  OutputStream,
  ToolchainProvisioner,
  ProvisionResult,
} from './types.js'
