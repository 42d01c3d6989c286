/**
 * Zod schemas for pipeline definition YAML/JSON files.
 */

import { z } from 'zod'
import { TRIGGER_KINDS } from '../../core/types.js'
import type { TriggerKind } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Supported versions
// ---------------------------------------------------------------------------

export const SUPPORTED_PIPELINE_VERSIONS = ['1', '1.0'] as const

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

export const ScalarSchema = z.union([z.string(), z.number(), z.boolean()])

export const VariantSchema = z.union([ScalarSchema, z.record(z.string(), ScalarSchema)])

/** Env values may be written unquoted in YAML (`CARGO_INCREMENTAL: 0`) */
export const EnvSchema = z.record(z.string(), ScalarSchema.transform((value) => String(value))).default({})

const TriggerKindSchema = z.enum(['manual', 'pull_request', 'push'])

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------

export const CommandSchema = z.union([
  z.string().min(1),
  z.object({
    command: z.string().min(1),
    args: z.array(ScalarSchema.transform((value) => String(value))).default([]),
  }),
])

export const StepDefinitionSchema = z
  .object({
    name: z.string().min(1, 'Step name is required'),
    run: z.string().min(1).optional(),
    command: z.string().min(1).optional(),
    args: z.array(ScalarSchema.transform((value) => String(value))).default([]),
    if: z.string().optional(),
    env: EnvSchema,
    working_directory: z.string().min(1).optional(),
    timeout_minutes: z.number().nonnegative().optional(),
  })
  .superRefine((step, ctx) => {
    if ((step.run === undefined) === (step.command === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Step "${step.name}" must set exactly one of "run" or "command"`,
      })
    }
  })

export type StepDefinition = z.infer<typeof StepDefinitionSchema>

// ---------------------------------------------------------------------------
// Jobs
// ---------------------------------------------------------------------------

export const MatrixDefinitionSchema = z.object({
  axes: z.record(z.string(), z.array(VariantSchema)).default({}),
  exclude: z.array(z.record(z.string(), VariantSchema)).default([]),
})

export const ToolchainDefinitionSchema = z.object({
  name: z.string().min(1, 'Toolchain name is required'),
  components: z.array(z.string()).default([]),
  targets: z.array(z.string()).default([]),
  setup: CommandSchema.optional(),
})

export const JobDefinitionSchema = z.object({
  policy: z.enum(['required', 'best-effort']).default('required'),
  /** Alias for `policy: best-effort` */
  continue_on_error: z.boolean().default(false),
  fail_fast: z.boolean().default(false),
  matrix: MatrixDefinitionSchema.optional(),
  toolchain: ToolchainDefinitionSchema.optional(),
  env: EnvSchema,
  timeout_minutes: z.number().nonnegative().optional(),
  steps: z.array(StepDefinitionSchema).min(1, 'A job needs at least one step'),
})

export type JobDefinition = z.infer<typeof JobDefinitionSchema>

// ---------------------------------------------------------------------------
// PipelineFileSchema
// ---------------------------------------------------------------------------

export const SkipDefinitionSchema = z.object({
  enabled: z.boolean().default(true),
  paths: z.array(z.string().min(1)).default([]),
  do_not_skip: z.array(TriggerKindSchema).optional(),
})

export const PipelineFileSchema = z.object({
  version: z.union([z.string(), z.number()]).transform((v) => String(v)),
  name: z.string().min(1, 'Pipeline name is required'),
  env: EnvSchema,
  skip: SkipDefinitionSchema.default({}),
  jobs: z
    .record(z.string(), JobDefinitionSchema)
    .refine((jobs) => Object.keys(jobs).length > 0, 'A pipeline needs at least one job'),
})

export type PipelineFile = z.infer<typeof PipelineFileSchema>

/** Raw parsed object before Zod validation */
export type RawPipeline = unknown

export function isTriggerKind(value: string): value is TriggerKind {
  return (TRIGGER_KINDS as readonly string[]).includes(value)
}
