/**
 * Zod validation schemas for the Waypoint configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - pipeline limits (retry budget, check timeout)
 *  - gate stage check lists
 *  - capability check definitions
 *  - release packaging
 *  - full config document
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** SQLite file; relative paths resolve against the project root */
    database_path: z.string().min(1),
    /** Directory the documentation synthesizer writes to */
    knowledge_base_dir: z.string().min(1),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Pipeline limits
// ---------------------------------------------------------------------------

export const PipelineSettingsSchema = z
  .object({
    /** Blocking verdicts tolerated per item before it is aborted */
    max_retries: z.number().int().min(0).max(100),
    /** Default per-check timeout */
    check_timeout_ms: z.number().int().positive(),
  })
  .strict()

export type PipelineSettings = z.infer<typeof PipelineSettingsSchema>

// ---------------------------------------------------------------------------
// Gate stages and checks
// ---------------------------------------------------------------------------

export const StageChecksSchema = z
  .object({
    checks: z.array(z.string().min(1)),
  })
  .strict()

export const StagesSchema = z
  .object({
    verify: StageChecksSchema,
    test: StageChecksSchema,
  })
  .strict()

export type StagesConfig = z.infer<typeof StagesSchema>

/**
 * Common fields of a check definition. Type-specific options (command, args,
 * artifacts, …) pass through and are validated by the check type itself.
 */
export const CheckDefinitionSchema = z
  .object({
    type: z.string().min(1),
    timeout_ms: z.number().int().positive().optional(),
    severity: z.enum(['blocking', 'advisory']).optional(),
    criteria: z.array(z.string().min(1)).optional(),
  })
  .passthrough()

export type CheckDefinitionConfig = z.infer<typeof CheckDefinitionSchema>

// ---------------------------------------------------------------------------
// Release packaging
// ---------------------------------------------------------------------------

export const ReleaseSettingsSchema = z
  .object({
    remote: z.string().min(1),
    base_branch: z.string().min(1),
    branch_prefix: z.string(),
    /** Open a pull request with `gh` after pushing */
    open_review: z.boolean(),
  })
  .strict()

export type ReleaseSettings = z.infer<typeof ReleaseSettingsSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

/** All config format versions this toolkit can read and validate */
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

export const WaypointConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    pipeline: PipelineSettingsSchema,
    stages: StagesSchema,
    checks: z.record(CheckDefinitionSchema),
    release: ReleaseSettingsSchema,
  })
  .strict()

export type WaypointConfig = z.infer<typeof WaypointConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (allows partial during load before merging)
// ---------------------------------------------------------------------------

export const PartialWaypointConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    pipeline: PipelineSettingsSchema.partial().optional(),
    stages: z
      .object({
        verify: StageChecksSchema.partial().optional(),
        test: StageChecksSchema.partial().optional(),
      })
      .strict()
      .optional(),
    checks: z.record(CheckDefinitionSchema).optional(),
    release: ReleaseSettingsSchema.partial().optional(),
  })
  .strict()

export type PartialWaypointConfig = z.infer<typeof PartialWaypointConfigSchema>
