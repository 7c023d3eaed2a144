/**
 * Zod schemas for the pipeline persistence layer.
 *
 * Row schemas validate what comes back from SQLite; value schemas validate the
 * JSON payloads stored in TEXT columns.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const StageEnum = z.enum([
  'plan',
  'execute',
  'verify',
  'test',
  'document',
  'release',
  'done',
  'aborted',
])

export const WorkItemStatusEnum = z.enum([
  'planning',
  'in_progress',
  'blocked',
  'ready_for_next',
  'complete',
  'aborted',
])

export const ArtifactKindEnum = z.enum([
  'plan',
  'report',
  'diff',
  'checklist',
  'findings',
  'verdict',
  'release',
  'notes',
])

export const TransitionVerdictEnum = z.enum([
  'output',
  'pass',
  'fail',
  'override',
  'criteria_unmet',
  'execution_failed',
  'released',
  'aborted',
  'retry_budget_exhausted',
])

// ---------------------------------------------------------------------------
// JSON value schemas
// ---------------------------------------------------------------------------

export const FindingSchema = z.object({
  severity: z.enum(['blocking', 'advisory']),
  message: z.string(),
  location: z.string().optional(),
  check: z.string().optional(),
  code: z.string().optional(),
})

export const ArtifactRefSchema = z.object({
  workItemId: z.string().min(1),
  stage: StageEnum,
  kind: ArtifactKindEnum,
  sequence: z.number().int().positive(),
})

export const FindingListSchema = z.array(FindingSchema)
export const ArtifactRefListSchema = z.array(ArtifactRefSchema)
export const StringListSchema = z.array(z.string())
export const CriteriaSchema = z.record(z.boolean())

/** Parse a JSON TEXT column through a schema */
export function parseJsonColumn<T>(schema: z.ZodType<T>, raw: string): T {
  return schema.parse(JSON.parse(raw))
}

// ---------------------------------------------------------------------------
// Rows
// ---------------------------------------------------------------------------

export const WorkItemRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  problem_statement: z.string(),
  stage: StageEnum,
  status: WorkItemStatusEnum,
  required_docs: z.string(),
  acceptance_criteria: z.string(),
  retry_count: z.number().int(),
  pending_findings: z.string(),
  abort_reason: z.string().nullable(),
  version: z.number().int(),
  created_at: z.string(),
  updated_at: z.string(),
})
export type WorkItemRow = z.infer<typeof WorkItemRowSchema>

export const HistoryRowSchema = z.object({
  work_item_id: z.string(),
  seq: z.number().int(),
  from_stage: StageEnum,
  to_stage: StageEnum,
  verdict: TransitionVerdictEnum,
  actor: z.string(),
  note: z.string().nullable(),
  findings: z.string(),
  artifact_refs: z.string(),
  created_at: z.string(),
})
export type HistoryRow = z.infer<typeof HistoryRowSchema>

export const ArtifactRowSchema = z.object({
  work_item_id: z.string(),
  stage: StageEnum,
  kind: ArtifactKindEnum,
  sequence: z.number().int(),
  content_hash: z.string(),
  byte_length: z.number().int(),
  created_at: z.string(),
})
export type ArtifactRow = z.infer<typeof ArtifactRowSchema>

export const ArtifactContentRowSchema = z.object({
  content: z.instanceof(Buffer),
})

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export const CreateWorkItemInputSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  problemStatement: z.string(),
  createdAt: z.string(),
})
export type CreateWorkItemInput = z.infer<typeof CreateWorkItemInputSchema>
