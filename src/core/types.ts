/**
 * Core types for Waypoint
 * Shared type definitions used across all modules
 */

// ---------------------------------------------------------------------------
// Stages and statuses
// ---------------------------------------------------------------------------

/** Happy-path stage order. `done` is terminal. */
export const PIPELINE_STAGES = [
  'plan',
  'execute',
  'verify',
  'test',
  'document',
  'release',
  'done',
] as const

export type PipelineStage = (typeof PIPELINE_STAGES)[number]

/** Every stage a work item can occupy, including the abort sink */
export type Stage = PipelineStage | 'aborted'

/** Stages whose advance is conditioned on a GateVerdict */
export const GATE_STAGES = ['verify', 'test'] as const

export type GateStage = (typeof GATE_STAGES)[number]

/** Lifecycle status of a work item */
export type WorkItemStatus =
  | 'planning'
  | 'in_progress'
  | 'blocked'
  | 'ready_for_next'
  | 'complete'
  | 'aborted'

/** Unique identifier for a work item (`<timestamp>-<slug>`) */
export type WorkItemId = string

// ---------------------------------------------------------------------------
// Findings and verdicts
// ---------------------------------------------------------------------------

export type FindingSeverity = 'blocking' | 'advisory'

/** A single reported issue from a capability check */
export interface Finding {
  severity: FindingSeverity
  message: string
  /** e.g. "src/app.ts:12" */
  location?: string
  /** Id of the check that raised it */
  check?: string
  /** Error kind for synthetic findings (CHECK_TIMED_OUT, CHECK_UNAVAILABLE) */
  code?: string
}

/** Result of one Gate Evaluator run */
export interface GateVerdict {
  passed: boolean
  findings: Finding[]
  /** ISO 8601 */
  checkedAt: string
  /** Acceptance criteria evaluated by the checks (name → satisfied) */
  criteria: Record<string, boolean>
}

// ---------------------------------------------------------------------------
// Artifacts
// ---------------------------------------------------------------------------

export const ARTIFACT_KINDS = [
  'plan',
  'report',
  'diff',
  'checklist',
  'findings',
  'verdict',
  'release',
  'notes',
] as const

export type ArtifactKind = (typeof ARTIFACT_KINDS)[number]

/** Address of an immutable artifact */
export interface ArtifactRef {
  workItemId: WorkItemId
  stage: Stage
  kind: ArtifactKind
  sequence: number
}

/** Artifact address plus storage metadata, as returned by list() */
export interface ArtifactMeta extends ArtifactRef {
  contentHash: string
  byteLength: number
  createdAt: string
}

/** An artifact together with its bytes, as handed to collaborators */
export interface ResolvedArtifact {
  ref: ArtifactRef
  content: Buffer
}

// ---------------------------------------------------------------------------
// Stage output
// ---------------------------------------------------------------------------

/** One artifact produced by a stage, before it is stored */
export interface StageArtifactInput {
  kind: ArtifactKind
  content: string | Buffer
}

/**
 * What a non-gate stage hands back to the coordinator. The payload is opaque;
 * the coordinator only checks presence and completion.
 */
export interface StageOutput {
  artifacts: StageArtifactInput[]
  summary?: string
  /** Planning only: references later stages must consult */
  requiredDocs?: string[]
  /** Planning only: names of acceptance predicates */
  acceptanceCriteria?: string[]
}

// ---------------------------------------------------------------------------
// History and work items
// ---------------------------------------------------------------------------

/** How a transition was decided */
export type TransitionVerdict =
  | 'output'
  | 'pass'
  | 'fail'
  | 'override'
  | 'criteria_unmet'
  | 'execution_failed'
  | 'released'
  | 'aborted'
  | 'retry_budget_exhausted'

export interface HistoryEntry {
  seq: number
  fromStage: Stage
  toStage: Stage
  verdict: TransitionVerdict
  actor: string
  note: string | null
  findings: Finding[]
  /** Artifacts committed by this transition */
  artifactRefs: ArtifactRef[]
  at: string
}

export interface WorkItem {
  id: WorkItemId
  title: string
  problemStatement: string
  stage: Stage
  status: WorkItemStatus
  requiredDocs: string[]
  acceptanceCriteria: Record<string, boolean>
  /** Committed artifacts grouped by stage */
  artifacts: Partial<Record<Stage, ArtifactRef[]>>
  history: HistoryEntry[]
  retryCount: number
  /** Blocking findings carried into the next execute/plan cycle */
  pendingFindings: Finding[]
  abortReason: string | null
  /** Optimistic-lock counter, bumped on every commit */
  version: number
  createdAt: string
  updatedAt: string
}
