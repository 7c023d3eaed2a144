/**
 * Shared types for the Stage Coordinator module.
 */

import type {
  Finding,
  GateStage,
  GateVerdict,
  Stage,
  StageOutput,
  WorkItem,
  WorkItemStatus,
} from '../../core/types.js'

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export interface CreateWorkItemRequest {
  title: string
  problemStatement?: string
  /** Used instead of the title to build the id */
  slug?: string
  actor?: string
}

/**
 * What the caller hands to `advance()`. `stage` names the stage the caller
 * believes it is completing.
 */
export type AdvanceInput =
  | { type: 'output'; stage: Stage; output: StageOutput }
  | { type: 'verdict'; stage: Stage; verdict: GateVerdict }
  | { type: 'override'; stage: Stage; reason: string }

export interface WorkItemListFilter {
  stage?: Stage
  status?: WorkItemStatus
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/**
 * advanced: moved forward
 * returned: sent back along a re-entry edge
 * blocked:  stayed in place (release packaging failed)
 * aborted:  reached `aborted`
 */
export type AdvanceOutcome = 'advanced' | 'returned' | 'blocked' | 'aborted'

export interface AdvanceResult {
  item: WorkItem
  from: Stage
  to: Stage
  outcome: AdvanceOutcome
  /** Findings that drove the transition (all of them, blocking first) */
  findings: Finding[]
  note?: string
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

/** What an execution task is given */
export interface ExecutionTaskSpec {
  workItem: WorkItem
  phase: string
  /** Blocking findings from the last failed gate, to be addressed */
  pendingFindings: Finding[]
  signal: AbortSignal
}

/**
 * One unit of execute-stage work. Not retried by the coordinator.
 */
export interface ExecutionTask {
  id: string
  run(spec: ExecutionTaskSpec): Promise<StageOutput>
}

/** Tasks of one phase run concurrently; phases run in order */
export interface ExecutionPhase {
  name: string
  tasks: ExecutionTask[]
}

/** Check ids configured per gate stage */
export type GateCheckMap = Partial<Record<GateStage, string[]>>
