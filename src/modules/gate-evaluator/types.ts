/**
 * Shared types for the Gate Evaluator module.
 */

import type {
  ArtifactMeta,
  ArtifactRef,
  Finding,
  FindingSeverity,
  GateStage,
  GateVerdict,
  WorkItemId,
} from '../../core/types.js'

// ---------------------------------------------------------------------------
// Capability checks
// ---------------------------------------------------------------------------

/** Read-only view of the artifact store handed to checks */
export interface ArtifactReader {
  get(ref: ArtifactRef): Buffer
  list(workItemId: WorkItemId): ArtifactMeta[]
}

/**
 * Everything a check may look at. Checks never write.
 */
export interface CheckContext {
  workItemId: WorkItemId
  stage: GateStage
  /** Artifacts committed by earlier transitions of this item */
  committedArtifacts: ArtifactRef[]
  artifacts: ArtifactReader
  /** Aborted on timeout or cancellation; long-running checks must stop */
  signal: AbortSignal
}

/** What a check reports back */
export interface CheckResult {
  passed: boolean
  findings: Finding[]
  rawOutput: string
  /** Acceptance criteria this check evaluated */
  criteria?: Record<string, boolean>
}

/**
 * An external capability (linter, type-checker, test runner, SQL dry-run
 * validator, metadata fetcher) wrapped as a read-only check.
 */
export interface CapabilityCheck {
  readonly id: string
  /** Overrides the evaluator's default timeout */
  readonly timeoutMs?: number
  run(context: CheckContext): Promise<CheckResult>
}

/**
 * Configured check definition, as found under `checks.<id>` in config.
 * Type-specific options sit beside the common fields.
 */
export interface CheckDefinition {
  type: string
  timeout_ms?: number
  severity?: FindingSeverity
  criteria?: string[]
  [option: string]: unknown
}

/** Builds a check of one registered type from its definition */
export type CheckFactory = (id: string, definition: CheckDefinition) => CapabilityCheck

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

export interface GateRequest {
  workItemId: WorkItemId
  stage: GateStage
  checkIds: string[]
  committedArtifacts?: ArtifactRef[]
  signal?: AbortSignal
}

export type CheckStatus = 'passed' | 'failed' | 'timed_out' | 'unavailable'

/** Per-check record kept in the persisted verdict artifact */
export interface CheckOutcome {
  checkId: string
  status: CheckStatus
  passed: boolean
  findings: Finding[]
  criteria: Record<string, boolean>
  rawOutput: string
  durationMs: number
}

export interface GateEvaluation {
  verdict: GateVerdict
  /** The persisted `verdict` artifact */
  ref: ArtifactRef
  checks: CheckOutcome[]
}
