/**
 * StageCoordinator: drives one work item through
 * plan → execute → verify → test → document → release → done.
 */

import type { ArtifactRef, HistoryEntry, Stage, WorkItem, WorkItemId } from '../../core/types.js'
import type {
  AdvanceInput,
  AdvanceResult,
  CreateWorkItemRequest,
  ExecutionPhase,
  WorkItemListFilter,
} from './types.js'

export interface StageCoordinator {
  /** Create an item in `plan` / `planning` */
  createWorkItem(request: CreateWorkItemRequest): WorkItem

  /**
   * Complete the item's current stage with a stage output, a gate verdict,
   * or an operator override.
   *
   * @throws {InvalidTransitionError} stage mismatch, terminal item, or wrong input type for the stage
   * @throws {PreconditionMissingError} plan without artifacts, execute without a committed plan
   * @throws {RetryBudgetExhaustedError} after the item has been committed `aborted`
   */
  advance(id: WorkItemId, input: AdvanceInput, actor?: string): Promise<AdvanceResult>

  /** Evaluate the current gate stage's configured checks and apply the verdict */
  runGate(id: WorkItemId, actor?: string): Promise<AdvanceResult>

  /** Run execution tasks phase by phase, then commit their combined output */
  runExecute(id: WorkItemId, phases: ExecutionPhase[], actor?: string): Promise<AdvanceResult>

  /** Package an item waiting in `release` */
  release(id: WorkItemId, actor?: string): Promise<AdvanceResult>

  /** Move any non-terminal item to `aborted`, cancelling in-flight checks */
  abort(id: WorkItemId, reason: string, actor?: string): AdvanceResult

  /** @throws {NotFoundError} */
  getWorkItem(id: WorkItemId): WorkItem

  listWorkItems(filter?: WorkItemListFilter): WorkItem[]

  /** @throws {NotFoundError} */
  getHistory(id: WorkItemId): HistoryEntry[]

  /** Committed artifacts of one stage, in commit order */
  getStageArtifacts(id: WorkItemId, stage: Stage): ArtifactRef[]
}
