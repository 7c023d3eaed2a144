/**
 * stage-coordinator module: the work item state machine.
 */

export type {
  AdvanceInput,
  AdvanceOutcome,
  AdvanceResult,
  CreateWorkItemRequest,
  ExecutionPhase,
  ExecutionTask,
  ExecutionTaskSpec,
  GateCheckMap,
  WorkItemListFilter,
} from './types.js'

export type { StageCoordinator } from './stage-coordinator.js'
export {
  StageCoordinatorImpl,
  createStageCoordinator,
  assembleWorkItem,
  committedArtifacts,
  hasPassingGatesThisCycle,
  DEFAULT_MAX_RETRIES,
} from './stage-coordinator-impl.js'
export type { StageCoordinatorDeps } from './stage-coordinator-impl.js'

export {
  NEXT_STAGE,
  RETURN_EDGES,
  isAllowedTransition,
  isGateStage,
  isReturnEdge,
  isTerminal,
  statusForStage,
} from './transitions.js'
