/**
 * The stage graph: which edges exist, and the status each stage implies.
 */

import { GATE_STAGES } from '../../core/types.js'
import type { GateStage, Stage, WorkItemStatus } from '../../core/types.js'

/** Forward successor of every non-terminal stage */
export const NEXT_STAGE: Readonly<Record<Stage, Stage | null>> = {
  plan: 'execute',
  execute: 'verify',
  verify: 'test',
  test: 'document',
  document: 'release',
  release: 'done',
  done: null,
  aborted: null,
}

/** Re-entry edges, taken only on a failure */
export const RETURN_EDGES: ReadonlyArray<readonly [Stage, Stage]> = [
  ['verify', 'execute'],
  ['test', 'execute'],
  ['document', 'plan'],
  ['execute', 'plan'],
]

export function isTerminal(stage: Stage): boolean {
  return stage === 'done' || stage === 'aborted'
}

export function isGateStage(stage: Stage): stage is GateStage {
  return GATE_STAGES.some((gate) => gate === stage)
}

export function isReturnEdge(from: Stage, to: Stage): boolean {
  return RETURN_EDGES.some(([a, b]) => a === from && b === to)
}

/**
 * Whether `from → to` is an edge of the stage graph.
 */
export function isAllowedTransition(from: Stage, to: Stage): boolean {
  if (isTerminal(from)) return false
  if (to === 'aborted') return true
  return NEXT_STAGE[from] === to || isReturnEdge(from, to)
}

/** Status an item gets when it enters `stage` moving forward */
export function statusForStage(stage: Stage): WorkItemStatus {
  switch (stage) {
    case 'plan':
      return 'planning'
    case 'release':
      return 'ready_for_next'
    case 'done':
      return 'complete'
    case 'aborted':
      return 'aborted'
    default:
      return 'in_progress'
  }
}
