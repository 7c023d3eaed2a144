/**
 * Pipeline recovery: reports what a crash left behind.
 *
 * Transitions commit atomically, so after a crash every work item is exactly
 * at its last committed stage. The only debris are artifacts stored outside
 * a transition (a gate verdict whose transition never committed). Recovery
 * reports both and rewrites nothing.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { ArtifactMeta, Stage, WorkItemId, WorkItemStatus } from '../core/types.js'
import { listArtifacts } from '../persistence/queries/artifacts.js'
import { getHistory } from '../persistence/queries/history.js'
import { listWorkItemStates } from '../persistence/queries/work-items.js'
import { formatArtifactRef } from '../modules/artifact-store/artifact-ref.js'
import { isTerminal } from '../modules/stage-coordinator/transitions.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('recovery')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface InFlightItem {
  workItemId: WorkItemId
  stage: Stage
  status: WorkItemStatus
  /** Time of the last committed transition, or creation time if none */
  lastTransitionAt: string
}

export interface RecoveryReport {
  /** Non-terminal items, oldest first */
  inFlight: InFlightItem[]
  /** Stored artifacts no committed transition references */
  orphanedArtifacts: ArtifactMeta[]
}

// ---------------------------------------------------------------------------
// recoverPipelineState
// ---------------------------------------------------------------------------

export function recoverPipelineState(db: BetterSqlite3Database): RecoveryReport {
  const inFlight: InFlightItem[] = []
  const orphanedArtifacts: ArtifactMeta[] = []

  for (const state of listWorkItemStates(db)) {
    const history = getHistory(db, state.id)

    const referenced = new Set(
      history.flatMap((entry) => entry.artifactRefs.map((ref) => formatArtifactRef(ref))),
    )
    for (const meta of listArtifacts(db, state.id)) {
      if (!referenced.has(formatArtifactRef(meta))) orphanedArtifacts.push(meta)
    }

    if (!isTerminal(state.stage)) {
      inFlight.push({
        workItemId: state.id,
        stage: state.stage,
        status: state.status,
        lastTransitionAt: history[history.length - 1]?.at ?? state.createdAt,
      })
    }
  }

  logger.info(
    { inFlight: inFlight.length, orphanedArtifacts: orphanedArtifacts.length },
    'Pipeline state recovered',
  )
  return { inFlight, orphanedArtifacts }
}
