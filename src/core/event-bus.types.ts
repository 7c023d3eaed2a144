/**
 * PipelineEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {subject}:{action} (e.g., "stage:advanced", "gate:evaluated")
 */

import type { Finding, Stage, WorkItemId } from './types.js'

/**
 * Complete typed map of all events emitted on the pipeline event bus.
 * Use `keyof PipelineEvents` to constrain event keys.
 */
export interface PipelineEvents {
  // -------------------------------------------------------------------------
  // Work item lifecycle
  // -------------------------------------------------------------------------

  /** A work item was created by the planning entry point */
  'item:created': { workItemId: WorkItemId; title: string }

  /** A work item moved forward to the next stage */
  'stage:advanced': { workItemId: WorkItemId; from: Stage; to: Stage; actor: string }

  /** A work item was sent back (verify/test → execute, document/execute → plan) */
  'stage:returned': {
    workItemId: WorkItemId
    from: Stage
    to: Stage
    retryCount: number
    findings: Finding[]
  }

  /** A work item reached `aborted` */
  'item:aborted': { workItemId: WorkItemId; from: Stage; reason: string }

  // -------------------------------------------------------------------------
  // Gates
  // -------------------------------------------------------------------------

  /** A gate verdict was produced and persisted */
  'gate:evaluated': {
    workItemId: WorkItemId
    stage: Stage
    passed: boolean
    blockingCount: number
    advisoryCount: number
  }

  // -------------------------------------------------------------------------
  // Collaborators
  // -------------------------------------------------------------------------

  /** The documentation synthesizer recorded a knowledge-base entry */
  'docs:recorded': { workItemId: WorkItemId; docRef: string }

  /** The documentation synthesizer failed (advisory) */
  'docs:failed': { workItemId: WorkItemId; error: string }

  /** The release packager produced a reviewable change set */
  'release:packaged': { workItemId: WorkItemId; branch: string; reviewRef: string }

  /** The release packager failed; the item stays in `release` */
  'release:failed': { workItemId: WorkItemId; error: string }
}
