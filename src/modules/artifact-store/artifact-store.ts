/**
 * ArtifactStore: append-only storage of immutable stage outputs.
 */

import type { ArtifactKind, ArtifactMeta, ArtifactRef, Stage, WorkItemId } from '../../core/types.js'

export interface ArtifactStore {
  /**
   * Store a new artifact under the next sequence number for
   * (workItemId, stage, kind). Never overwrites.
   *
   * @throws {NotFoundError} when the work item does not exist
   */
  put(workItemId: WorkItemId, stage: Stage, kind: ArtifactKind, content: string | Buffer): ArtifactRef

  /**
   * Read an artifact's bytes.
   *
   * @throws {NotFoundError} for an unknown ref
   */
  get(ref: ArtifactRef): Buffer

  /** Every artifact of the item (or one stage of it) in write order, committed or not */
  list(workItemId: WorkItemId, stage?: Stage): ArtifactMeta[]
}
