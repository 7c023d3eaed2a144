/**
 * ReleasePackager: turns an approved work item into a reviewable change set.
 */

import type { WorkItem } from '../../core/types.js'

export interface ReleasePackage {
  branch: string
  commitRef: string
  /** Review/PR URL, or `<remote>/<branch>` when no review is opened */
  reviewRef: string
  /** How to undo the release */
  rollback: string
}

export interface ReleasePackager {
  /**
   * @throws {ReleaseError} when any packaging step fails
   */
  package(item: WorkItem): Promise<ReleasePackage>
}
