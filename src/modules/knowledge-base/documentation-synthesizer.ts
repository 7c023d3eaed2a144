/**
 * DocumentationSynthesizer: records an approved work item in the shared
 * knowledge base. Invoked once, after `document` commits; best-effort.
 */

import type { ResolvedArtifact, WorkItem } from '../../core/types.js'

/** Location of the recorded entry (a file path for the file-backed store) */
export type DocRef = string

export interface DocumentationSynthesizer {
  record(item: WorkItem, artifacts: ResolvedArtifact[]): Promise<DocRef>
}
