/**
 * PipelineRuntime: the wired set of pipeline services for one project.
 *
 * Create an instance via `createPipelineRuntime()` from pipeline-runtime-impl.ts.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { TypedEventBus } from './event-bus.js'
import type { WaypointConfig } from '../modules/config/config-schema.js'
import type { ArtifactStore } from '../modules/artifact-store/artifact-store.js'
import type { GateEvaluator } from '../modules/gate-evaluator/gate-evaluator.js'
import type { DocumentationSynthesizer } from '../modules/knowledge-base/documentation-synthesizer.js'
import type { ReleasePackager } from '../modules/release-packager/release-packager.js'
import type { StageCoordinator } from '../modules/stage-coordinator/stage-coordinator.js'

// ---------------------------------------------------------------------------
// PipelineRuntimeConfig
// ---------------------------------------------------------------------------

export interface PipelineRuntimeConfig {
  /** Project working directory; relative config paths resolve against it */
  projectRoot: string

  /** Fully merged configuration */
  config: WaypointConfig

  /** Overrides `global.database_path` (e.g. ":memory:") */
  databasePath?: string

  /** Replaces the git release packager */
  packager?: ReleasePackager

  /** Replaces the file knowledge base */
  synthesizer?: DocumentationSynthesizer

  now?: () => Date
}

// ---------------------------------------------------------------------------
// PipelineRuntime
// ---------------------------------------------------------------------------

export interface PipelineRuntime {
  readonly config: WaypointConfig
  readonly eventBus: TypedEventBus
  /** Raw database handle, for recovery and read-only reporting */
  readonly db: BetterSqlite3Database
  readonly store: ArtifactStore
  readonly evaluator: GateEvaluator
  readonly coordinator: StageCoordinator

  /** Close the database. Idempotent. */
  shutdown(): Promise<void>
}
