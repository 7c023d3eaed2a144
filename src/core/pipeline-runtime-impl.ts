/**
 * createPipelineRuntime() wires every module by constructor injection:
 *
 *  1. event bus, with the event log subscribed
 *  2. database service (opens the file, runs migrations)
 *  3. artifact store, configured checks, gate evaluator
 *  4. knowledge base and release packager
 *  5. stage coordinator
 *
 * Modules never construct each other; all wiring happens here.
 */

import { isAbsolute, resolve } from 'node:path'
import { createLogger } from '../utils/logger.js'
import { createEventBus } from './event-bus.js'
import { logPipelineEvents } from './event-log.js'
import type { PipelineRuntime, PipelineRuntimeConfig } from './pipeline-runtime.js'
import { createDatabaseService } from '../persistence/database.js'
import type { DatabaseService } from '../persistence/database.js'
import { createArtifactStore } from '../modules/artifact-store/artifact-store-impl.js'
import { createChecks } from '../modules/gate-evaluator/check-registry.js'
import { createGateEvaluator } from '../modules/gate-evaluator/gate-evaluator-impl.js'
import { createFileKnowledgeBase } from '../modules/knowledge-base/file-knowledge-base.js'
import { createGitReleasePackager } from '../modules/release-packager/git-release-packager.js'
import { createStageCoordinator } from '../modules/stage-coordinator/stage-coordinator-impl.js'

const logger = createLogger('runtime')

function resolveFromRoot(projectRoot: string, path: string): string {
  if (path === ':memory:' || isAbsolute(path)) return path
  return resolve(projectRoot, path)
}

export async function createPipelineRuntime(options: PipelineRuntimeConfig): Promise<PipelineRuntime> {
  const { config, projectRoot } = options
  const databasePath = resolveFromRoot(projectRoot, options.databasePath ?? config.global.database_path)
  logger.debug({ databasePath, projectRoot }, 'Initializing pipeline runtime')

  // Checks are built first so a bad definition fails before the database opens
  const checks = createChecks(config.checks)

  const eventBus = createEventBus()
  logPipelineEvents(eventBus)
  const databaseService: DatabaseService = createDatabaseService(databasePath)

  try {
    await databaseService.initialize()
  } catch (err) {
    logger.error({ err }, 'Database initialization failed; cleaning up')
    await databaseService.shutdown()
    throw err
  }

  const db = databaseService.db
  const store = createArtifactStore(db, { now: options.now })
  const evaluator = createGateEvaluator({
    store,
    checks,
    defaultTimeoutMs: config.pipeline.check_timeout_ms,
    now: options.now,
  })

  const synthesizer =
    options.synthesizer ??
    createFileKnowledgeBase({ directory: resolveFromRoot(projectRoot, config.global.knowledge_base_dir) })

  const packager =
    options.packager ??
    createGitReleasePackager({
      cwd: projectRoot,
      remote: config.release.remote,
      baseBranch: config.release.base_branch,
      branchPrefix: config.release.branch_prefix,
      openReview: config.release.open_review,
    })

  const coordinator = createStageCoordinator({
    db,
    store,
    evaluator,
    eventBus,
    synthesizer,
    packager,
    gateChecks: {
      verify: config.stages.verify.checks,
      test: config.stages.test.checks,
    },
    maxRetries: config.pipeline.max_retries,
    now: options.now,
  })

  let closed = false
  return {
    config,
    eventBus,
    db,
    store,
    evaluator,
    coordinator,
    async shutdown(): Promise<void> {
      if (closed) return
      closed = true
      await databaseService.shutdown()
      logger.debug('Pipeline runtime shut down')
    },
  }
}
