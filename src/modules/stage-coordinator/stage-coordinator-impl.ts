/**
 * StageCoordinator implementation.
 *
 * Factory: createStageCoordinator(deps) → StageCoordinator
 *
 * Every transition is one SQLite transaction: the stage output's artifacts,
 * the work_items update (version-checked) and the history row commit
 * together or not at all.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  ErrorKind,
  InvalidTransitionError,
  NotFoundError,
  PreconditionMissingError,
  RetryBudgetExhaustedError,
} from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type {
  ArtifactRef,
  Finding,
  GateStage,
  GateVerdict,
  HistoryEntry,
  ResolvedArtifact,
  Stage,
  StageArtifactInput,
  StageOutput,
  TransitionVerdict,
  WorkItem,
  WorkItemId,
  WorkItemStatus,
} from '../../core/types.js'
import { appendHistory, getHistory } from '../../persistence/queries/history.js'
import {
  getWorkItemState,
  insertWorkItem,
  listWorkItemStates,
  updateWorkItemState,
  workItemExists,
} from '../../persistence/queries/work-items.js'
import type { WorkItemState } from '../../persistence/queries/work-items.js'
import { createWorkItemId } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { ArtifactStore } from '../artifact-store/artifact-store.js'
import type { GateEvaluator } from '../gate-evaluator/gate-evaluator.js'
import { sortFindings } from '../gate-evaluator/gate-evaluator-impl.js'
import type { DocumentationSynthesizer } from '../knowledge-base/documentation-synthesizer.js'
import type { ReleasePackage, ReleasePackager } from '../release-packager/release-packager.js'
import type { StageCoordinator } from './stage-coordinator.js'
import { isAllowedTransition, isGateStage, isTerminal, statusForStage } from './transitions.js'
import type {
  AdvanceInput,
  AdvanceResult,
  CreateWorkItemRequest,
  ExecutionPhase,
  GateCheckMap,
  WorkItemListFilter,
} from './types.js'

const logger = createLogger('stage-coordinator')

export const DEFAULT_MAX_RETRIES = 3
const DEFAULT_ACTOR = 'operator'

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface StageCoordinatorDeps {
  db: BetterSqlite3Database
  store: ArtifactStore
  evaluator: GateEvaluator
  eventBus?: TypedEventBus
  synthesizer?: DocumentationSynthesizer
  packager?: ReleasePackager
  /** Check ids per gate stage; a stage with none passes vacuously */
  gateChecks?: GateCheckMap
  /** Blocking verdicts tolerated before the item is aborted */
  maxRetries?: number
  defaultActor?: string
  now?: () => Date
}

/** Fields a transition may change besides stage and status */
interface StatePatch {
  requiredDocs?: string[]
  acceptanceCriteria?: Record<string, boolean>
  retryCount?: number
  pendingFindings?: Finding[]
  abortReason?: string | null
}

interface TransitionSpec {
  to: Stage
  /** Defaults to the status implied by `to` */
  status?: WorkItemStatus
  verdict: TransitionVerdict
  actor: string
  note?: string | null
  findings?: Finding[]
  /** Written inside the commit, under the stage being left */
  artifacts?: StageArtifactInput[]
  /** Already stored (e.g. the evaluator's verdict) */
  artifactRefs?: ArtifactRef[]
  patch?: StatePatch
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Build the WorkItem view: committed artifacts are exactly those referenced
 * by committed history entries.
 */
export function assembleWorkItem(state: WorkItemState, history: HistoryEntry[]): WorkItem {
  const artifacts: Partial<Record<Stage, ArtifactRef[]>> = {}
  for (const entry of history) {
    for (const ref of entry.artifactRefs) {
      const list = artifacts[ref.stage] ?? []
      list.push(ref)
      artifacts[ref.stage] = list
    }
  }
  return { ...state, artifacts, history }
}

export function committedArtifacts(item: WorkItem): ArtifactRef[] {
  return item.history.flatMap((entry) => entry.artifactRefs)
}

/**
 * Whether both gates were passed (or overridden) since the item last
 * entered `execute`.
 */
export function hasPassingGatesThisCycle(history: HistoryEntry[]): boolean {
  let cycleStart = 0
  history.forEach((entry, index) => {
    if (entry.toStage === 'execute') cycleStart = index + 1
  })
  const cycle = history.slice(cycleStart)
  const cleared = (stage: GateStage): boolean =>
    cycle.some((e) => e.fromStage === stage && (e.verdict === 'pass' || e.verdict === 'override'))
  return cleared('verify') && cleared('test')
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

// ---------------------------------------------------------------------------
// StageCoordinatorImpl
// ---------------------------------------------------------------------------

export class StageCoordinatorImpl implements StageCoordinator {
  private readonly _db: BetterSqlite3Database
  private readonly _store: ArtifactStore
  private readonly _evaluator: GateEvaluator
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _synthesizer: DocumentationSynthesizer | undefined
  private readonly _packager: ReleasePackager | undefined
  private readonly _gateChecks: GateCheckMap
  private readonly _maxRetries: number
  private readonly _defaultActor: string
  private readonly _now: () => Date

  /** Cancellation handles for gate runs and execution in progress */
  private readonly _inflight = new Map<WorkItemId, AbortController>()

  constructor(deps: StageCoordinatorDeps) {
    this._db = deps.db
    this._store = deps.store
    this._evaluator = deps.evaluator
    this._eventBus = deps.eventBus
    this._synthesizer = deps.synthesizer
    this._packager = deps.packager
    this._gateChecks = deps.gateChecks ?? {}
    this._maxRetries = deps.maxRetries ?? DEFAULT_MAX_RETRIES
    this._defaultActor = deps.defaultActor ?? DEFAULT_ACTOR
    this._now = deps.now ?? (() => new Date())
  }

  // -------------------------------------------------------------------------
  // Creation and queries
  // -------------------------------------------------------------------------

  createWorkItem(request: CreateWorkItemRequest): WorkItem {
    const title = request.title.trim()
    if (title === '') {
      throw new PreconditionMissingError('A work item needs a title')
    }

    const now = this._now()
    const id = createWorkItemId(request.slug ?? title, now, (candidate) =>
      workItemExists(this._db, candidate),
    )
    insertWorkItem(this._db, {
      id,
      title,
      problemStatement: request.problemStatement ?? '',
      createdAt: now.toISOString(),
    })

    logger.info({ workItemId: id, actor: request.actor ?? this._defaultActor }, 'Work item created')
    this._eventBus?.emit('item:created', { workItemId: id, title })
    return this.getWorkItem(id)
  }

  getWorkItem(id: WorkItemId): WorkItem {
    const state = getWorkItemState(this._db, id)
    if (state === undefined) {
      throw new NotFoundError('Work item', id)
    }
    return assembleWorkItem(state, getHistory(this._db, id))
  }

  listWorkItems(filter: WorkItemListFilter = {}): WorkItem[] {
    return listWorkItemStates(this._db, filter).map((state) =>
      assembleWorkItem(state, getHistory(this._db, state.id)),
    )
  }

  getHistory(id: WorkItemId): HistoryEntry[] {
    return this.getWorkItem(id).history
  }

  getStageArtifacts(id: WorkItemId, stage: Stage): ArtifactRef[] {
    return this.getWorkItem(id).artifacts[stage] ?? []
  }

  // -------------------------------------------------------------------------
  // advance
  // -------------------------------------------------------------------------

  async advance(id: WorkItemId, input: AdvanceInput, actor: string = this._defaultActor): Promise<AdvanceResult> {
    const item = this._loadActive(id)
    if (input.stage !== item.stage) {
      throw new InvalidTransitionError(
        `Work item ${id} is in ${item.stage}, not ${input.stage}`,
        { workItemId: id, stage: item.stage, requested: input.stage },
      )
    }

    switch (input.type) {
      case 'output':
        if (isGateStage(item.stage) || item.stage === 'release') {
          throw new InvalidTransitionError(`Stage ${item.stage} does not accept a stage output`, {
            workItemId: id,
            stage: item.stage,
          })
        }
        return this._applyOutput(item, input.output, actor)

      case 'verdict':
        return this._applyVerdict(item, this._requireGate(item), input.verdict, null, actor)

      case 'override':
        return this._applyOverride(item, this._requireGate(item), input.reason, actor)
    }
  }

  // -------------------------------------------------------------------------
  // runGate
  // -------------------------------------------------------------------------

  async runGate(id: WorkItemId, actor: string = this._defaultActor): Promise<AdvanceResult> {
    const item = this._loadActive(id)
    const stage = this._requireGate(item)
    const controller = this._startInflight(id)

    const evaluation = await this._evaluator
      .evaluate({
        workItemId: id,
        stage,
        checkIds: this._gateChecks[stage] ?? [],
        committedArtifacts: committedArtifacts(item),
        signal: controller.signal,
      })
      .finally(() => {
        this._inflight.delete(id)
      })

    const { verdict } = evaluation
    this._eventBus?.emit('gate:evaluated', {
      workItemId: id,
      stage,
      passed: verdict.passed,
      blockingCount: verdict.findings.filter((f) => f.severity === 'blocking').length,
      advisoryCount: verdict.findings.filter((f) => f.severity === 'advisory').length,
    })

    return this._applyVerdict(item, stage, verdict, evaluation.ref, actor)
  }

  // -------------------------------------------------------------------------
  // runExecute
  // -------------------------------------------------------------------------

  async runExecute(
    id: WorkItemId,
    phases: ExecutionPhase[],
    actor: string = this._defaultActor,
  ): Promise<AdvanceResult> {
    const item = this._loadActive(id)
    if (item.stage !== 'execute') {
      throw new InvalidTransitionError(`Work item ${id} is in ${item.stage}, not execute`, {
        workItemId: id,
        stage: item.stage,
      })
    }
    this._requirePlan(item)
    const controller = this._startInflight(id)

    const outputs: StageOutput[] = []
    try {
      for (const phase of phases) {
        logger.info({ workItemId: id, phase: phase.name, tasks: phase.tasks.length }, 'Running execution phase')

        const settled = await Promise.allSettled(
          phase.tasks.map((task) =>
            task.run({
              workItem: item,
              phase: phase.name,
              pendingFindings: item.pendingFindings,
              signal: controller.signal,
            }),
          ),
        )

        if (controller.signal.aborted) {
          throw new InvalidTransitionError(`Work item ${id} was aborted during execution`, {
            workItemId: id,
          })
        }

        const failures: Finding[] = settled.flatMap((result, index) =>
          result.status === 'rejected'
            ? [
                {
                  severity: 'blocking' as const,
                  message: `Execution task "${phase.tasks[index]?.id ?? String(index)}" in phase "${phase.name}" failed: ${errorMessage(result.reason)}`,
                  code: 'EXECUTION_FAILED',
                },
              ]
            : [],
        )

        if (failures.length > 0) {
          return this._returnFromExecute(item, phase, failures, actor)
        }

        for (const result of settled) {
          if (result.status === 'fulfilled') outputs.push(result.value)
        }
      }
    } finally {
      this._inflight.delete(id)
    }

    const summaries = outputs.flatMap((o) => (o.summary === undefined ? [] : [o.summary]))
    return this._applyOutput(
      item,
      {
        artifacts: outputs.flatMap((o) => o.artifacts),
        summary: summaries.length > 0 ? summaries.join('\n') : undefined,
      },
      actor,
    )
  }

  // -------------------------------------------------------------------------
  // release
  // -------------------------------------------------------------------------

  async release(id: WorkItemId, actor: string = this._defaultActor): Promise<AdvanceResult> {
    const item = this._loadActive(id)
    if (item.stage !== 'release') {
      throw new InvalidTransitionError(`Work item ${id} is in ${item.stage}, not release`, {
        workItemId: id,
        stage: item.stage,
      })
    }
    if (!hasPassingGatesThisCycle(item.history)) {
      throw new PreconditionMissingError(
        `Work item ${id} has no passing verify and test verdicts in its current cycle`,
        { workItemId: id },
      )
    }
    if (this._packager === undefined) {
      throw new PreconditionMissingError('No release packager is configured', { workItemId: id })
    }

    let pkg: ReleasePackage
    try {
      pkg = await this._packager.package(item)
    } catch (err) {
      const message = errorMessage(err)
      logger.error({ workItemId: id, err: message }, 'Release packaging failed')
      const blocked = this._setStatus(item, 'blocked')
      this._eventBus?.emit('release:failed', { workItemId: id, error: message })
      return {
        item: blocked,
        from: 'release',
        to: 'release',
        outcome: 'blocked',
        findings: [{ severity: 'blocking', message, code: ErrorKind.Release }],
        note: message,
      }
    }

    const note = `Review: ${pkg.reviewRef}`
    const next = this._commit(item, {
      to: 'done',
      verdict: 'released',
      actor,
      note,
      artifacts: [{ kind: 'release', content: JSON.stringify(pkg, null, 2) }],
    })
    this._eventBus?.emit('release:packaged', {
      workItemId: id,
      branch: pkg.branch,
      reviewRef: pkg.reviewRef,
    })
    return { ...this._advanced(item, next, actor, []), note }
  }

  // -------------------------------------------------------------------------
  // abort
  // -------------------------------------------------------------------------

  abort(id: WorkItemId, reason: string, actor: string = this._defaultActor): AdvanceResult {
    if (reason.trim() === '') {
      throw new InvalidTransitionError('Aborting a work item needs a reason', { workItemId: id })
    }
    const item = this._loadActive(id)

    // Checks still running see the signal; their verdict is never applied
    this._inflight.get(id)?.abort()

    const next = this._commit(item, {
      to: 'aborted',
      verdict: 'aborted',
      actor,
      note: reason,
      patch: { abortReason: reason },
    })

    logger.info({ workItemId: id, from: item.stage, reason }, 'Work item aborted')
    this._eventBus?.emit('item:aborted', { workItemId: id, from: item.stage, reason })
    return { item: next, from: item.stage, to: 'aborted', outcome: 'aborted', findings: [], note: reason }
  }

  // -------------------------------------------------------------------------
  // Stage outputs
  // -------------------------------------------------------------------------

  private async _applyOutput(item: WorkItem, output: StageOutput, actor: string): Promise<AdvanceResult> {
    const stage = item.stage
    if (stage !== 'plan' && (output.requiredDocs !== undefined || output.acceptanceCriteria !== undefined)) {
      throw new InvalidTransitionError('Required docs and acceptance criteria can only be set during plan', {
        workItemId: item.id,
        stage,
      })
    }

    // Every non-gate stage leaves at least one artifact behind
    if ((stage === 'plan' || stage === 'execute' || stage === 'document') && output.artifacts.length === 0) {
      throw new PreconditionMissingError(`Stage ${stage} of ${item.id} produced no artifacts`, {
        workItemId: item.id,
        stage,
      })
    }

    if (stage === 'plan') {
      const criteria =
        output.acceptanceCriteria === undefined
          ? item.acceptanceCriteria
          : Object.fromEntries(output.acceptanceCriteria.map((name) => [name, false]))
      const next = this._commit(item, {
        to: 'execute',
        verdict: 'output',
        actor,
        note: output.summary ?? null,
        artifacts: output.artifacts,
        patch: {
          requiredDocs: output.requiredDocs ?? item.requiredDocs,
          acceptanceCriteria: criteria,
          pendingFindings: [],
        },
      })
      return this._advanced(item, next, actor, [])
    }

    if (stage === 'execute') {
      this._requirePlan(item)
      const next = this._commit(item, {
        to: 'verify',
        verdict: 'output',
        actor,
        note: output.summary ?? null,
        artifacts: output.artifacts,
        patch: { pendingFindings: [] },
      })
      return this._advanced(item, next, actor, [])
    }

    if (stage !== 'document') {
      throw new InvalidTransitionError(`Stage ${stage} does not accept a stage output`, {
        workItemId: item.id,
        stage,
      })
    }

    const unmet = Object.entries(item.acceptanceCriteria)
      .filter(([, met]) => !met)
      .map(([name]) => name)

    if (unmet.length > 0) {
      const findings: Finding[] = unmet.map((name) => ({
        severity: 'blocking',
        message: `Acceptance criterion "${name}" is not met`,
        code: 'CRITERIA_UNMET',
      }))
      const note = `Acceptance criteria not met: ${unmet.join(', ')}`
      const next = this._commit(item, {
        to: 'plan',
        status: 'blocked',
        verdict: 'criteria_unmet',
        actor,
        note,
        findings,
        artifacts: output.artifacts,
        patch: { pendingFindings: findings },
      })
      logger.warn({ workItemId: item.id, unmet }, 'Returning to plan: acceptance criteria not met')
      this._eventBus?.emit('stage:returned', {
        workItemId: item.id,
        from: 'document',
        to: 'plan',
        retryCount: next.retryCount,
        findings,
      })
      return { item: next, from: 'document', to: 'plan', outcome: 'returned', findings, note }
    }

    const next = this._commit(item, {
      to: 'release',
      verdict: 'output',
      actor,
      note: output.summary ?? null,
      artifacts: output.artifacts,
    })
    const result = this._advanced(item, next, actor, [])
    await this._recordDocs(next)
    return result
  }

  private _returnFromExecute(
    item: WorkItem,
    phase: ExecutionPhase,
    failures: Finding[],
    actor: string,
  ): AdvanceResult {
    const note = `Phase "${phase.name}" failed: ${String(failures.length)} of ${String(phase.tasks.length)} tasks`
    const next = this._commit(item, {
      to: 'plan',
      status: 'blocked',
      verdict: 'execution_failed',
      actor,
      note,
      findings: failures,
      artifacts: [{ kind: 'findings', content: JSON.stringify(failures, null, 2) }],
      patch: { pendingFindings: failures },
    })
    logger.warn({ workItemId: item.id, phase: phase.name, failures: failures.length }, note)
    this._eventBus?.emit('stage:returned', {
      workItemId: item.id,
      from: 'execute',
      to: 'plan',
      retryCount: next.retryCount,
      findings: failures,
    })
    return { item: next, from: 'execute', to: 'plan', outcome: 'returned', findings: failures, note }
  }

  // -------------------------------------------------------------------------
  // Gate verdicts
  // -------------------------------------------------------------------------

  private _applyVerdict(
    item: WorkItem,
    stage: GateStage,
    verdict: GateVerdict,
    verdictRef: ArtifactRef | null,
    actor: string,
  ): AdvanceResult {
    let findings = sortFindings(verdict.findings)
    const failed = !verdict.passed || findings.some((f) => f.severity === 'blocking')
    if (failed && !findings.some((f) => f.severity === 'blocking')) {
      findings = [
        { severity: 'blocking', message: `Gate ${stage} failed without a blocking finding`, code: 'GATE_FAILED' },
        ...findings,
      ]
    }

    // A verdict handed in directly is stored like an evaluated one
    const recording =
      verdictRef === null
        ? { artifacts: [{ kind: 'verdict' as const, content: JSON.stringify({ verdict }, null, 2) }] }
        : { artifactRefs: [verdictRef] }

    if (!failed) {
      const next = this._commit(item, {
        to: stage === 'verify' ? 'test' : 'document',
        verdict: 'pass',
        actor,
        findings,
        ...recording,
        patch:
          stage === 'test'
            ? { acceptanceCriteria: { ...item.acceptanceCriteria, ...verdict.criteria } }
            : undefined,
      })
      return this._advanced(item, next, actor, findings)
    }

    const retryCount = item.retryCount + 1
    const blocking = findings.filter((f) => f.severity === 'blocking')

    if (retryCount > this._maxRetries) {
      const error = new RetryBudgetExhaustedError(item.id, retryCount, this._maxRetries, { stage })
      this._commit(item, {
        to: 'aborted',
        verdict: 'retry_budget_exhausted',
        actor,
        note: error.message,
        findings,
        ...recording,
        patch: { retryCount, pendingFindings: blocking, abortReason: error.message },
      })
      logger.warn({ workItemId: item.id, retryCount, maxRetries: this._maxRetries }, 'Retry budget exhausted')
      this._eventBus?.emit('item:aborted', { workItemId: item.id, from: stage, reason: error.message })
      throw error
    }

    const next = this._commit(item, {
      to: 'execute',
      status: 'blocked',
      verdict: 'fail',
      actor,
      findings,
      ...recording,
      patch: { retryCount, pendingFindings: blocking },
    })
    logger.info(
      { workItemId: item.id, stage, retryCount, blocking: blocking.length },
      'Gate failed; returning to execute',
    )
    this._eventBus?.emit('stage:returned', {
      workItemId: item.id,
      from: stage,
      to: 'execute',
      retryCount,
      findings,
    })
    return { item: next, from: stage, to: 'execute', outcome: 'returned', findings }
  }

  private _applyOverride(item: WorkItem, stage: GateStage, reason: string, actor: string): AdvanceResult {
    if (reason.trim() === '') {
      throw new InvalidTransitionError('A gate override needs a reason', { workItemId: item.id, stage })
    }
    const next = this._commit(item, {
      to: stage === 'verify' ? 'test' : 'document',
      verdict: 'override',
      actor,
      note: reason,
    })
    logger.warn({ workItemId: item.id, stage, actor, reason }, 'Gate overridden')
    const result = this._advanced(item, next, actor, [])
    return { ...result, note: reason }
  }

  // -------------------------------------------------------------------------
  // Collaborators
  // -------------------------------------------------------------------------

  private async _recordDocs(item: WorkItem): Promise<void> {
    if (this._synthesizer === undefined) return
    try {
      const artifacts: ResolvedArtifact[] = committedArtifacts(item).map((ref) => ({
        ref,
        content: this._store.get(ref),
      }))
      const docRef = await this._synthesizer.record(item, artifacts)
      this._eventBus?.emit('docs:recorded', { workItemId: item.id, docRef })
    } catch (err) {
      // Advisory: the item stays in release either way
      const message = errorMessage(err)
      logger.warn({ workItemId: item.id, err: message }, 'Documentation synthesizer failed')
      this._eventBus?.emit('docs:failed', { workItemId: item.id, error: message })
    }
  }

  // -------------------------------------------------------------------------
  // Commit machinery
  // -------------------------------------------------------------------------

  private _commit(item: WorkItem, spec: TransitionSpec): WorkItem {
    const from = item.stage
    if (!isAllowedTransition(from, spec.to)) {
      throw new InvalidTransitionError(`Transition ${from} → ${spec.to} is not allowed`, {
        workItemId: item.id,
        from,
        to: spec.to,
      })
    }

    const at = this._now().toISOString()
    const patch = spec.patch ?? {}
    // Every execute cycle must earn its criteria again in test
    const criteria = patch.acceptanceCriteria ?? item.acceptanceCriteria
    const acceptanceCriteria = spec.to === 'execute' ? resetCriteria(criteria) : criteria

    const commit = this._db.transaction(() => {
      const written = (spec.artifacts ?? []).map((artifact) =>
        this._store.put(item.id, from, artifact.kind, artifact.content),
      )

      const updated = updateWorkItemState(this._db, item.id, item.version, {
        stage: spec.to,
        status: spec.status ?? statusForStage(spec.to),
        requiredDocs: patch.requiredDocs ?? item.requiredDocs,
        acceptanceCriteria,
        retryCount: patch.retryCount ?? item.retryCount,
        pendingFindings: patch.pendingFindings ?? item.pendingFindings,
        abortReason: patch.abortReason !== undefined ? patch.abortReason : item.abortReason,
        updatedAt: at,
      })
      if (!updated) {
        throw new InvalidTransitionError(
          `Work item ${item.id} changed since it was read (version ${String(item.version)})`,
          { workItemId: item.id, version: item.version },
        )
      }

      appendHistory(this._db, item.id, {
        fromStage: from,
        toStage: spec.to,
        verdict: spec.verdict,
        actor: spec.actor,
        note: spec.note ?? null,
        findings: spec.findings ?? [],
        artifactRefs: [...(spec.artifactRefs ?? []), ...written],
        at,
      })
    })
    commit()

    logger.debug({ workItemId: item.id, from, to: spec.to, verdict: spec.verdict }, 'Transition committed')
    return this.getWorkItem(item.id)
  }

  /** Status-only update (no stage change, no history entry) */
  private _setStatus(item: WorkItem, status: WorkItemStatus): WorkItem {
    const updated = updateWorkItemState(this._db, item.id, item.version, {
      stage: item.stage,
      status,
      requiredDocs: item.requiredDocs,
      acceptanceCriteria: item.acceptanceCriteria,
      retryCount: item.retryCount,
      pendingFindings: item.pendingFindings,
      abortReason: item.abortReason,
      updatedAt: this._now().toISOString(),
    })
    if (!updated) {
      throw new InvalidTransitionError(
        `Work item ${item.id} changed since it was read (version ${String(item.version)})`,
        { workItemId: item.id, version: item.version },
      )
    }
    return this.getWorkItem(item.id)
  }

  private _advanced(before: WorkItem, after: WorkItem, actor: string, findings: Finding[]): AdvanceResult {
    logger.info({ workItemId: after.id, from: before.stage, to: after.stage, actor }, 'Stage advanced')
    this._eventBus?.emit('stage:advanced', {
      workItemId: after.id,
      from: before.stage,
      to: after.stage,
      actor,
    })
    return { item: after, from: before.stage, to: after.stage, outcome: 'advanced', findings }
  }

  // -------------------------------------------------------------------------
  // Guards
  // -------------------------------------------------------------------------

  private _loadActive(id: WorkItemId): WorkItem {
    const item = this.getWorkItem(id)
    if (isTerminal(item.stage)) {
      throw new InvalidTransitionError(`Work item ${id} is ${item.stage}; no further transitions`, {
        workItemId: id,
        stage: item.stage,
      })
    }
    return item
  }

  private _requireGate(item: WorkItem): GateStage {
    const stage = item.stage
    if (!isGateStage(stage)) {
      throw new InvalidTransitionError(`Stage ${stage} is not a gate`, { workItemId: item.id, stage })
    }
    return stage
  }

  private _requirePlan(item: WorkItem): void {
    if ((item.artifacts.plan ?? []).length === 0) {
      throw new PreconditionMissingError(`Work item ${item.id} has no committed plan artifact`, {
        workItemId: item.id,
      })
    }
  }

  private _startInflight(id: WorkItemId): AbortController {
    if (this._inflight.has(id)) {
      throw new InvalidTransitionError(`Work item ${id} already has a stage running`, { workItemId: id })
    }
    const controller = new AbortController()
    this._inflight.set(id, controller)
    return controller
  }
}

function resetCriteria(criteria: Record<string, boolean>): Record<string, boolean> {
  return Object.fromEntries(Object.keys(criteria).map((name) => [name, false]))
}

export function createStageCoordinator(deps: StageCoordinatorDeps): StageCoordinator {
  return new StageCoordinatorImpl(deps)
}
