/**
 * GateEvaluatorImpl: concrete GateEvaluator.
 *
 * Checks never short-circuit each other. A check that times out, throws, or
 * is not configured contributes a blocking finding instead of a pass.
 */

import {
  CheckTimedOutError,
  CheckUnavailableError,
  ErrorKind,
  GateCancelledError,
} from '../../core/errors.js'
import type { Finding, GateVerdict } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { maskSecrets } from '../../utils/masking.js'
import type { ArtifactStore } from '../artifact-store/artifact-store.js'
import { formatArtifactRef } from '../artifact-store/artifact-ref.js'
import type { GateEvaluator } from './gate-evaluator.js'
import type {
  CapabilityCheck,
  CheckContext,
  CheckOutcome,
  CheckResult,
  GateEvaluation,
  GateRequest,
} from './types.js'

const logger = createLogger('gate-evaluator')

export const DEFAULT_CHECK_TIMEOUT_MS = 120_000

export interface GateEvaluatorOptions {
  store: ArtifactStore
  /** Configured checks by id */
  checks: Map<string, CapabilityCheck>
  /** Applies to checks without their own timeout */
  defaultTimeoutMs?: number
  now?: () => Date
}

// ---------------------------------------------------------------------------
// Folding helpers
// ---------------------------------------------------------------------------

/** Blocking findings first; order within each severity is preserved */
export function sortFindings(findings: Finding[]): Finding[] {
  return [...findings].sort((a, b) => rank(a) - rank(b))
}

function rank(finding: Finding): number {
  return finding.severity === 'blocking' ? 0 : 1
}

/** A criterion reported by several checks holds only if all of them say so */
export function mergeCriteria(reports: Record<string, boolean>[]): Record<string, boolean> {
  const merged: Record<string, boolean> = {}
  for (const report of reports) {
    for (const [name, value] of Object.entries(report)) {
      merged[name] = (merged[name] ?? true) && value
    }
  }
  return merged
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

// ---------------------------------------------------------------------------
// GateEvaluatorImpl
// ---------------------------------------------------------------------------

export class GateEvaluatorImpl implements GateEvaluator {
  private readonly _store: ArtifactStore
  private readonly _checks: Map<string, CapabilityCheck>
  private readonly _defaultTimeoutMs: number
  private readonly _now: () => Date

  constructor(options: GateEvaluatorOptions) {
    this._store = options.store
    this._checks = options.checks
    this._defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_CHECK_TIMEOUT_MS
    this._now = options.now ?? (() => new Date())
  }

  async evaluate(request: GateRequest): Promise<GateEvaluation> {
    const { workItemId, stage, checkIds } = request
    const signal = request.signal ?? new AbortController().signal

    if (signal.aborted) {
      throw new GateCancelledError(workItemId, stage, 'cancelled before start')
    }

    logger.info({ workItemId, stage, checks: checkIds }, 'Evaluating gate')

    const context: Omit<CheckContext, 'signal'> = {
      workItemId,
      stage,
      committedArtifacts: request.committedArtifacts ?? [],
      artifacts: this._store,
    }

    const outcomes = await Promise.all(
      checkIds.map((id) => this._runCheck(id, this._checks.get(id), context, signal)),
    )

    if (signal.aborted) {
      logger.info({ workItemId, stage }, 'Gate evaluation cancelled; verdict discarded')
      throw new GateCancelledError(workItemId, stage, 'work item aborted')
    }

    const verdict: GateVerdict = {
      passed: outcomes.every((o) => o.passed),
      findings: sortFindings(outcomes.flatMap((o) => o.findings)),
      checkedAt: this._now().toISOString(),
      criteria: mergeCriteria(outcomes.map((o) => o.criteria)),
    }

    const ref = this._store.put(
      workItemId,
      stage,
      'verdict',
      JSON.stringify({ verdict, checks: outcomes }, null, 2),
    )

    logger.info(
      {
        workItemId,
        stage,
        passed: verdict.passed,
        findings: verdict.findings.length,
        ref: formatArtifactRef(ref),
      },
      'Gate verdict recorded',
    )

    return { verdict, ref, checks: outcomes }
  }

  // -------------------------------------------------------------------------
  // Single check
  // -------------------------------------------------------------------------

  private _runCheck(
    checkId: string,
    check: CapabilityCheck | undefined,
    context: Omit<CheckContext, 'signal'>,
    gateSignal: AbortSignal,
  ): Promise<CheckOutcome> {
    const startedAt = Date.now()

    if (check === undefined) {
      return Promise.resolve(
        unavailableOutcome(checkId, new CheckUnavailableError(checkId, 'no check configured with this id'), 0),
      )
    }

    const timeoutMs = check.timeoutMs ?? this._defaultTimeoutMs
    const controller = new AbortController()

    return new Promise<CheckOutcome>((resolve) => {
      let settled = false

      const finish = (outcome: CheckOutcome): void => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        gateSignal.removeEventListener('abort', onGateAbort)
        resolve(outcome)
      }

      const onGateAbort = (): void => {
        controller.abort()
        finish(unavailableOutcome(checkId, new Error('cancelled'), Date.now() - startedAt))
      }

      const timer = setTimeout(() => {
        controller.abort()
        const err = new CheckTimedOutError(checkId, timeoutMs)
        logger.warn({ checkId, timeoutMs }, 'Check timed out')
        finish({
          checkId,
          status: 'timed_out',
          passed: false,
          findings: [{ severity: 'blocking', message: err.message, check: checkId, code: ErrorKind.CheckTimedOut }],
          criteria: {},
          rawOutput: '',
          durationMs: Date.now() - startedAt,
        })
      }, timeoutMs)

      gateSignal.addEventListener('abort', onGateAbort, { once: true })

      // A check that throws synchronously is unavailable like one that rejects
      Promise.resolve()
        .then(() => check.run({ ...context, signal: controller.signal }))
        .then(
          (result) => finish(normalizeResult(checkId, result, Date.now() - startedAt)),
          (err: unknown) => {
            logger.warn({ checkId, err: errorMessage(err) }, 'Check unavailable')
            finish(unavailableOutcome(checkId, err, Date.now() - startedAt))
          },
        )
    })
  }
}

function unavailableOutcome(checkId: string, err: unknown, durationMs: number): CheckOutcome {
  const message =
    err instanceof CheckUnavailableError
      ? err.message
      : new CheckUnavailableError(checkId, errorMessage(err)).message
  return {
    checkId,
    status: 'unavailable',
    passed: false,
    findings: [{ severity: 'blocking', message, check: checkId, code: ErrorKind.CheckUnavailable }],
    criteria: {},
    rawOutput: '',
    durationMs,
  }
}

/**
 * Attach the check id to every finding and make sure a failed check carries
 * at least one blocking finding.
 */
function normalizeResult(checkId: string, result: CheckResult, durationMs: number): CheckOutcome {
  const findings = result.findings.map((f) => ({ ...f, check: f.check ?? checkId }))
  const hasBlocking = findings.some((f) => f.severity === 'blocking')
  const passed = result.passed && !hasBlocking

  if (!passed && !hasBlocking) {
    findings.push({
      severity: 'blocking',
      message: `Check "${checkId}" failed without reporting a blocking finding`,
      check: checkId,
    })
  }

  return {
    checkId,
    status: passed ? 'passed' : 'failed',
    passed,
    findings,
    criteria: result.criteria ?? {},
    rawOutput: maskSecrets(result.rawOutput),
    durationMs,
  }
}

export function createGateEvaluator(options: GateEvaluatorOptions): GateEvaluator {
  return new GateEvaluatorImpl(options)
}
