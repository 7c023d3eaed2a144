/**
 * GateEvaluator: runs a gate stage's capability checks and folds their
 * results into one persisted GateVerdict.
 */

import type { GateEvaluation, GateRequest } from './types.js'

export interface GateEvaluator {
  /**
   * Run every requested check concurrently, each under its own timeout,
   * and persist the verdict as a `verdict` artifact before returning it.
   *
   * @throws {GateCancelledError} when `request.signal` aborts; nothing is persisted
   */
  evaluate(request: GateRequest): Promise<GateEvaluation>
}
