/**
 * gate-evaluator module: capability checks folded into persisted verdicts.
 */

export type {
  ArtifactReader,
  CapabilityCheck,
  CheckContext,
  CheckDefinition,
  CheckFactory,
  CheckOutcome,
  CheckResult,
  CheckStatus,
  GateEvaluation,
  GateRequest,
} from './types.js'

export type { GateEvaluator } from './gate-evaluator.js'
export {
  GateEvaluatorImpl,
  createGateEvaluator,
  sortFindings,
  mergeCriteria,
  DEFAULT_CHECK_TIMEOUT_MS,
} from './gate-evaluator-impl.js'
export type { GateEvaluatorOptions } from './gate-evaluator-impl.js'

export {
  registerCheckType,
  createCheck,
  createChecks,
  getRegisteredCheckTypes,
} from './check-registry.js'

export { CommandCheck, createCommandCheck, parseFindingLines } from './command-check.js'
export { RequiredArtifactsCheck, createRequiredArtifactsCheck } from './required-artifacts-check.js'
