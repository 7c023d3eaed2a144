export {
  recoverPipelineState,
  type InFlightItem,
  type RecoveryReport,
} from './pipeline-recovery.js'
