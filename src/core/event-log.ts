/**
 * Pipeline event log: one structured log line per coordinator event.
 *
 * Transitions log at info, advisory failures and aborts at warn, gate
 * verdicts and knowledge-base writes at debug.
 */

import type { Logger } from 'pino'
import { createLogger } from '../utils/logger.js'
import type { TypedEventBus } from './event-bus.js'

const logger = createLogger('events')

export function logPipelineEvents(bus: TypedEventBus, log: Logger = logger): void {
  bus.on('item:created', ({ workItemId, title }) => {
    log.info({ workItemId, title }, 'Work item created')
  })
  bus.on('stage:advanced', ({ workItemId, from, to, actor }) => {
    log.info({ workItemId, from, to, actor }, 'Stage advanced')
  })
  bus.on('stage:returned', ({ workItemId, from, to, retryCount, findings }) => {
    log.info({ workItemId, from, to, retryCount, findings: findings.length }, 'Stage returned')
  })
  bus.on('item:aborted', ({ workItemId, from, reason }) => {
    log.warn({ workItemId, from, reason }, 'Work item aborted')
  })

  bus.on('gate:evaluated', (payload) => {
    log.debug(payload, 'Gate evaluated')
  })
  bus.on('docs:recorded', ({ workItemId, docRef }) => {
    log.debug({ workItemId, docRef }, 'Knowledge base entry recorded')
  })
  bus.on('docs:failed', ({ workItemId, error }) => {
    log.warn({ workItemId, error }, 'Knowledge base entry failed')
  })
  bus.on('release:packaged', ({ workItemId, branch, reviewRef }) => {
    log.info({ workItemId, branch, reviewRef }, 'Release packaged')
  })
  bus.on('release:failed', ({ workItemId, error }) => {
    log.warn({ workItemId, error }, 'Release failed')
  })
}
