/**
 * Tests for recoverPipelineState.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createPipelineRuntime } from '../../core/pipeline-runtime-impl.js'
import type { PipelineRuntime } from '../../core/pipeline-runtime.js'
import { DEFAULT_CONFIG } from '../../modules/config/defaults.js'
import { recoverPipelineState } from '../pipeline-recovery.js'

const CREATED = new Date('2024-03-01T10:00:00.000Z')
const PLANNED = new Date('2024-03-01T11:00:00.000Z')

describe('recoverPipelineState', () => {
  let runtime: PipelineRuntime
  let clock: Date

  beforeEach(async () => {
    clock = CREATED
    runtime = await createPipelineRuntime({
      projectRoot: '/unused',
      config: DEFAULT_CONFIG,
      databasePath: ':memory:',
      now: () => clock,
    })
  })

  afterEach(async () => {
    await runtime.shutdown()
  })

  it('reports nothing for an empty database', () => {
    expect(recoverPipelineState(runtime.db)).toEqual({ inFlight: [], orphanedArtifacts: [] })
  })

  it('lists non-terminal items and uncommitted artifacts', async () => {
    const { coordinator, store } = runtime
    const alpha = coordinator.createWorkItem({ title: 'Alpha' })
    const beta = coordinator.createWorkItem({ title: 'Beta' })
    const gamma = coordinator.createWorkItem({ title: 'Gamma' })

    clock = PLANNED
    await coordinator.advance(alpha.id, {
      type: 'output',
      stage: 'plan',
      output: { artifacts: [{ kind: 'plan', content: 'plan' }] },
    })
    coordinator.abort(beta.id, 'duplicate')
    // A verdict stored without its transition, as a crash mid-gate leaves it
    const orphan = store.put(alpha.id, 'execute', 'verdict', '{}')

    const report = recoverPipelineState(runtime.db)

    expect(report.inFlight).toEqual([
      { workItemId: alpha.id, stage: 'execute', status: 'in_progress', lastTransitionAt: PLANNED.toISOString() },
      { workItemId: gamma.id, stage: 'plan', status: 'planning', lastTransitionAt: CREATED.toISOString() },
    ])
    expect(report.orphanedArtifacts).toEqual([expect.objectContaining(orphan)])
  })
})
