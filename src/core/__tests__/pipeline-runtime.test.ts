/**
 * Tests for createPipelineRuntime wiring.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { ConfigError } from '../errors.js'
import { createPipelineRuntime } from '../pipeline-runtime-impl.js'
import { DEFAULT_CONFIG } from '../../modules/config/defaults.js'
import type { WaypointConfig } from '../../modules/config/config-schema.js'
import type { ReleasePackager } from '../../modules/release-packager/release-packager.js'

const NOW = new Date('2024-03-01T10:00:00.000Z')

const packager: ReleasePackager = {
  package: (item) =>
    Promise.resolve({ branch: `waypoint/${item.id}`, commitRef: 'abc', reviewRef: 'origin/x', rollback: 'git revert abc' }),
}

describe('createPipelineRuntime', () => {
  let root: string

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'waypoint-runtime-'))
  })

  afterEach(() => {
    rmSync(root, { recursive: true, force: true })
  })

  it('opens the database under the project root and shuts down idempotently', async () => {
    const runtime = await createPipelineRuntime({ projectRoot: root, config: DEFAULT_CONFIG })

    expect(existsSync(join(root, '.waypoint', 'waypoint.db'))).toBe(true)
    expect(runtime.coordinator.listWorkItems()).toEqual([])

    await runtime.shutdown()
    await runtime.shutdown()
    expect(() => runtime.db.prepare('SELECT 1')).toThrow()
  })

  it('rejects when the database file cannot be opened', async () => {
    // A directory is not a database file
    await expect(createPipelineRuntime({ projectRoot: root, config: DEFAULT_CONFIG, databasePath: root })).rejects.toThrow()
  })

  it('fails on a bad check definition before touching the database', async () => {
    const config: WaypointConfig = { ...DEFAULT_CONFIG, checks: { lint: { type: 'command' } } }

    await expect(createPipelineRuntime({ projectRoot: root, config })).rejects.toBeInstanceOf(ConfigError)
    expect(existsSync(join(root, '.waypoint'))).toBe(false)
  })

  it('wires configured gate checks into the coordinator', async () => {
    const config: WaypointConfig = {
      ...DEFAULT_CONFIG,
      stages: { verify: { checks: ['report-present'] }, test: { checks: [] } },
      checks: {
        'report-present': { type: 'required-artifacts', artifacts: [{ stage: 'execute', kind: 'report' }] },
      },
    }
    const runtime = await createPipelineRuntime({ projectRoot: root, config, databasePath: ':memory:', now: () => NOW })
    const { coordinator } = runtime
    const item = coordinator.createWorkItem({ title: 'Fix null handling' })
    await coordinator.advance(item.id, { type: 'output', stage: 'plan', output: { artifacts: [{ kind: 'plan', content: 'p' }] } })
    await coordinator.advance(item.id, { type: 'output', stage: 'execute', output: { artifacts: [{ kind: 'diff', content: 'd' }] } })

    const result = await coordinator.runGate(item.id)

    expect(result.outcome).toBe('returned')
    expect(result.findings.map((f) => f.message)).toEqual(['No committed report artifact from execute'])
    await runtime.shutdown()
  })

  it('writes knowledge base entries under the project root', async () => {
    const runtime = await createPipelineRuntime({
      projectRoot: root,
      config: DEFAULT_CONFIG,
      databasePath: ':memory:',
      packager,
      now: () => NOW,
    })
    const { coordinator } = runtime
    const { id } = coordinator.createWorkItem({ title: 'Fix null handling' })
    await coordinator.advance(id, { type: 'output', stage: 'plan', output: { artifacts: [{ kind: 'plan', content: 'p' }] } })
    await coordinator.advance(id, { type: 'output', stage: 'execute', output: { artifacts: [{ kind: 'diff', content: 'd' }] } })
    await coordinator.runGate(id)
    await coordinator.runGate(id)
    await coordinator.advance(id, { type: 'output', stage: 'document', output: { artifacts: [{ kind: 'notes', content: 'n' }] } })
    await coordinator.release(id)

    expect(existsSync(join(root, 'docs', 'knowledge-base', `${id}.md`))).toBe(true)
    expect(coordinator.getWorkItem(id).stage).toBe('done')
    await runtime.shutdown()
  })
})
