/**
 * Tests for work item query functions.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { runMigrations } from '../../../src/persistence/migrations/index.js'
import {
  getWorkItemState,
  insertWorkItem,
  listWorkItemStates,
  updateWorkItemState,
  workItemExists,
} from '../../../src/persistence/queries/work-items.js'
import type { WorkItemStatePatch } from '../../../src/persistence/queries/work-items.js'

const CREATED_AT = '2024-03-01T10:00:00.000Z'

function patch(overrides: Partial<WorkItemStatePatch> = {}): WorkItemStatePatch {
  return {
    stage: 'execute',
    status: 'in_progress',
    requiredDocs: ['README.md'],
    acceptanceCriteria: { 'null input handled': true },
    retryCount: 0,
    pendingFindings: [],
    abortReason: null,
    updatedAt: '2024-03-01T11:00:00.000Z',
    ...overrides,
  }
}

describe('work item queries', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = new BetterSqlite3(':memory:')
    runMigrations(db)
  })

  afterEach(() => {
    db.close()
  })

  it('inserts new items in plan/planning at version 1', () => {
    const item = insertWorkItem(db, {
      id: '20240301-100000-fix-null',
      title: 'Fix null handling',
      problemStatement: 'Parser crashes on null',
      createdAt: CREATED_AT,
    })

    expect(item).toEqual({
      id: '20240301-100000-fix-null',
      title: 'Fix null handling',
      problemStatement: 'Parser crashes on null',
      stage: 'plan',
      status: 'planning',
      requiredDocs: [],
      acceptanceCriteria: {},
      retryCount: 0,
      pendingFindings: [],
      abortReason: null,
      version: 1,
      createdAt: CREATED_AT,
      updatedAt: CREATED_AT,
    })
    expect(workItemExists(db, item.id)).toBe(true)
    expect(workItemExists(db, 'other')).toBe(false)
  })

  it('rejects an empty title', () => {
    expect(() => insertWorkItem(db, { id: 'a', title: '', problemStatement: '', createdAt: CREATED_AT })).toThrow()
  })

  it('returns undefined for unknown ids', () => {
    expect(getWorkItemState(db, 'missing')).toBeUndefined()
  })

  it('applies an update only against the current version', () => {
    insertWorkItem(db, { id: 'a', title: 'A', problemStatement: '', createdAt: CREATED_AT })

    expect(updateWorkItemState(db, 'a', 1, patch())).toBe(true)
    // Version 1 is now stale
    expect(updateWorkItemState(db, 'a', 1, patch({ stage: 'verify' }))).toBe(false)

    const state = getWorkItemState(db, 'a')
    expect(state?.version).toBe(2)
    expect(state?.stage).toBe('execute')
    expect(state?.requiredDocs).toEqual(['README.md'])
    expect(state?.acceptanceCriteria).toEqual({ 'null input handled': true })
    expect(state?.updatedAt).toBe('2024-03-01T11:00:00.000Z')
  })

  it('round-trips pending findings through the JSON column', () => {
    insertWorkItem(db, { id: 'a', title: 'A', problemStatement: '', createdAt: CREATED_AT })
    const findings = [{ severity: 'blocking' as const, message: 'lint failed', check: 'lint', location: 'src/a.ts:3' }]
    updateWorkItemState(db, 'a', 1, patch({ stage: 'plan', status: 'blocked', pendingFindings: findings }))

    expect(getWorkItemState(db, 'a')?.pendingFindings).toEqual(findings)
  })

  it('lists items oldest first and filters by stage and status', () => {
    insertWorkItem(db, { id: 'b', title: 'B', problemStatement: '', createdAt: '2024-03-02T00:00:00.000Z' })
    insertWorkItem(db, { id: 'a', title: 'A', problemStatement: '', createdAt: '2024-03-01T00:00:00.000Z' })
    insertWorkItem(db, { id: 'c', title: 'C', problemStatement: '', createdAt: '2024-03-03T00:00:00.000Z' })
    updateWorkItemState(db, 'c', 1, patch())

    expect(listWorkItemStates(db).map((s) => s.id)).toEqual(['a', 'b', 'c'])
    expect(listWorkItemStates(db, { stage: 'plan' }).map((s) => s.id)).toEqual(['a', 'b'])
    expect(listWorkItemStates(db, { stage: 'execute', status: 'in_progress' }).map((s) => s.id)).toEqual(['c'])
    expect(listWorkItemStates(db, { status: 'blocked' })).toEqual([])
  })
})
