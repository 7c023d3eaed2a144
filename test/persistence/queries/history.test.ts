/**
 * Tests for transition history queries.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { runMigrations } from '../../../src/persistence/migrations/index.js'
import { insertWorkItem } from '../../../src/persistence/queries/work-items.js'
import { appendHistory, getHistory } from '../../../src/persistence/queries/history.js'

describe('history queries', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = new BetterSqlite3(':memory:')
    runMigrations(db)
    insertWorkItem(db, { id: 'a', title: 'A', problemStatement: '', createdAt: '2024-03-01T00:00:00.000Z' })
    insertWorkItem(db, { id: 'b', title: 'B', problemStatement: '', createdAt: '2024-03-01T00:00:00.000Z' })
  })

  afterEach(() => {
    db.close()
  })

  it('numbers entries per work item starting at 1', () => {
    const first = appendHistory(db, 'a', {
      fromStage: 'plan',
      toStage: 'execute',
      verdict: 'output',
      actor: 'alice',
      note: null,
      findings: [],
      artifactRefs: [{ workItemId: 'a', stage: 'plan', kind: 'plan', sequence: 1 }],
      at: '2024-03-01T01:00:00.000Z',
    })
    const other = appendHistory(db, 'b', {
      fromStage: 'plan',
      toStage: 'execute',
      verdict: 'output',
      actor: 'bob',
      note: null,
      findings: [],
      artifactRefs: [],
      at: '2024-03-01T01:00:00.000Z',
    })
    const second = appendHistory(db, 'a', {
      fromStage: 'execute',
      toStage: 'verify',
      verdict: 'output',
      actor: 'alice',
      note: 'ready for review',
      findings: [],
      artifactRefs: [],
      at: '2024-03-01T02:00:00.000Z',
    })

    expect(first.seq).toBe(1)
    expect(other.seq).toBe(1)
    expect(second.seq).toBe(2)
  })

  it('reads entries back in sequence order with decoded JSON columns', () => {
    appendHistory(db, 'a', {
      fromStage: 'verify',
      toStage: 'plan',
      verdict: 'fail',
      actor: 'gate',
      note: null,
      findings: [{ severity: 'blocking', message: 'tests failed', check: 'unit' }],
      artifactRefs: [],
      at: '2024-03-01T03:00:00.000Z',
    })

    expect(getHistory(db, 'a')).toEqual([
      {
        seq: 1,
        fromStage: 'verify',
        toStage: 'plan',
        verdict: 'fail',
        actor: 'gate',
        note: null,
        findings: [{ severity: 'blocking', message: 'tests failed', check: 'unit' }],
        artifactRefs: [],
        at: '2024-03-01T03:00:00.000Z',
      },
    ])
    expect(getHistory(db, 'b')).toEqual([])
  })
})
