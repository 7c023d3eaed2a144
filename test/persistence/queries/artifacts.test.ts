/**
 * Tests for artifact query functions.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { runMigrations } from '../../../src/persistence/migrations/index.js'
import { insertWorkItem } from '../../../src/persistence/queries/work-items.js'
import {
  getArtifactContent,
  hashContent,
  insertArtifact,
  listArtifacts,
} from '../../../src/persistence/queries/artifacts.js'

const AT = '2024-03-01T00:00:00.000Z'

describe('artifact queries', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = new BetterSqlite3(':memory:')
    runMigrations(db)
    insertWorkItem(db, { id: 'a', title: 'A', problemStatement: '', createdAt: AT })
  })

  afterEach(() => {
    db.close()
  })

  it('hashes content with sha256', () => {
    expect(hashContent(Buffer.from('hello'))).toBe(
      '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824',
    )
  })

  it('allocates sequences per (item, stage, kind)', () => {
    const p1 = insertArtifact(db, { workItemId: 'a', stage: 'plan', kind: 'plan', content: Buffer.from('v1'), createdAt: AT })
    const p2 = insertArtifact(db, { workItemId: 'a', stage: 'plan', kind: 'plan', content: Buffer.from('v2'), createdAt: AT })
    const r1 = insertArtifact(db, { workItemId: 'a', stage: 'execute', kind: 'report', content: Buffer.from('r'), createdAt: AT })

    expect([p1.sequence, p2.sequence, r1.sequence]).toEqual([1, 2, 1])
    expect(p2.byteLength).toBe(2)
  })

  it('returns stored bytes unchanged', () => {
    const content = Buffer.from([0, 1, 2, 255])
    const meta = insertArtifact(db, { workItemId: 'a', stage: 'execute', kind: 'diff', content, createdAt: AT })

    expect(getArtifactContent(db, meta)).toEqual(content)
    expect(getArtifactContent(db, { ...meta, sequence: 2 })).toBeUndefined()
  })

  it('lists artifacts in write order, optionally by stage', () => {
    insertArtifact(db, { workItemId: 'a', stage: 'plan', kind: 'plan', content: Buffer.from('p'), createdAt: AT })
    insertArtifact(db, { workItemId: 'a', stage: 'execute', kind: 'report', content: Buffer.from('r'), createdAt: AT })
    insertArtifact(db, { workItemId: 'a', stage: 'plan', kind: 'checklist', content: Buffer.from('c'), createdAt: AT })

    expect(listArtifacts(db, 'a').map((m) => `${m.stage}/${m.kind}`)).toEqual([
      'plan/plan',
      'execute/report',
      'plan/checklist',
    ])
    expect(listArtifacts(db, 'a', 'plan').map((m) => m.kind)).toEqual(['plan', 'checklist'])
    expect(listArtifacts(db, 'missing')).toEqual([])
  })
})
