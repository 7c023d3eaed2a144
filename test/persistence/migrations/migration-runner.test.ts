/**
 * Tests for the migration runner.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { getSchemaVersion, runMigrations } from '../../../src/persistence/migrations/index.js'

function sqliteObjects(db: BetterSqlite3Database, type: 'table' | 'index'): string[] {
  return db
    .prepare("SELECT name FROM sqlite_master WHERE type = ? AND name NOT LIKE 'sqlite_%' ORDER BY name")
    .all(type)
    .map((row) => (typeof row === 'object' && row !== null && 'name' in row ? String(row.name) : ''))
}

describe('runMigrations', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = new BetterSqlite3(':memory:')
    db.pragma('foreign_keys = ON')
  })

  afterEach(() => {
    db.close()
  })

  it('reports version 0 before the tracking table has any rows', () => {
    runMigrations(db)
    expect(getSchemaVersion(db)).toBe(1)
    db.exec('DELETE FROM schema_migrations')
    expect(getSchemaVersion(db)).toBe(0)
  })

  it('creates the pipeline tables and indexes', () => {
    runMigrations(db)
    expect(sqliteObjects(db, 'table')).toEqual([
      'artifacts',
      'schema_migrations',
      'work_item_history',
      'work_items',
    ])
    expect(sqliteObjects(db, 'index')).toEqual([
      'idx_artifacts_item_stage',
      'idx_history_item',
      'idx_work_items_stage',
    ])
  })

  it('records each migration once by name', () => {
    runMigrations(db)
    runMigrations(db)
    expect(db.prepare('SELECT version, name FROM schema_migrations').all()).toEqual([
      { version: 1, name: '001-initial-schema' },
    ])
  })

  it('rejects artifacts for unknown work items', () => {
    runMigrations(db)
    expect(() =>
      db
        .prepare(`
          INSERT INTO artifacts (work_item_id, stage, kind, sequence, content, content_hash, byte_length, created_at)
          VALUES ('missing', 'plan', 'plan', 1, x'00', 'h', 1, '2024-01-01T00:00:00.000Z')
        `)
        .run(),
    ).toThrow(/FOREIGN KEY/)
  })
})
