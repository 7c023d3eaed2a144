/**
 * Tests for DatabaseWrapper and DatabaseServiceImpl.
 *
 * Validates:
 *  - open/close lifecycle
 *  - PRAGMAs (WAL on files, busy_timeout, synchronous, foreign_keys)
 *  - DatabaseService initialize(): parent directory creation and migrations
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, existsSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { DatabaseWrapper, createDatabaseService } from '../../src/persistence/database.js'
import { getSchemaVersion } from '../../src/persistence/migrations/index.js'

// ---------------------------------------------------------------------------
// DatabaseWrapper
// ---------------------------------------------------------------------------

describe('DatabaseWrapper', () => {
  let wrapper: DatabaseWrapper

  beforeEach(() => {
    wrapper = new DatabaseWrapper(':memory:')
  })

  afterEach(() => {
    wrapper.close()
  })

  it('starts closed and refuses db access', () => {
    expect(wrapper.isOpen).toBe(false)
    expect(() => wrapper.db).toThrow('database is not open')
  })

  it('keeps the same handle across repeated open() calls', () => {
    wrapper.open()
    const first = wrapper.db
    wrapper.open()
    expect(wrapper.db).toBe(first)
  })

  it('closes idempotently', () => {
    wrapper.open()
    wrapper.close()
    expect(() => wrapper.close()).not.toThrow()
    expect(wrapper.isOpen).toBe(false)
  })

  it('applies busy_timeout, synchronous and foreign_keys', () => {
    wrapper.open()
    expect(wrapper.db.pragma('busy_timeout', { simple: true })).toBe(5000)
    // NORMAL
    expect(wrapper.db.pragma('synchronous', { simple: true })).toBe(1)
    expect(wrapper.db.pragma('foreign_keys', { simple: true })).toBe(1)
  })
})

// ---------------------------------------------------------------------------
// DatabaseService
// ---------------------------------------------------------------------------

describe('createDatabaseService', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'waypoint-db-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('initializes an in-memory database with the schema applied', async () => {
    const service = createDatabaseService(':memory:')
    expect(service.isOpen).toBe(false)

    await service.initialize()
    expect(service.isOpen).toBe(true)
    expect(getSchemaVersion(service.db)).toBe(1)

    await service.shutdown()
    expect(service.isOpen).toBe(false)
  })

  it('creates missing parent directories and uses WAL for files', async () => {
    const path = join(dir, 'nested', 'state', 'waypoint.db')
    const service = createDatabaseService(path)

    await service.initialize()

    expect(existsSync(path)).toBe(true)
    expect(service.db.pragma('journal_mode', { simple: true })).toBe('wal')
    await service.shutdown()
  })

  it('reopens an existing file without reapplying migrations', async () => {
    const path = join(dir, 'waypoint.db')
    const first = createDatabaseService(path)
    await first.initialize()
    await first.shutdown()

    const second = createDatabaseService(path)
    await second.initialize()
    const rows = second.db.prepare('SELECT version FROM schema_migrations').all()
    expect(rows).toEqual([{ version: 1 }])
    await second.shutdown()
  })
})
