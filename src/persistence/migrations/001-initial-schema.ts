/**
 * Migration 001: Initial schema.
 *
 *  - work_items         one row per work item (mutable, version-checked)
 *  - work_item_history  append-only transition log
 *  - artifacts          append-only immutable stage outputs
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const initialSchemaMigration: Migration = {
  version: 1,
  name: '001-initial-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS work_items (
        id                  TEXT PRIMARY KEY,
        title               TEXT NOT NULL,
        problem_statement   TEXT NOT NULL DEFAULT '',
        stage               TEXT NOT NULL DEFAULT 'plan',
        status              TEXT NOT NULL DEFAULT 'planning',
        required_docs       TEXT NOT NULL DEFAULT '[]',
        acceptance_criteria TEXT NOT NULL DEFAULT '{}',
        retry_count         INTEGER NOT NULL DEFAULT 0,
        pending_findings    TEXT NOT NULL DEFAULT '[]',
        abort_reason        TEXT,
        version             INTEGER NOT NULL DEFAULT 1,
        created_at          TEXT NOT NULL,
        updated_at          TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS work_item_history (
        id             INTEGER PRIMARY KEY AUTOINCREMENT,
        work_item_id   TEXT NOT NULL REFERENCES work_items(id),
        seq            INTEGER NOT NULL,
        from_stage     TEXT NOT NULL,
        to_stage       TEXT NOT NULL,
        verdict        TEXT NOT NULL,
        actor          TEXT NOT NULL,
        note           TEXT,
        findings       TEXT NOT NULL DEFAULT '[]',
        artifact_refs  TEXT NOT NULL DEFAULT '[]',
        created_at     TEXT NOT NULL,
        UNIQUE (work_item_id, seq)
      );

      CREATE TABLE IF NOT EXISTS artifacts (
        id            INTEGER PRIMARY KEY AUTOINCREMENT,
        work_item_id  TEXT NOT NULL REFERENCES work_items(id),
        stage         TEXT NOT NULL,
        kind          TEXT NOT NULL,
        sequence      INTEGER NOT NULL,
        content       BLOB NOT NULL,
        content_hash  TEXT NOT NULL,
        byte_length   INTEGER NOT NULL,
        created_at    TEXT NOT NULL,
        UNIQUE (work_item_id, stage, kind, sequence)
      );

      CREATE INDEX IF NOT EXISTS idx_work_items_stage ON work_items(stage);
      CREATE INDEX IF NOT EXISTS idx_history_item ON work_item_history(work_item_id, seq);
      CREATE INDEX IF NOT EXISTS idx_artifacts_item_stage ON artifacts(work_item_id, stage);
    `)
  },
}
