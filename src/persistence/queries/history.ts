/**
 * Transition history queries. The log is append-only.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { z } from 'zod'
import {
  ArtifactRefListSchema,
  FindingListSchema,
  HistoryRowSchema,
  parseJsonColumn,
} from '../schemas/pipeline.js'
import type { HistoryRow } from '../schemas/pipeline.js'
import type { HistoryEntry } from '../../core/types.js'

export type NewHistoryEntry = Omit<HistoryEntry, 'seq'>

function decodeHistoryRow(row: HistoryRow): HistoryEntry {
  return {
    seq: row.seq,
    fromStage: row.from_stage,
    toStage: row.to_stage,
    verdict: row.verdict,
    actor: row.actor,
    note: row.note,
    findings: parseJsonColumn(FindingListSchema, row.findings),
    artifactRefs: parseJsonColumn(ArtifactRefListSchema, row.artifact_refs),
    at: row.created_at,
  }
}

/**
 * Append a transition with the next sequence number for the item.
 * Call inside the same transaction as the work item update.
 */
export function appendHistory(
  db: BetterSqlite3Database,
  workItemId: string,
  entry: NewHistoryEntry,
): HistoryEntry {
  const next = z
    .object({ next: z.number().int() })
    .parse(
      db
        .prepare('SELECT COALESCE(MAX(seq), 0) + 1 AS next FROM work_item_history WHERE work_item_id = ?')
        .get(workItemId),
    ).next

  db.prepare(`
    INSERT INTO work_item_history
      (work_item_id, seq, from_stage, to_stage, verdict, actor, note, findings, artifact_refs, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    workItemId,
    next,
    entry.fromStage,
    entry.toStage,
    entry.verdict,
    entry.actor,
    entry.note,
    JSON.stringify(entry.findings),
    JSON.stringify(entry.artifactRefs),
    entry.at,
  )

  return { ...entry, seq: next }
}

/** All transitions of an item in commit order */
export function getHistory(db: BetterSqlite3Database, workItemId: string): HistoryEntry[] {
  return db
    .prepare('SELECT * FROM work_item_history WHERE work_item_id = ? ORDER BY seq ASC')
    .all(workItemId)
    .map((row) => decodeHistoryRow(HistoryRowSchema.parse(row)))
}
