/**
 * Artifact query functions. Rows are never updated or deleted.
 */

import { createHash } from 'node:crypto'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { z } from 'zod'
import { ArtifactContentRowSchema, ArtifactRowSchema } from '../schemas/pipeline.js'
import type { ArtifactRow } from '../schemas/pipeline.js'
import type { ArtifactKind, ArtifactMeta, ArtifactRef, Stage } from '../../core/types.js'

export interface InsertArtifactInput {
  workItemId: string
  stage: Stage
  kind: ArtifactKind
  content: Buffer
  createdAt: string
}

const META_COLUMNS =
  'work_item_id, stage, kind, sequence, content_hash, byte_length, created_at'

function decodeArtifactRow(row: ArtifactRow): ArtifactMeta {
  return {
    workItemId: row.work_item_id,
    stage: row.stage,
    kind: row.kind,
    sequence: row.sequence,
    contentHash: row.content_hash,
    byteLength: row.byte_length,
    createdAt: row.created_at,
  }
}

export function hashContent(content: Buffer): string {
  return createHash('sha256').update(content).digest('hex')
}

/**
 * Insert an artifact under the next free sequence number for its
 * (item, stage, kind). Sequence allocation and insert share one transaction.
 */
export function insertArtifact(db: BetterSqlite3Database, input: InsertArtifactInput): ArtifactMeta {
  const insert = db.transaction((): ArtifactMeta => {
    const sequence = z
      .object({ next: z.number().int() })
      .parse(
        db
          .prepare(`
            SELECT COALESCE(MAX(sequence), 0) + 1 AS next FROM artifacts
            WHERE work_item_id = ? AND stage = ? AND kind = ?
          `)
          .get(input.workItemId, input.stage, input.kind),
      ).next

    const contentHash = hashContent(input.content)
    db.prepare(`
      INSERT INTO artifacts
        (work_item_id, stage, kind, sequence, content, content_hash, byte_length, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      input.workItemId,
      input.stage,
      input.kind,
      sequence,
      input.content,
      contentHash,
      input.content.length,
      input.createdAt,
    )

    return {
      workItemId: input.workItemId,
      stage: input.stage,
      kind: input.kind,
      sequence,
      contentHash,
      byteLength: input.content.length,
      createdAt: input.createdAt,
    }
  })
  return insert()
}

export function getArtifactContent(db: BetterSqlite3Database, ref: ArtifactRef): Buffer | undefined {
  const row: unknown = db
    .prepare(`
      SELECT content FROM artifacts
      WHERE work_item_id = ? AND stage = ? AND kind = ? AND sequence = ?
    `)
    .get(ref.workItemId, ref.stage, ref.kind, ref.sequence)
  if (row === undefined) return undefined
  return ArtifactContentRowSchema.parse(row).content
}

/** Artifacts of an item (optionally one stage) in write order */
export function listArtifacts(
  db: BetterSqlite3Database,
  workItemId: string,
  stage?: Stage,
): ArtifactMeta[] {
  const rows =
    stage === undefined
      ? db.prepare(`SELECT ${META_COLUMNS} FROM artifacts WHERE work_item_id = ? ORDER BY id ASC`).all(workItemId)
      : db
          .prepare(`SELECT ${META_COLUMNS} FROM artifacts WHERE work_item_id = ? AND stage = ? ORDER BY id ASC`)
          .all(workItemId, stage)
  return rows.map((row) => decodeArtifactRow(ArtifactRowSchema.parse(row)))
}
