/**
 * Work item query functions for the SQLite persistence layer.
 *
 * Rows are mutable but every update is version-checked: `updateWorkItemState`
 * only applies when the caller still holds the latest `version`.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  CreateWorkItemInputSchema,
  CriteriaSchema,
  FindingListSchema,
  StringListSchema,
  WorkItemRowSchema,
  parseJsonColumn,
} from '../schemas/pipeline.js'
import type { CreateWorkItemInput, WorkItemRow } from '../schemas/pipeline.js'
import type { Finding, Stage, WorkItemStatus } from '../../core/types.js'

export type { CreateWorkItemInput, WorkItemRow }

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Decoded work_items row (JSON columns parsed) */
export interface WorkItemState {
  id: string
  title: string
  problemStatement: string
  stage: Stage
  status: WorkItemStatus
  requiredDocs: string[]
  acceptanceCriteria: Record<string, boolean>
  retryCount: number
  pendingFindings: Finding[]
  abortReason: string | null
  version: number
  createdAt: string
  updatedAt: string
}

/** Mutable fields written on every transition */
export interface WorkItemStatePatch {
  stage: Stage
  status: WorkItemStatus
  requiredDocs: string[]
  acceptanceCriteria: Record<string, boolean>
  retryCount: number
  pendingFindings: Finding[]
  abortReason: string | null
  updatedAt: string
}

export interface WorkItemFilter {
  stage?: Stage
  status?: WorkItemStatus
}

// ---------------------------------------------------------------------------
// Mapping
// ---------------------------------------------------------------------------

export function decodeWorkItemRow(row: WorkItemRow): WorkItemState {
  return {
    id: row.id,
    title: row.title,
    problemStatement: row.problem_statement,
    stage: row.stage,
    status: row.status,
    requiredDocs: parseJsonColumn(StringListSchema, row.required_docs),
    acceptanceCriteria: parseJsonColumn(CriteriaSchema, row.acceptance_criteria),
    retryCount: row.retry_count,
    pendingFindings: parseJsonColumn(FindingListSchema, row.pending_findings),
    abortReason: row.abort_reason,
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/**
 * Insert a new work item in `plan` / `planning` at version 1.
 */
export function insertWorkItem(db: BetterSqlite3Database, input: CreateWorkItemInput): WorkItemState {
  const validated = CreateWorkItemInputSchema.parse(input)
  db.prepare(`
    INSERT INTO work_items (id, title, problem_statement, stage, status, created_at, updated_at)
    VALUES (?, ?, ?, 'plan', 'planning', ?, ?)
  `).run(validated.id, validated.title, validated.problemStatement, validated.createdAt, validated.createdAt)

  const created = getWorkItemState(db, validated.id)
  if (created === undefined) {
    throw new Error(`insertWorkItem: row for ${validated.id} not readable after insert`)
  }
  return created
}

export function getWorkItemState(db: BetterSqlite3Database, id: string): WorkItemState | undefined {
  const row: unknown = db.prepare('SELECT * FROM work_items WHERE id = ?').get(id)
  if (row === undefined) return undefined
  return decodeWorkItemRow(WorkItemRowSchema.parse(row))
}

export function workItemExists(db: BetterSqlite3Database, id: string): boolean {
  return db.prepare('SELECT 1 FROM work_items WHERE id = ?').get(id) !== undefined
}

/**
 * List work items, oldest first, optionally filtered by stage and/or status.
 */
export function listWorkItemStates(
  db: BetterSqlite3Database,
  filter: WorkItemFilter = {},
): WorkItemState[] {
  const clauses: string[] = []
  const params: string[] = []
  if (filter.stage !== undefined) {
    clauses.push('stage = ?')
    params.push(filter.stage)
  }
  if (filter.status !== undefined) {
    clauses.push('status = ?')
    params.push(filter.status)
  }
  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : ''
  return db
    .prepare(`SELECT * FROM work_items ${where} ORDER BY created_at ASC, id ASC`)
    .all(...params)
    .map((row) => decodeWorkItemRow(WorkItemRowSchema.parse(row)))
}

/**
 * Write the mutable fields and bump `version`, but only when the stored
 * version still equals `expectedVersion`.
 *
 * @returns true when the row was updated, false on a stale version
 */
export function updateWorkItemState(
  db: BetterSqlite3Database,
  id: string,
  expectedVersion: number,
  patch: WorkItemStatePatch,
): boolean {
  const result = db.prepare(`
    UPDATE work_items
    SET stage = ?, status = ?, required_docs = ?, acceptance_criteria = ?,
        retry_count = ?, pending_findings = ?, abort_reason = ?,
        updated_at = ?, version = version + 1
    WHERE id = ? AND version = ?
  `).run(
    patch.stage,
    patch.status,
    JSON.stringify(patch.requiredDocs),
    JSON.stringify(patch.acceptanceCriteria),
    patch.retryCount,
    JSON.stringify(patch.pendingFindings),
    patch.abortReason,
    patch.updatedAt,
    id,
    expectedVersion,
  )
  return result.changes === 1
}
