/**
 * SQLite-backed ArtifactStore.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { NotFoundError } from '../../core/errors.js'
import type { ArtifactKind, ArtifactMeta, ArtifactRef, Stage, WorkItemId } from '../../core/types.js'
import { getArtifactContent, insertArtifact, listArtifacts } from '../../persistence/queries/artifacts.js'
import { workItemExists } from '../../persistence/queries/work-items.js'
import { createLogger } from '../../utils/logger.js'
import type { ArtifactStore } from './artifact-store.js'
import { formatArtifactRef } from './artifact-ref.js'

const logger = createLogger('artifact-store')

export interface ArtifactStoreOptions {
  /** Clock used for created_at (defaults to the system clock) */
  now?: () => Date
}

export class SqliteArtifactStore implements ArtifactStore {
  private readonly _db: BetterSqlite3Database
  private readonly _now: () => Date

  constructor(db: BetterSqlite3Database, options: ArtifactStoreOptions = {}) {
    this._db = db
    this._now = options.now ?? (() => new Date())
  }

  put(workItemId: WorkItemId, stage: Stage, kind: ArtifactKind, content: string | Buffer): ArtifactRef {
    if (!workItemExists(this._db, workItemId)) {
      throw new NotFoundError('Work item', workItemId)
    }
    const bytes = typeof content === 'string' ? Buffer.from(content, 'utf8') : content
    const meta = insertArtifact(this._db, {
      workItemId,
      stage,
      kind,
      content: bytes,
      createdAt: this._now().toISOString(),
    })
    const ref: ArtifactRef = { workItemId, stage, kind, sequence: meta.sequence }
    logger.debug({ ref: formatArtifactRef(ref), bytes: meta.byteLength }, 'Artifact stored')
    return ref
  }

  get(ref: ArtifactRef): Buffer {
    const content = getArtifactContent(this._db, ref)
    if (content === undefined) {
      throw new NotFoundError('Artifact', formatArtifactRef(ref))
    }
    return content
  }

  list(workItemId: WorkItemId, stage?: Stage): ArtifactMeta[] {
    return listArtifacts(this._db, workItemId, stage)
  }
}

export function createArtifactStore(
  db: BetterSqlite3Database,
  options: ArtifactStoreOptions = {},
): ArtifactStore {
  return new SqliteArtifactStore(db, options)
}
