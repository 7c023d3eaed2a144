/**
 * File-backed knowledge base.
 *
 * One markdown entry per work item plus an INDEX.md listing them. Kept apart
 * from the artifact store: the store is the audit trail, this is the
 * human-facing record.
 */

import { appendFile, mkdir, readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { ResolvedArtifact, WorkItem } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { formatArtifactRef } from '../artifact-store/artifact-ref.js'
import type { DocRef, DocumentationSynthesizer } from './documentation-synthesizer.js'

const logger = createLogger('knowledge-base')

/** Artifact kinds whose text is inlined into the entry */
const INLINED_KINDS = new Set(['plan', 'report', 'notes', 'checklist'])

const INDEX_FILE = 'INDEX.md'
const INDEX_HEADER = '# Knowledge base\n\n'

export interface FileKnowledgeBaseOptions {
  /** Directory holding the entries */
  directory: string
}

/**
 * Render the markdown entry for a work item.
 */
export function renderEntry(item: WorkItem, artifacts: ResolvedArtifact[]): string {
  const lines: string[] = [`# ${item.title}`, '', `Work item: \`${item.id}\``, '']

  lines.push('## Problem', '', item.problemStatement === '' ? '_none recorded_' : item.problemStatement, '')

  if (item.requiredDocs.length > 0) {
    lines.push('## Required docs', '')
    for (const doc of item.requiredDocs) lines.push(`- ${doc}`)
    lines.push('')
  }

  const criteria = Object.entries(item.acceptanceCriteria)
  if (criteria.length > 0) {
    lines.push('## Acceptance criteria', '')
    for (const [name, met] of criteria) lines.push(`- [${met ? 'x' : ' '}] ${name}`)
    lines.push('')
  }

  lines.push('## Artifacts', '')
  for (const artifact of artifacts) {
    lines.push(`- \`${formatArtifactRef(artifact.ref)}\``)
  }
  lines.push('')

  for (const artifact of artifacts) {
    if (!INLINED_KINDS.has(artifact.ref.kind)) continue
    lines.push(`### ${artifact.ref.stage} / ${artifact.ref.kind} #${String(artifact.ref.sequence)}`, '')
    lines.push(artifact.content.toString('utf8').trimEnd(), '')
  }

  return lines.join('\n')
}

export class FileKnowledgeBase implements DocumentationSynthesizer {
  private readonly _directory: string

  constructor(options: FileKnowledgeBaseOptions) {
    this._directory = options.directory
  }

  async record(item: WorkItem, artifacts: ResolvedArtifact[]): Promise<DocRef> {
    await mkdir(this._directory, { recursive: true })

    const entryPath = join(this._directory, `${item.id}.md`)
    await writeFile(entryPath, renderEntry(item, artifacts), 'utf8')
    await this._appendIndex(item)

    logger.info({ workItemId: item.id, path: entryPath }, 'Knowledge base entry recorded')
    return entryPath
  }

  private async _appendIndex(item: WorkItem): Promise<void> {
    const indexPath = join(this._directory, INDEX_FILE)
    const line = `- [${item.title}](./${item.id}.md)\n`

    let existing: string | null = null
    try {
      existing = await readFile(indexPath, 'utf8')
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) throw err
    }

    if (existing === null) {
      await writeFile(indexPath, INDEX_HEADER + line, 'utf8')
    } else if (!existing.includes(`](./${item.id}.md)`)) {
      await appendFile(indexPath, line, 'utf8')
    }
  }
}

export function createFileKnowledgeBase(options: FileKnowledgeBaseOptions): DocumentationSynthesizer {
  return new FileKnowledgeBase(options)
}
