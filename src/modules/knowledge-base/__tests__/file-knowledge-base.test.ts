/**
 * Tests for the file-backed knowledge base.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { ResolvedArtifact, WorkItem } from '../../../core/types.js'
import { createFileKnowledgeBase, renderEntry } from '../file-knowledge-base.js'

const ITEM: WorkItem = {
  id: '20240301-100000-fix-null',
  title: 'Fix null handling',
  problemStatement: 'Parser crashes on null input',
  stage: 'release',
  status: 'ready_for_next',
  requiredDocs: ['docs/parser.md'],
  acceptanceCriteria: { 'null input handled': true },
  artifacts: {},
  history: [],
  retryCount: 0,
  pendingFindings: [],
  abortReason: null,
  version: 6,
  createdAt: '2024-03-01T10:00:00.000Z',
  updatedAt: '2024-03-01T10:00:00.000Z',
}

const ARTIFACTS: ResolvedArtifact[] = [
  { ref: { workItemId: ITEM.id, stage: 'plan', kind: 'plan', sequence: 1 }, content: Buffer.from('Guard parser.\n') },
  { ref: { workItemId: ITEM.id, stage: 'verify', kind: 'verdict', sequence: 1 }, content: Buffer.from('{}') },
]

describe('renderEntry', () => {
  it('renders problem, docs, criteria, refs and inlined text artifacts', () => {
    expect(renderEntry(ITEM, ARTIFACTS)).toBe(
      [
        '# Fix null handling',
        '',
        'Work item: `20240301-100000-fix-null`',
        '',
        '## Problem',
        '',
        'Parser crashes on null input',
        '',
        '## Required docs',
        '',
        '- docs/parser.md',
        '',
        '## Acceptance criteria',
        '',
        '- [x] null input handled',
        '',
        '## Artifacts',
        '',
        '- `20240301-100000-fix-null/plan/plan/1`',
        '- `20240301-100000-fix-null/verify/verdict/1`',
        '',
        '### plan / plan #1',
        '',
        'Guard parser.',
        '',
      ].join('\n'),
    )
  })

  it('marks a missing problem statement', () => {
    expect(renderEntry({ ...ITEM, problemStatement: '' }, [])).toContain('## Problem\n\n_none recorded_\n')
  })
})

describe('FileKnowledgeBase', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'waypoint-kb-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('writes the entry and indexes it once', async () => {
    const kb = createFileKnowledgeBase({ directory: join(dir, 'kb') })

    const ref = await kb.record(ITEM, ARTIFACTS)
    await kb.record(ITEM, ARTIFACTS)
    await kb.record({ ...ITEM, id: '20240302-090000-other', title: 'Other' }, [])

    expect(ref).toBe(join(dir, 'kb', '20240301-100000-fix-null.md'))
    expect(readFileSync(ref, 'utf8')).toBe(renderEntry(ITEM, ARTIFACTS))
    expect(readFileSync(join(dir, 'kb', 'INDEX.md'), 'utf8')).toBe(
      '# Knowledge base\n\n' +
        '- [Fix null handling](./20240301-100000-fix-null.md)\n' +
        '- [Other](./20240302-090000-other.md)\n',
    )
  })
})
