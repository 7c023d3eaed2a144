/**
 * Human-readable renderers for work items, transitions, artifacts and the
 * recovery report.
 */

import type { ArtifactMeta, Finding, HistoryEntry, WorkItem } from '../../core/types.js'
import type { AdvanceResult } from '../../modules/stage-coordinator/types.js'
import type { RecoveryReport } from '../../recovery/pipeline-recovery.js'
import { formatArtifactRef } from '../../modules/artifact-store/artifact-ref.js'
import { formatTable } from '../utils/formatting.js'

// ---------------------------------------------------------------------------
// Findings
// ---------------------------------------------------------------------------

export function renderFinding(finding: Finding): string {
  const source = finding.check !== undefined ? `${finding.check}: ` : ''
  const location = finding.location !== undefined ? ` (${finding.location})` : ''
  return `[${finding.severity}] ${source}${finding.message}${location}`
}

// ---------------------------------------------------------------------------
// Lists
// ---------------------------------------------------------------------------

export function renderWorkItemTable(items: WorkItem[]): string {
  if (items.length === 0) return 'No work items.'
  return formatTable(
    ['ID', 'Stage', 'Status', 'Retries', 'Title'],
    items.map((item) => ({
      id: item.id,
      stage: item.stage,
      status: item.status,
      retries: String(item.retryCount),
      title: item.title,
    })),
    ['id', 'stage', 'status', 'retries', 'title'],
  )
}

export function renderArtifactTable(artifacts: ArtifactMeta[], committed: ReadonlySet<string>): string {
  if (artifacts.length === 0) return 'No artifacts.'
  return formatTable(
    ['Ref', 'Bytes', 'Committed', 'Created'],
    artifacts.map((meta) => {
      const ref = formatArtifactRef(meta)
      return {
        ref,
        bytes: String(meta.byteLength),
        committed: committed.has(ref) ? 'yes' : 'no',
        created: meta.createdAt,
      }
    }),
    ['ref', 'bytes', 'committed', 'created'],
  )
}

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

function renderHistoryEntry(entry: HistoryEntry): string {
  const note = entry.note !== null ? `  ${entry.note}` : ''
  return `  ${String(entry.seq)}. ${entry.fromStage} → ${entry.toStage}  ${entry.verdict}  by ${entry.actor}  ${entry.at}${note}`
}

/**
 * Full status report: header, criteria, required docs, pending findings
 * and the transition history.
 */
export function renderWorkItemStatus(item: WorkItem): string {
  const lines: string[] = [
    `Work item ${item.id}`,
    `  Title:   ${item.title}`,
    `  Stage:   ${item.stage} (${item.status})`,
    `  Retries: ${String(item.retryCount)}`,
  ]
  if (item.abortReason !== null) lines.push(`  Aborted: ${item.abortReason}`)

  lines.push('', 'Acceptance criteria:')
  const criteria = Object.entries(item.acceptanceCriteria)
  if (criteria.length === 0) lines.push('  none')
  for (const [name, met] of criteria) lines.push(`  [${met ? 'x' : ' '}] ${name}`)

  if (item.requiredDocs.length > 0) {
    lines.push('', 'Required docs:')
    for (const doc of item.requiredDocs) lines.push(`  - ${doc}`)
  }

  if (item.pendingFindings.length > 0) {
    lines.push('', 'Pending findings:')
    for (const finding of item.pendingFindings) lines.push(`  ${renderFinding(finding)}`)
  }

  lines.push('', 'History:')
  if (item.history.length === 0) lines.push('  none')
  for (const entry of item.history) lines.push(renderHistoryEntry(entry))

  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

export function renderAdvanceResult(result: AdvanceResult): string {
  const { item, from, to } = result
  let headline: string
  switch (result.outcome) {
    case 'advanced':
      headline = `${item.id}: ${from} → ${to}`
      break
    case 'returned':
      headline = `${item.id}: ${from} → ${to} (returned, retry ${String(item.retryCount)})`
      break
    case 'blocked':
      headline = `${item.id}: blocked in ${from}`
      break
    case 'aborted':
      headline = `${item.id}: aborted from ${from}`
      break
  }

  const lines = [headline]
  if (result.note !== undefined && result.note !== '') lines.push(`  ${result.note}`)
  for (const finding of result.findings) lines.push(`  ${renderFinding(finding)}`)
  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// Recovery
// ---------------------------------------------------------------------------

export function renderRecoveryReport(report: RecoveryReport): string {
  const lines: string[] = []

  if (report.inFlight.length === 0) {
    lines.push('No work items in flight.')
  } else {
    lines.push(`Work items in flight (${String(report.inFlight.length)}):`)
    for (const item of report.inFlight) {
      lines.push(`  ${item.workItemId}  ${item.stage} (${item.status})  since ${item.lastTransitionAt}`)
    }
  }

  if (report.orphanedArtifacts.length > 0) {
    lines.push('', `Uncommitted artifacts (${String(report.orphanedArtifacts.length)}):`)
    for (const meta of report.orphanedArtifacts) lines.push(`  ${formatArtifactRef(meta)}`)
  }

  return lines.join('\n')
}
