/**
 * Text form of an ArtifactRef: `<workItemId>/<stage>/<kind>/<sequence>`.
 */

import { ArtifactRefSchema } from '../../persistence/schemas/pipeline.js'
import type { ArtifactRef } from '../../core/types.js'

export function formatArtifactRef(ref: ArtifactRef): string {
  return `${ref.workItemId}/${ref.stage}/${ref.kind}/${String(ref.sequence)}`
}

/**
 * Parse the text form back into a ref.
 * @returns null when the string is not a well-formed ref
 */
export function parseArtifactRef(text: string): ArtifactRef | null {
  const parts = text.trim().split('/')
  if (parts.length !== 4) return null
  const [workItemId, stage, kind, sequence] = parts
  if (sequence === undefined || !/^\d+$/.test(sequence)) return null
  const parsed = ArtifactRefSchema.safeParse({
    workItemId,
    stage,
    kind,
    sequence: Number(sequence),
  })
  return parsed.success ? parsed.data : null
}

export function isSameArtifact(a: ArtifactRef, b: ArtifactRef): boolean {
  return (
    a.workItemId === b.workItemId &&
    a.stage === b.stage &&
    a.kind === b.kind &&
    a.sequence === b.sequence
  )
}
