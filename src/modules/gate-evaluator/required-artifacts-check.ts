/**
 * `required-artifacts` check type: passes only when the item already has
 * committed artifacts of every listed (stage, kind).
 */

import { z } from 'zod'
import { ConfigError } from '../../core/errors.js'
import type { Finding } from '../../core/types.js'
import { ArtifactKindEnum, StageEnum } from '../../persistence/schemas/pipeline.js'
import type { CapabilityCheck, CheckContext, CheckDefinition, CheckResult } from './types.js'

export const RequiredArtifactsOptionsSchema = z.object({
  type: z.literal('required-artifacts'),
  artifacts: z.array(z.object({ stage: StageEnum, kind: ArtifactKindEnum })).min(1),
  severity: z.enum(['blocking', 'advisory']).default('blocking'),
  timeout_ms: z.number().int().positive().optional(),
  criteria: z.array(z.string()).default([]),
})

export type RequiredArtifactsOptions = z.infer<typeof RequiredArtifactsOptionsSchema>

export class RequiredArtifactsCheck implements CapabilityCheck {
  readonly id: string
  readonly timeoutMs?: number
  private readonly _options: RequiredArtifactsOptions

  constructor(id: string, options: RequiredArtifactsOptions) {
    this.id = id
    this.timeoutMs = options.timeout_ms
    this._options = options
  }

  async run(context: CheckContext): Promise<CheckResult> {
    const { artifacts, severity, criteria } = this._options
    const lines: string[] = []
    const findings: Finding[] = []

    for (const required of artifacts) {
      const present = context.committedArtifacts.some(
        (ref) => ref.stage === required.stage && ref.kind === required.kind,
      )
      lines.push(`${present ? 'ok' : 'missing'} ${required.stage}/${required.kind}`)
      if (!present) {
        findings.push({
          severity,
          message: `No committed ${required.kind} artifact from ${required.stage}`,
          check: this.id,
        })
      }
    }

    const satisfied = findings.length === 0
    return {
      passed: satisfied || severity === 'advisory',
      findings,
      rawOutput: lines.join('\n'),
      criteria: Object.fromEntries(criteria.map((name) => [name, satisfied])),
    }
  }
}

export function createRequiredArtifactsCheck(id: string, definition: CheckDefinition): CapabilityCheck {
  const parsed = RequiredArtifactsOptionsSchema.safeParse(definition)
  if (!parsed.success) {
    throw new ConfigError(`Invalid options for required-artifacts check "${id}": ${parsed.error.message}`, {
      checkId: id,
    })
  }
  return new RequiredArtifactsCheck(id, parsed.data)
}
