/**
 * `command` check type: wraps an external tool (linter, type-checker, test
 * runner, SQL dry-run wrapper) as a capability check.
 *
 * Exit code 0 passes. Output lines shaped like `file:line[:col]: message`
 * become findings with a location.
 */

import { z } from 'zod'
import { CheckUnavailableError, ConfigError } from '../../core/errors.js'
import type { Finding, FindingSeverity } from '../../core/types.js'
import { spawnProcess } from '../../utils/process.js'
import type { CapabilityCheck, CheckContext, CheckDefinition, CheckResult } from './types.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export const CommandCheckOptionsSchema = z.object({
  type: z.literal('command'),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().optional(),
  env: z.record(z.string()).optional(),
  severity: z.enum(['blocking', 'advisory']).default('blocking'),
  timeout_ms: z.number().int().positive().optional(),
  criteria: z.array(z.string()).default([]),
})

export type CommandCheckOptions = z.infer<typeof CommandCheckOptionsSchema>

// ---------------------------------------------------------------------------
// Output parsing
// ---------------------------------------------------------------------------

const LOCATION_LINE = /^(\S[^:]*):(\d+)(?::(\d+))?:\s*(.+)$/

/**
 * Turn `file:line[:col]: message` lines into findings. Other lines are ignored.
 */
export function parseFindingLines(
  output: string,
  severity: FindingSeverity,
  checkId: string,
): Finding[] {
  const findings: Finding[] = []
  for (const line of output.split(/\r?\n/)) {
    const match = LOCATION_LINE.exec(line.trim())
    if (match === null) continue
    const [, file, lineNo, column, message] = match
    if (file === undefined || lineNo === undefined || message === undefined) continue
    findings.push({
      severity,
      message: message.trim(),
      location: column === undefined ? `${file}:${lineNo}` : `${file}:${lineNo}:${column}`,
      check: checkId,
    })
  }
  return findings
}

// ---------------------------------------------------------------------------
// CommandCheck
// ---------------------------------------------------------------------------

export class CommandCheck implements CapabilityCheck {
  readonly id: string
  readonly timeoutMs?: number
  private readonly _options: CommandCheckOptions

  constructor(id: string, options: CommandCheckOptions) {
    this.id = id
    this.timeoutMs = options.timeout_ms
    this._options = options
  }

  async run(context: CheckContext): Promise<CheckResult> {
    const { command, args, cwd, env, severity, criteria } = this._options

    const result = await spawnProcess(command, args, {
      cwd,
      env: {
        ...process.env,
        ...env,
        WAYPOINT_WORK_ITEM: context.workItemId,
        WAYPOINT_STAGE: context.stage,
      },
      signal: context.signal,
    })

    if (result.spawnError === 'ENOENT') {
      throw new CheckUnavailableError(this.id, `command not found: ${command}`)
    }
    if (result.spawnError !== undefined) {
      throw new CheckUnavailableError(this.id, result.stderr, { spawnError: result.spawnError })
    }

    const rawOutput = [result.stdout, result.stderr].filter((s) => s !== '').join('\n')
    const exitedCleanly = result.code === 0

    // A clean exit can still print warnings; those never block
    const findings = parseFindingLines(rawOutput, exitedCleanly ? 'advisory' : severity, this.id)
    if (!exitedCleanly && findings.length === 0) {
      findings.push({
        severity,
        message: `${command} exited with code ${String(result.code)}`,
        check: this.id,
      })
    }

    return {
      passed: exitedCleanly || severity === 'advisory',
      findings,
      rawOutput,
      criteria: Object.fromEntries(criteria.map((name) => [name, exitedCleanly])),
    }
  }
}

export function createCommandCheck(id: string, definition: CheckDefinition): CapabilityCheck {
  const parsed = CommandCheckOptionsSchema.safeParse(definition)
  if (!parsed.success) {
    throw new ConfigError(`Invalid options for command check "${id}": ${parsed.error.message}`, {
      checkId: id,
    })
  }
  return new CommandCheck(id, parsed.data)
}
