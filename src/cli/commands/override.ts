/**
 * `waypoint override <id> --reason <text>` command
 *
 * Passes the current gate (verify or test) without running its checks.
 * The reason and actor are recorded in the history.
 */

import type { Command } from 'commander'
import { createLogger } from '../../utils/logger.js'
import { renderAdvanceResult } from '../formatters/work-item-formatter.js'
import { parseOutputFormat, writeJsonOutput, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, globalOptions, withRuntime, type ProjectOptions } from '../utils/project.js'

const logger = createLogger('override-cmd')

export interface OverrideActionOptions extends ProjectOptions {
  workItemId: string
  reason: string
  actor?: string
  outputFormat: OutputFormat
  version?: string
}

export async function runOverrideAction(options: OverrideActionOptions): Promise<number> {
  return withRuntime(options, logger, async ({ coordinator }) => {
    const { stage } = coordinator.getWorkItem(options.workItemId)
    const result = await coordinator.advance(
      options.workItemId,
      { type: 'override', stage, reason: options.reason },
      options.actor,
    )
    if (options.outputFormat === 'json') {
      writeJsonOutput(
        'override',
        { workItemId: result.item.id, from: result.from, to: result.to, reason: options.reason },
        options.version ?? '0.0.0',
      )
    } else {
      process.stdout.write(renderAdvanceResult(result) + '\n')
    }
    return EXIT_SUCCESS
  })
}

export function registerOverrideCommand(program: Command, version: string, projectRoot = process.cwd()): void {
  program
    .command('override <id>')
    .description('Pass the current gate without running its checks')
    .requiredOption('--reason <text>', 'Why the gate is being overridden')
    .option('--actor <name>', 'Who is overriding')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (workItemId: string, opts: { reason: string; actor?: string; outputFormat: string }) => {
      process.exitCode = await runOverrideAction({
        projectRoot,
        ...globalOptions(program),
        workItemId,
        reason: opts.reason,
        actor: opts.actor,
        outputFormat: parseOutputFormat(opts.outputFormat),
        version,
      })
    })
}
