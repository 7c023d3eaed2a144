/**
 * `waypoint abort <id> --reason <text>` command
 *
 * Moves a non-terminal work item to `aborted`.
 *
 * Exit codes:
 *   0 - Aborted
 *   1 - System error
 *   2 - Unknown item, already terminal, or empty reason
 */

import type { Command } from 'commander'
import { createLogger } from '../../utils/logger.js'
import { renderAdvanceResult } from '../formatters/work-item-formatter.js'
import { parseOutputFormat, writeJsonOutput, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, globalOptions, withRuntime, type ProjectOptions } from '../utils/project.js'

const logger = createLogger('abort-cmd')

export interface AbortActionOptions extends ProjectOptions {
  workItemId: string
  reason: string
  actor?: string
  outputFormat: OutputFormat
  version?: string
}

export async function runAbortAction(options: AbortActionOptions): Promise<number> {
  return withRuntime(options, logger, ({ coordinator }) => {
    const result = coordinator.abort(options.workItemId, options.reason, options.actor)
    if (options.outputFormat === 'json') {
      writeJsonOutput(
        'abort',
        { workItemId: result.item.id, from: result.from, reason: options.reason },
        options.version ?? '0.0.0',
      )
    } else {
      process.stdout.write(renderAdvanceResult(result) + '\n')
    }
    return EXIT_SUCCESS
  })
}

export function registerAbortCommand(program: Command, version: string, projectRoot = process.cwd()): void {
  program
    .command('abort <id>')
    .description('Abort a work item')
    .requiredOption('--reason <text>', 'Why the item is being aborted')
    .option('--actor <name>', 'Who is aborting')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (workItemId: string, opts: { reason: string; actor?: string; outputFormat: string }) => {
      process.exitCode = await runAbortAction({
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
