/**
 * `waypoint status <id>` command
 *
 * Shows a work item's stage, acceptance criteria, pending findings and
 * transition history.
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Work item not found
 */

import type { Command } from 'commander'
import { createLogger } from '../../utils/logger.js'
import { renderWorkItemStatus } from '../formatters/work-item-formatter.js'
import { parseOutputFormat, writeJsonOutput, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, globalOptions, withRuntime, type ProjectOptions } from '../utils/project.js'

const logger = createLogger('status-cmd')

export interface StatusActionOptions extends ProjectOptions {
  workItemId: string
  outputFormat: OutputFormat
  version?: string
}

export async function runStatusAction(options: StatusActionOptions): Promise<number> {
  return withRuntime(options, logger, ({ coordinator }) => {
    const item = coordinator.getWorkItem(options.workItemId)
    if (options.outputFormat === 'json') {
      writeJsonOutput('status', item, options.version ?? '0.0.0')
    } else {
      process.stdout.write(renderWorkItemStatus(item) + '\n')
    }
    return EXIT_SUCCESS
  })
}

export function registerStatusCommand(program: Command, version: string, projectRoot = process.cwd()): void {
  program
    .command('status <id>')
    .description('Show a work item with its criteria, findings and history')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (workItemId: string, opts: { outputFormat: string }) => {
      process.exitCode = await runStatusAction({
        projectRoot,
        ...globalOptions(program),
        workItemId,
        outputFormat: parseOutputFormat(opts.outputFormat),
        version,
      })
    })
}
