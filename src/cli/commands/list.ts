/**
 * `waypoint list` command
 *
 * Lists work items, optionally filtered by stage and status.
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Unknown stage or status
 */

import type { Command } from 'commander'
import { StageEnum, WorkItemStatusEnum } from '../../persistence/schemas/pipeline.js'
import { createLogger } from '../../utils/logger.js'
import type { WorkItemListFilter } from '../../modules/stage-coordinator/types.js'
import { renderWorkItemTable } from '../formatters/work-item-formatter.js'
import { parseOutputFormat, writeJsonOutput, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, EXIT_USAGE_ERROR, globalOptions, withRuntime, type ProjectOptions } from '../utils/project.js'

const logger = createLogger('list-cmd')

export interface ListActionOptions extends ProjectOptions {
  stage?: string
  status?: string
  outputFormat: OutputFormat
  version?: string
}

export async function runListAction(options: ListActionOptions): Promise<number> {
  const filter: WorkItemListFilter = {}

  if (options.stage !== undefined) {
    const stage = StageEnum.safeParse(options.stage)
    if (!stage.success) {
      process.stderr.write(`Error: Unknown stage "${options.stage}" (expected one of ${StageEnum.options.join(', ')})\n`)
      return EXIT_USAGE_ERROR
    }
    filter.stage = stage.data
  }
  if (options.status !== undefined) {
    const status = WorkItemStatusEnum.safeParse(options.status)
    if (!status.success) {
      process.stderr.write(
        `Error: Unknown status "${options.status}" (expected one of ${WorkItemStatusEnum.options.join(', ')})\n`,
      )
      return EXIT_USAGE_ERROR
    }
    filter.status = status.data
  }

  return withRuntime(options, logger, ({ coordinator }) => {
    const items = coordinator.listWorkItems(filter)
    if (options.outputFormat === 'json') {
      writeJsonOutput(
        'list',
        items.map(({ id, title, stage, status, retryCount, updatedAt }) => ({
          id,
          title,
          stage,
          status,
          retryCount,
          updatedAt,
        })),
        options.version ?? '0.0.0',
      )
    } else {
      process.stdout.write(renderWorkItemTable(items) + '\n')
    }
    return EXIT_SUCCESS
  })
}

export function registerListCommand(program: Command, version: string, projectRoot = process.cwd()): void {
  program
    .command('list')
    .description('List work items')
    .option('--stage <stage>', 'Only items in this stage')
    .option('--status <status>', 'Only items with this status')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { stage?: string; status?: string; outputFormat: string }) => {
      process.exitCode = await runListAction({
        projectRoot,
        ...globalOptions(program),
        stage: opts.stage,
        status: opts.status,
        outputFormat: parseOutputFormat(opts.outputFormat),
        version,
      })
    })
}
