/**
 * `waypoint create <title>` command
 *
 * Creates a work item in `plan` and prints its id.
 */

import type { Command } from 'commander'
import { createLogger } from '../../utils/logger.js'
import { parseOutputFormat, writeJsonOutput, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, globalOptions, withRuntime, type ProjectOptions } from '../utils/project.js'

const logger = createLogger('create-cmd')

export interface CreateActionOptions extends ProjectOptions {
  title: string
  problem?: string
  slug?: string
  actor?: string
  outputFormat: OutputFormat
  version?: string
}

export async function runCreateAction(options: CreateActionOptions): Promise<number> {
  return withRuntime(options, logger, ({ coordinator }) => {
    const item = coordinator.createWorkItem({
      title: options.title,
      problemStatement: options.problem,
      slug: options.slug,
      actor: options.actor,
    })

    if (options.outputFormat === 'json') {
      writeJsonOutput('create', item, options.version ?? '0.0.0')
    } else {
      process.stdout.write(`Created ${item.id}\n`)
    }
    return EXIT_SUCCESS
  })
}

export function registerCreateCommand(program: Command, version: string, projectRoot = process.cwd()): void {
  program
    .command('create <title>')
    .description('Create a work item in the plan stage')
    .option('-p, --problem <text>', 'Problem statement')
    .option('--slug <slug>', 'Slug used in the id instead of the title')
    .option('--actor <name>', 'Who is creating the item')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(
      async (
        title: string,
        opts: { problem?: string; slug?: string; actor?: string; outputFormat: string },
      ) => {
        process.exitCode = await runCreateAction({
          projectRoot,
        ...globalOptions(program),
          title,
          problem: opts.problem,
          slug: opts.slug,
          actor: opts.actor,
          outputFormat: parseOutputFormat(opts.outputFormat),
          version,
        })
      },
    )
}
