/**
 * `waypoint artifacts <id>` command
 *
 * Lists a work item's stored artifacts (marking which ones a committed
 * transition references), or prints one artifact's content with --show.
 */

import type { Command } from 'commander'
import { StageEnum } from '../../persistence/schemas/pipeline.js'
import type { Stage } from '../../core/types.js'
import { formatArtifactRef, parseArtifactRef } from '../../modules/artifact-store/artifact-ref.js'
import { committedArtifacts } from '../../modules/stage-coordinator/stage-coordinator-impl.js'
import { createLogger } from '../../utils/logger.js'
import { renderArtifactTable } from '../formatters/work-item-formatter.js'
import { parseOutputFormat, writeJsonOutput, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, EXIT_USAGE_ERROR, globalOptions, withRuntime, type ProjectOptions } from '../utils/project.js'

const logger = createLogger('artifacts-cmd')

export interface ArtifactsActionOptions extends ProjectOptions {
  workItemId: string
  stage?: string
  /** Text ref (`<id>/<stage>/<kind>/<sequence>`) to print */
  show?: string
  outputFormat: OutputFormat
  version?: string
}

export async function runArtifactsAction(options: ArtifactsActionOptions): Promise<number> {
  let stage: Stage | undefined
  if (options.stage !== undefined) {
    const parsed = StageEnum.safeParse(options.stage)
    if (!parsed.success) {
      process.stderr.write(`Error: Unknown stage "${options.stage}"\n`)
      return EXIT_USAGE_ERROR
    }
    stage = parsed.data
  }

  const showRef = options.show !== undefined ? parseArtifactRef(options.show) : undefined
  if (showRef === null) {
    process.stderr.write(`Error: Malformed artifact ref "${options.show ?? ''}" (expected <id>/<stage>/<kind>/<sequence>)\n`)
    return EXIT_USAGE_ERROR
  }

  return withRuntime(options, logger, ({ coordinator, store }) => {
    const item = coordinator.getWorkItem(options.workItemId)

    if (showRef !== undefined) {
      if (showRef.workItemId !== item.id) {
        process.stderr.write(`Error: Artifact ${formatArtifactRef(showRef)} does not belong to ${item.id}\n`)
        return EXIT_USAGE_ERROR
      }
      process.stdout.write(store.get(showRef))
      return EXIT_SUCCESS
    }

    const artifacts = store.list(item.id, stage)
    const committed = new Set(committedArtifacts(item).map((ref) => formatArtifactRef(ref)))

    if (options.outputFormat === 'json') {
      writeJsonOutput(
        'artifacts',
        artifacts.map((meta) => ({
          ref: formatArtifactRef(meta),
          ...meta,
          committed: committed.has(formatArtifactRef(meta)),
        })),
        options.version ?? '0.0.0',
      )
    } else {
      process.stdout.write(renderArtifactTable(artifacts, committed) + '\n')
    }
    return EXIT_SUCCESS
  })
}

export function registerArtifactsCommand(program: Command, version: string, projectRoot = process.cwd()): void {
  program
    .command('artifacts <id>')
    .description("List a work item's artifacts or print one")
    .option('--stage <stage>', 'Only artifacts written under this stage')
    .option('--show <ref>', 'Print the content of one artifact')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (workItemId: string, opts: { stage?: string; show?: string; outputFormat: string }) => {
      process.exitCode = await runArtifactsAction({
        projectRoot,
        ...globalOptions(program),
        workItemId,
        stage: opts.stage,
        show: opts.show,
        outputFormat: parseOutputFormat(opts.outputFormat),
        version,
      })
    })
}
