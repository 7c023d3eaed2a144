/**
 * `waypoint recover` command
 *
 * Reports the work items still in flight and any stored artifacts that no
 * committed transition references. Changes nothing.
 */

import type { Command } from 'commander'
import { recoverPipelineState } from '../../recovery/pipeline-recovery.js'
import { formatArtifactRef } from '../../modules/artifact-store/artifact-ref.js'
import { createLogger } from '../../utils/logger.js'
import { renderRecoveryReport } from '../formatters/work-item-formatter.js'
import { parseOutputFormat, writeJsonOutput, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, globalOptions, withRuntime, type ProjectOptions } from '../utils/project.js'

const logger = createLogger('recover-cmd')

export interface RecoverActionOptions extends ProjectOptions {
  outputFormat: OutputFormat
  version?: string
}

export async function runRecoverAction(options: RecoverActionOptions): Promise<number> {
  return withRuntime(options, logger, ({ db }) => {
    const report = recoverPipelineState(db)
    if (options.outputFormat === 'json') {
      writeJsonOutput(
        'recover',
        {
          inFlight: report.inFlight,
          orphanedArtifacts: report.orphanedArtifacts.map((meta) => formatArtifactRef(meta)),
        },
        options.version ?? '0.0.0',
      )
    } else {
      process.stdout.write(renderRecoveryReport(report) + '\n')
    }
    return EXIT_SUCCESS
  })
}

export function registerRecoverCommand(program: Command, version: string, projectRoot = process.cwd()): void {
  program
    .command('recover')
    .description('Report in-flight work items and uncommitted artifacts after a crash')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { outputFormat: string }) => {
      process.exitCode = await runRecoverAction({
        projectRoot,
        ...globalOptions(program),
        outputFormat: parseOutputFormat(opts.outputFormat),
        version,
      })
    })
}
