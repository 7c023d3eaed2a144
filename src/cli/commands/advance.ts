/**
 * `waypoint advance <id>` command
 *
 * Completes the work item's current stage:
 *   plan / execute / document  records the given files as the stage output
 *   verify / test              runs the configured gate checks
 *   release                    packages the change for review
 *
 * Exit codes:
 *   0 - The transition was applied (including a return to an earlier stage)
 *   1 - System error, or the retry budget ran out and the item was aborted
 *   2 - Usage error (unknown item, wrong stage, missing file or precondition)
 */

import type { Command } from 'commander'
import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import type { ArtifactKind, Stage, StageOutput } from '../../core/types.js'
import { ArtifactKindEnum } from '../../persistence/schemas/pipeline.js'
import type { StageCoordinator } from '../../modules/stage-coordinator/stage-coordinator.js'
import type { AdvanceResult } from '../../modules/stage-coordinator/types.js'
import { createLogger } from '../../utils/logger.js'
import { renderAdvanceResult } from '../formatters/work-item-formatter.js'
import { parseOutputFormat, writeJsonOutput, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, EXIT_USAGE_ERROR, globalOptions, withRuntime, type ProjectOptions } from '../utils/project.js'

const logger = createLogger('advance-cmd')

/** Artifact kind used for `--file` when `--kind` is not given */
export const DEFAULT_OUTPUT_KIND: Partial<Record<Stage, ArtifactKind>> = {
  plan: 'plan',
  execute: 'report',
  document: 'notes',
}

export interface AdvanceActionOptions extends ProjectOptions {
  workItemId: string
  files: string[]
  kind?: string
  summary?: string
  criteria?: string[]
  requiredDocs?: string[]
  actor?: string
  outputFormat: OutputFormat
  version?: string
}

async function buildStageOutput(
  stage: Stage,
  files: string[],
  kind: ArtifactKind | undefined,
  options: AdvanceActionOptions,
): Promise<StageOutput> {
  const artifactKind = kind ?? DEFAULT_OUTPUT_KIND[stage] ?? 'notes'
  const artifacts = await Promise.all(
    files.map(async (file) => ({ kind: artifactKind, content: await readFile(file) })),
  )
  return {
    artifacts,
    ...(options.summary !== undefined && { summary: options.summary }),
    ...(options.criteria !== undefined && { acceptanceCriteria: options.criteria }),
    ...(options.requiredDocs !== undefined && { requiredDocs: options.requiredDocs }),
  }
}

async function completeStage(
  coordinator: StageCoordinator,
  options: AdvanceActionOptions,
  files: string[],
  kind: ArtifactKind | undefined,
): Promise<AdvanceResult> {
  const { workItemId, actor } = options
  const stage = coordinator.getWorkItem(workItemId).stage

  switch (stage) {
    case 'verify':
    case 'test':
      return coordinator.runGate(workItemId, actor)
    case 'release':
      return coordinator.release(workItemId, actor)
    default: {
      // Terminal stages are rejected by the coordinator
      const output = await buildStageOutput(stage, files, kind, options)
      return coordinator.advance(workItemId, { type: 'output', stage, output }, actor)
    }
  }
}

export async function runAdvanceAction(options: AdvanceActionOptions): Promise<number> {
  let kind: ArtifactKind | undefined
  if (options.kind !== undefined) {
    const parsed = ArtifactKindEnum.safeParse(options.kind)
    if (!parsed.success) {
      process.stderr.write(
        `Error: Unknown artifact kind "${options.kind}" (expected one of ${ArtifactKindEnum.options.join(', ')})\n`,
      )
      return EXIT_USAGE_ERROR
    }
    kind = parsed.data
  }

  const files = options.files.map((file) => resolve(options.projectRoot, file))
  const missing = files.find((file) => !existsSync(file))
  if (missing !== undefined) {
    process.stderr.write(`Error: File not found: ${missing}\n`)
    return EXIT_USAGE_ERROR
  }

  return withRuntime(options, logger, async ({ coordinator }) => {
    const result = await completeStage(coordinator, options, files, kind)
    if (options.outputFormat === 'json') {
      writeJsonOutput(
        'advance',
        {
          workItemId: result.item.id,
          from: result.from,
          to: result.to,
          outcome: result.outcome,
          status: result.item.status,
          retryCount: result.item.retryCount,
          findings: result.findings,
          note: result.note ?? null,
        },
        options.version ?? '0.0.0',
      )
    } else {
      process.stdout.write(renderAdvanceResult(result) + '\n')
    }
    return EXIT_SUCCESS
  })
}

export function registerAdvanceCommand(program: Command, version: string, projectRoot = process.cwd()): void {
  program
    .command('advance <id>')
    .description("Complete the work item's current stage (record output, run the gate, or release)")
    .option('--file <paths...>', 'Files recorded as the stage output (plan, execute, document)')
    .option('--kind <kind>', 'Artifact kind for --file (default: plan, report or notes by stage)')
    .option('--summary <text>', 'One-line summary kept in the history')
    .option('--criteria <names...>', 'Acceptance criteria (plan only)')
    .option('--require-doc <refs...>', 'Docs later stages must consult (plan only)')
    .option('--actor <name>', 'Who is completing the stage')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(
      async (
        workItemId: string,
        opts: {
          file?: string[]
          kind?: string
          summary?: string
          criteria?: string[]
          requireDoc?: string[]
          actor?: string
          outputFormat: string
        },
      ) => {
        process.exitCode = await runAdvanceAction({
          projectRoot,
        ...globalOptions(program),
          workItemId,
          files: opts.file ?? [],
          kind: opts.kind,
          summary: opts.summary,
          criteria: opts.criteria,
          requiredDocs: opts.requireDoc,
          actor: opts.actor,
          outputFormat: parseOutputFormat(opts.outputFormat),
          version,
        })
      },
    )
}
