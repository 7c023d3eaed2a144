/**
 * Shared plumbing for commands that operate on a Waypoint project:
 * locating `.waypoint/`, loading configuration, opening the runtime and
 * mapping errors to exit codes.
 */

import { existsSync } from 'node:fs'
import { join } from 'node:path'
import type { Command } from 'commander'
import type { Logger } from 'pino'
import { ErrorKind, WaypointError } from '../../core/errors.js'
import { createPipelineRuntime } from '../../core/pipeline-runtime-impl.js'
import type { PipelineRuntime, PipelineRuntimeConfig } from '../../core/pipeline-runtime.js'
import { CONFIG_DIR_NAME, createConfigSystem } from '../../modules/config/config-system-impl.js'
import { LogLevelSchema } from '../../modules/config/config-schema.js'
import type { LogLevelValue, WaypointConfig } from '../../modules/config/config-schema.js'
import { setLogLevel } from '../../utils/logger.js'

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_USAGE_ERROR = 2

/** Error kinds caused by what the operator asked for, not by the system */
const USAGE_ERROR_KINDS: ReadonlySet<string> = new Set([
  ErrorKind.NotFound,
  ErrorKind.InvalidTransition,
  ErrorKind.PreconditionMissing,
  ErrorKind.Config,
])

export function exitCodeFor(err: unknown): number {
  if (err instanceof WaypointError && USAGE_ERROR_KINDS.has(err.code)) {
    return EXIT_USAGE_ERROR
  }
  return EXIT_ERROR
}

/**
 * Print `Error: <message>` to stderr and return the matching exit code.
 * Unexpected errors are also logged with their stack.
 */
export function reportError(err: unknown, logger: Logger): number {
  const message = err instanceof Error ? err.message : String(err)
  process.stderr.write(`Error: ${message}\n`)
  const code = exitCodeFor(err)
  if (code === EXIT_ERROR) logger.error({ err }, 'Command failed')
  return code
}

// ---------------------------------------------------------------------------
// Project options
// ---------------------------------------------------------------------------

export interface ProjectOptions {
  projectRoot: string
  /** Global config directory (default ~/.waypoint) */
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
  /** `--log-level`; wins over every config layer */
  logLevel?: LogLevelValue
  /** Collaborator replacements, used by tests */
  runtime?: Pick<PipelineRuntimeConfig, 'packager' | 'synthesizer' | 'now' | 'databasePath'>
}

export function projectConfigDir(projectRoot: string): string {
  return join(projectRoot, CONFIG_DIR_NAME)
}

/** Options given before the subcommand, e.g. `waypoint --log-level debug list` */
export function globalOptions(program: Command): Pick<ProjectOptions, 'logLevel'> {
  const logLevel = LogLevelSchema.optional().parse(program.opts().logLevel)
  return logLevel !== undefined ? { logLevel } : {}
}

export async function loadProjectConfig(options: ProjectOptions): Promise<WaypointConfig> {
  const system = createConfigSystem({
    projectConfigDir: projectConfigDir(options.projectRoot),
    ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }),
    ...(options.env !== undefined && { env: options.env }),
    ...(options.logLevel !== undefined && { cliOverrides: { global: { log_level: options.logLevel } } }),
  })
  await system.load()
  return system.getConfig()
}

/**
 * Open the project's runtime, run `fn`, and always shut the runtime down.
 * Errors thrown by `fn` are reported and turned into an exit code.
 */
export async function withRuntime(
  options: ProjectOptions,
  logger: Logger,
  fn: (runtime: PipelineRuntime) => Promise<number> | number,
): Promise<number> {
  const configDir = projectConfigDir(options.projectRoot)
  if (!existsSync(configDir)) {
    process.stderr.write(`Error: No Waypoint project found at ${configDir}. Run 'waypoint init' first.\n`)
    return EXIT_ERROR
  }

  let runtime: PipelineRuntime
  try {
    const config = await loadProjectConfig(options)
    setLogLevel(config.global.log_level)
    runtime = await createPipelineRuntime({
      projectRoot: options.projectRoot,
      config,
      ...options.runtime,
    })
  } catch (err) {
    return reportError(err, logger)
  }

  try {
    return await fn(runtime)
  } catch (err) {
    return reportError(err, logger)
  } finally {
    await runtime.shutdown()
  }
}
