/**
 * `waypoint init` command
 *
 * Creates `.waypoint/config.yaml` with the built-in defaults and the
 * pipeline database.
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error (could not write files)
 *   2 - Already initialized (without --force)
 */

import type { Command } from 'commander'
import { existsSync } from 'node:fs'
import { mkdir, writeFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import yaml from 'js-yaml'
import { CONFIG_FILE_NAME } from '../../modules/config/config-system-impl.js'
import { DEFAULT_CONFIG } from '../../modules/config/defaults.js'
import { createLogger } from '../../utils/logger.js'
import {
  EXIT_ERROR,
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  projectConfigDir,
  withRuntime,
  type ProjectOptions,
} from '../utils/project.js'

const logger = createLogger('init-cmd')

const CONFIG_HEADER = `# Waypoint configuration
# Generated by \`waypoint init\`.
#
# Gate checks are declared under \`checks\` and listed per gate stage, e.g.
#
#   stages:
#     verify:
#       checks: [lint]
#   checks:
#     lint:
#       type: command
#       command: npx
#       args: [eslint, --format, unix, src]
#
# With no checks listed, a gate passes vacuously.

`

/** Keeps the pipeline database out of version control */
export const STATE_GITIGNORE = '# Waypoint pipeline state\n*.db\n*.db-wal\n*.db-shm\n'

export interface InitActionOptions extends ProjectOptions {
  /** Overwrite an existing config file */
  force: boolean
}

export async function runInitAction(options: InitActionOptions): Promise<number> {
  const projectRoot = resolve(options.projectRoot)
  const configDir = projectConfigDir(projectRoot)
  const configPath = join(configDir, CONFIG_FILE_NAME)

  if (existsSync(configPath) && !options.force) {
    process.stdout.write(`Waypoint is already initialized at ${configDir} (use --force to overwrite)\n`)
    return EXIT_USAGE_ERROR
  }

  try {
    await mkdir(configDir, { recursive: true })
    await writeFile(configPath, CONFIG_HEADER + yaml.dump(DEFAULT_CONFIG), 'utf-8')
    await writeFile(join(configDir, '.gitignore'), STATE_GITIGNORE, 'utf-8')
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to write config file')
    process.stderr.write(`Error: failed to write configuration: ${message}\n`)
    return EXIT_ERROR
  }

  // Opening the runtime creates the database and applies migrations
  const exitCode = await withRuntime({ ...options, projectRoot }, logger, () => EXIT_SUCCESS)
  if (exitCode !== EXIT_SUCCESS) return exitCode

  process.stdout.write(
    `Initialized Waypoint in ${configDir}\n` +
      `  Config:   ${configPath}\n` +
      `\nNext: waypoint create "<title>"\n`,
  )
  return EXIT_SUCCESS
}

export function registerInitCommand(program: Command, _version: string, projectRoot = process.cwd()): void {
  program
    .command('init')
    .description('Initialize Waypoint in the current directory (creates .waypoint/config.yaml)')
    .option('-f, --force', 'Overwrite an existing configuration', false)
    .action(async (opts: { force: boolean }) => {
      process.exitCode = await runInitAction({ projectRoot, force: opts.force })
    })
}
