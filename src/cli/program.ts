/**
 * Builds the `waypoint` Commander program.
 */

import { Command, Option } from 'commander'
import { readFile } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { LogLevelSchema } from '../modules/config/config-schema.js'
import { registerAbortCommand } from './commands/abort.js'
import { registerAdvanceCommand } from './commands/advance.js'
import { registerArtifactsCommand } from './commands/artifacts.js'
import { registerConfigCommand } from './commands/config.js'
import { registerCreateCommand } from './commands/create.js'
import { registerInitCommand } from './commands/init.js'
import { registerListCommand } from './commands/list.js'
import { registerOverrideCommand } from './commands/override.js'
import { registerRecoverCommand } from './commands/recover.js'
import { registerStatusCommand } from './commands/status.js'

const PackageJsonSchema = z.object({ name: z.string().optional(), version: z.string().optional() })

/** Read the version from package.json beside the sources or the build output */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  // src/cli and dist/cli both sit two levels below the package root
  for (const pkgPath of [resolve(here, '../../package.json'), resolve(here, '../package.json')]) {
    const content = await readFile(pkgPath, 'utf-8').catch(() => null)
    if (content === null) continue
    const parsed = PackageJsonSchema.safeParse(JSON.parse(content))
    if (parsed.success && parsed.data.name === 'waypoint' && parsed.data.version !== undefined) {
      return parsed.data.version
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(projectRoot = process.cwd()): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()
  program
    .name('waypoint')
    .description('Waypoint: drive work items from plan to release through gated stages')
    .version(version, '-v, --version', 'Output the current version')
    .addOption(new Option('--log-level <level>', 'Override global.log_level for this run').choices(LogLevelSchema.options))

  registerInitCommand(program, version, projectRoot)
  registerConfigCommand(program, version, projectRoot)
  registerCreateCommand(program, version, projectRoot)
  registerListCommand(program, version, projectRoot)
  registerStatusCommand(program, version, projectRoot)
  registerAdvanceCommand(program, version, projectRoot)
  registerOverrideCommand(program, version, projectRoot)
  registerAbortCommand(program, version, projectRoot)
  registerArtifactsCommand(program, version, projectRoot)
  registerRecoverCommand(program, version, projectRoot)

  return program
}
