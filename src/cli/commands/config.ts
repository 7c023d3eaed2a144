/**
 * `waypoint config` command group
 *
 * Subcommands:
 *   - `waypoint config show`              display the merged configuration
 *   - `waypoint config get <key>`         print one value by dot-notation key
 *   - `waypoint config set <key> <value>` update the project config file
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { ConfigError } from '../../core/errors.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { createLogger } from '../../utils/logger.js'
import { maskSecrets } from '../../utils/masking.js'
import { EXIT_ERROR, EXIT_SUCCESS, EXIT_USAGE_ERROR, projectConfigDir } from '../utils/project.js'

const logger = createLogger('config-cmd')

export interface ConfigActionOptions {
  projectRoot: string
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
}

export function coerceValue(raw: string): unknown {
  const trimmed = raw.trim()
  if (trimmed === 'true') return true
  if (trimmed === 'false') return false
  if (/^-?\d+$/.test(trimmed)) return parseInt(trimmed, 10)
  if (/^-?\d*\.\d+$/.test(trimmed)) return parseFloat(trimmed)
  return trimmed
}

async function loadSystem(opts: ConfigActionOptions): Promise<ConfigSystem | number> {
  const system = createConfigSystem({
    projectConfigDir: projectConfigDir(opts.projectRoot),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })
  try {
    await system.load()
    return system
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return EXIT_USAGE_ERROR
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`Error: ${message}\n`)
    return EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export async function runConfigShow(opts: ConfigActionOptions & { format?: 'yaml' | 'json' }): Promise<number> {
  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  const config = system.getConfig()
  const rendered = opts.format === 'json' ? JSON.stringify(config, null, 2) + '\n' : yaml.dump(config)
  // Check definitions may carry credentials in their env
  process.stdout.write(maskSecrets(rendered))
  return EXIT_SUCCESS
}

export async function runConfigGet(key: string, opts: ConfigActionOptions): Promise<number> {
  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  const value = system.get(key)
  if (value === undefined) {
    process.stderr.write(`Error: Unknown config key: ${key}\n`)
    return EXIT_USAGE_ERROR
  }
  process.stdout.write(
    (typeof value === 'object' && value !== null ? yaml.dump(value) : `${String(value)}\n`),
  )
  return EXIT_SUCCESS
}

export async function runConfigSet(key: string, rawValue: string, opts: ConfigActionOptions): Promise<number> {
  if (key.trim() === '') {
    process.stderr.write('Error: key must not be empty\n')
    return EXIT_USAGE_ERROR
  }

  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  const value = coerceValue(rawValue)
  try {
    await system.set(key, value)
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return EXIT_USAGE_ERROR
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to update configuration')
    process.stderr.write(`Error: ${message}\n`)
    return EXIT_ERROR
  }

  process.stdout.write(`Set ${key} = ${JSON.stringify(value)}\n`)
  return EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

export function registerConfigCommand(program: Command, _version: string, projectRoot = process.cwd()): void {
  const config = program.command('config').description('Show or change configuration')

  config
    .command('show')
    .description('Display the merged configuration')
    .option('--format <format>', 'yaml (default) or json', 'yaml')
    .action(async (opts: { format: string }) => {
      process.exitCode = await runConfigShow({ projectRoot, format: opts.format === 'json' ? 'json' : 'yaml' })
    })

  config
    .command('get <key>')
    .description('Print one configuration value (dot-notation key)')
    .action(async (key: string) => {
      process.exitCode = await runConfigGet(key, { projectRoot })
    })

  config
    .command('set <key> <value>')
    .description('Set a value in the project config file')
    .action(async (key: string, value: string) => {
      process.exitCode = await runConfigSet(key, value, { projectRoot })
    })
}
