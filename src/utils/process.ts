/**
 * Subprocess helper shared by command checks and the release packager.
 *
 * All external tools run through child_process.spawn; output is collected,
 * never streamed to the terminal.
 */

import { spawn } from 'node:child_process'
import { createLogger } from './logger.js'

const logger = createLogger('utils:process')

/** Combined stdout+stderr is truncated past this many characters */
const MAX_OUTPUT_CHARS = 1_000_000

export interface SpawnOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  /** Kills the process with SIGTERM when aborted */
  signal?: AbortSignal
}

export interface SpawnResult {
  stdout: string
  stderr: string
  /** Exit code; 1 when the process was killed by a signal */
  code: number
  /** Set when the process could not be started (e.g. 'ENOENT') */
  spawnError?: string
}

/**
 * Spawn `command` with `args` and wait for it to exit.
 * Never rejects: start failures are reported through `spawnError`.
 */
export function spawnProcess(
  command: string,
  args: string[],
  options: SpawnOptions = {},
): Promise<SpawnResult> {
  return new Promise((resolve) => {
    logger.debug({ command, args, cwd: options.cwd }, 'spawnProcess')

    if (options.signal?.aborted === true) {
      resolve({ stdout: '', stderr: 'aborted before start', code: 1 })
      return
    }

    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    let stdout = ''
    let stderr = ''
    let settled = false

    const onAbort = (): void => {
      proc.kill('SIGTERM')
    }
    options.signal?.addEventListener('abort', onAbort, { once: true })

    const finish = (result: SpawnResult): void => {
      if (settled) return
      settled = true
      options.signal?.removeEventListener('abort', onAbort)
      resolve(result)
    }

    proc.stdout.on('data', (chunk: Buffer) => {
      if (stdout.length < MAX_OUTPUT_CHARS) stdout += chunk.toString()
    })

    proc.stderr.on('data', (chunk: Buffer) => {
      if (stderr.length < MAX_OUTPUT_CHARS) stderr += chunk.toString()
    })

    proc.on('close', (code) => {
      finish({ stdout: stdout.trim(), stderr: stderr.trim(), code: code ?? 1 })
    })

    proc.on('error', (err: NodeJS.ErrnoException) => {
      finish({ stdout: '', stderr: err.message, code: 1, spawnError: err.code ?? 'UNKNOWN' })
    })
  })
}
