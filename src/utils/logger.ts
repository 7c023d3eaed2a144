/**
 * Logger utility for Waypoint
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from './masking.js'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'development') return 'debug'
  // Tests and plain CLI use: keep stderr quiet unless asked
  return 'warn'
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  // pino-pretty runs in a worker thread; only start it when explicitly in development
  return process.env.NODE_ENV === 'development'
}

/** Loggers created without an explicit level; setLogLevel() retunes them */
const _defaultLevelLoggers: pino.Logger[] = []

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(
  name: string,
  options: LoggerOptions = {}
): pino.Logger {
  const level = options.level ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()
  const track = (instance: pino.Logger): pino.Logger => {
    if (options.level === undefined) _defaultLevelLoggers.push(instance)
    return instance
  }

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  if (pretty) {
    // pino-pretty is a devDependency; only use in non-production environments.
    return track(pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }))
  }

  // Logs go to stderr so CLI stdout stays machine-readable
  return track(pino(baseOptions, pino.destination(2)))
}

/**
 * Set the level of every logger that was created without an explicit one.
 * `LOG_LEVEL` in the environment still wins.
 */
export function setLogLevel(level: string): void {
  if (process.env.LOG_LEVEL) return
  for (const instance of _defaultLevelLoggers) instance.level = level
}

/** Root application logger */
export const logger = createLogger('waypoint')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
