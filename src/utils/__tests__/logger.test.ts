/**
 * Unit tests for src/utils/logger.ts: level selection and redaction.
 */

import { describe, it, expect, afterEach } from 'vitest'
import { Writable } from 'node:stream'
import pino from 'pino'
import { PINO_REDACT_PATHS } from '../masking.js'
import { createLogger, childLogger, setLogLevel } from '../logger.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** In-memory pino logger with the same options createLogger uses */
function createCapturingLogger(name: string): { logger: pino.Logger; getLines: () => string[] } {
  const lines: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding: string, callback: () => void) {
      lines.push(chunk.toString().trim())
      callback()
    },
  })

  const logger = pino(
    {
      name,
      level: 'trace',
      redact: PINO_REDACT_PATHS,
      formatters: {
        level(label) {
          return { level: label }
        },
      },
    },
    stream,
  )

  return { logger, getLines: () => lines }
}

function restoreEnv(key: string, value: string | undefined): void {
  if (value === undefined) {
    delete process.env[key]
  } else {
    process.env[key] = value
  }
}

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

describe('createLogger', () => {
  const originalLevel = process.env.LOG_LEVEL
  const originalNodeEnv = process.env.NODE_ENV

  afterEach(() => {
    restoreEnv('LOG_LEVEL', originalLevel)
    restoreEnv('NODE_ENV', originalNodeEnv)
  })

  it('honours an explicit level', () => {
    expect(createLogger('explicit', { level: 'error', pretty: false }).level).toBe('error')
  })

  it('takes LOG_LEVEL from the environment', () => {
    process.env.LOG_LEVEL = 'trace'
    expect(createLogger('from-env', { pretty: false }).level).toBe('trace')
  })

  it('uses info in production', () => {
    delete process.env.LOG_LEVEL
    process.env.NODE_ENV = 'production'
    expect(createLogger('prod', { pretty: false }).level).toBe('info')
  })

  it('stays at warn outside production and development', () => {
    delete process.env.LOG_LEVEL
    process.env.NODE_ENV = 'test'
    expect(createLogger('quiet', { pretty: false }).level).toBe('warn')
  })
})

// ---------------------------------------------------------------------------
// setLogLevel
// ---------------------------------------------------------------------------

describe('setLogLevel', () => {
  const originalLevel = process.env.LOG_LEVEL

  afterEach(() => {
    delete process.env.LOG_LEVEL
    setLogLevel('warn')
    restoreEnv('LOG_LEVEL', originalLevel)
  })

  it('retunes loggers created without an explicit level', () => {
    delete process.env.LOG_LEVEL
    const implicit = createLogger('implicit', { pretty: false })
    const explicit = createLogger('pinned', { level: 'error', pretty: false })

    setLogLevel('debug')

    expect(implicit.level).toBe('debug')
    expect(explicit.level).toBe('error')
  })

  it('leaves levels alone when LOG_LEVEL is set', () => {
    process.env.LOG_LEVEL = 'fatal'
    const log = createLogger('env-pinned', { pretty: false })

    setLogLevel('debug')

    expect(log.level).toBe('fatal')
  })
})

// ---------------------------------------------------------------------------
// childLogger
// ---------------------------------------------------------------------------

describe('childLogger', () => {
  it('adds bindings to every line', () => {
    const { logger, getLines } = createCapturingLogger('parent')
    const child = childLogger(logger, { workItemId: '20240301-100000-fix-null' })

    child.info('advanced')

    expect(JSON.parse(getLines()[0] ?? '{}')).toMatchObject({
      name: 'parent',
      level: 'info',
      workItemId: '20240301-100000-fix-null',
      msg: 'advanced',
    })
  })
})

// ---------------------------------------------------------------------------
// Redaction
// ---------------------------------------------------------------------------

describe('PINO_REDACT_PATHS', () => {
  it('redacts top-level and nested tokens', () => {
    const { logger, getLines } = createCapturingLogger('redact')

    logger.info({ token: 'test-secret', remote: { token: 'test-secret' } }, 'push')

    expect(JSON.parse(getLines()[0] ?? '{}')).toMatchObject({
      token: '[Redacted]',
      remote: { token: '[Redacted]' },
    })
  })

  it('redacts GitHub tokens passed through env', () => {
    const { logger, getLines } = createCapturingLogger('redact-env')

    logger.info({ env: { GITHUB_TOKEN: 'test-secret', PATH: '/usr/bin' } }, 'spawn')

    expect(JSON.parse(getLines()[0] ?? '{}')).toMatchObject({
      env: { GITHUB_TOKEN: '[Redacted]', PATH: '/usr/bin' },
    })
  })
})
