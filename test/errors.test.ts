/**
 * Error hierarchy tests
 */

import { describe, it, expect } from 'vitest'
import {
  CheckTimedOutError,
  CheckUnavailableError,
  ConfigError,
  ErrorKind,
  GateCancelledError,
  InvalidTransitionError,
  NotFoundError,
  PreconditionMissingError,
  ReleaseError,
  RetryBudgetExhaustedError,
  WaypointError,
} from '../src/core/errors.js'

describe('WaypointError', () => {
  it('carries code and context', () => {
    const error = new WaypointError('boom', 'CUSTOM', { detail: 1 })
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('WaypointError')
    expect(error.code).toBe('CUSTOM')
    expect(error.context).toEqual({ detail: 1 })
  })

  it('serializes to JSON with name, message, code and context', () => {
    const json = new ConfigError('bad key', { key: 'x' }).toJSON()
    expect(json).toMatchObject({ name: 'ConfigError', message: 'bad key', code: 'CONFIG_ERROR', context: { key: 'x' } })
  })
})

describe('error kinds', () => {
  it('builds retry budget messages from the counts', () => {
    const error = new RetryBudgetExhaustedError('item-1', 4, 3)
    expect(error.message).toBe('Retry budget exhausted for item-1: 4 blocking verdicts, max_retries=3')
    expect(error.code).toBe(ErrorKind.RetryBudgetExhausted)
    expect(error.context).toEqual({ workItemId: 'item-1', retryCount: 4, maxRetries: 3 })
  })

  it('names the check in timeout and unavailable errors', () => {
    expect(new CheckTimedOutError('unit', 500).message).toBe('Check "unit" timed out after 500ms')
    expect(new CheckUnavailableError('lint', 'not registered').message).toBe('Check "lint" unavailable: not registered')
  })

  it('formats not-found and cancellation messages', () => {
    expect(new NotFoundError('Work item', 'abc').message).toBe('Work item not found: abc')
    expect(new GateCancelledError('abc', 'verify', 'aborted').message).toBe(
      'Gate evaluation for abc (verify) cancelled: aborted',
    )
  })

  it.each([
    [new PreconditionMissingError('x'), 'PreconditionMissingError', 'PRECONDITION_MISSING'],
    [new InvalidTransitionError('x'), 'InvalidTransitionError', 'INVALID_TRANSITION'],
    [new ReleaseError('x'), 'ReleaseError', 'RELEASE_ERROR'],
    [new ConfigError('x'), 'ConfigError', 'CONFIG_ERROR'],
  ])('%s is a WaypointError', (error, name, code) => {
    expect(error).toBeInstanceOf(WaypointError)
    expect(error.name).toBe(name)
    expect(error.code).toBe(code)
  })
})
