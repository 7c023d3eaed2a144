import { describe, it, expect } from 'vitest'
import {
  NEXT_STAGE,
  isAllowedTransition,
  isGateStage,
  isReturnEdge,
  isTerminal,
  statusForStage,
} from '../transitions.js'

describe('stage graph', () => {
  it('follows the forward path to done', () => {
    const path: string[] = []
    let stage = NEXT_STAGE.plan
    while (stage !== null) {
      path.push(stage)
      stage = NEXT_STAGE[stage]
    }
    expect(path).toEqual(['execute', 'verify', 'test', 'document', 'release', 'done'])
  })

  it('allows forward edges, return edges and abort', () => {
    expect(isAllowedTransition('verify', 'test')).toBe(true)
    expect(isAllowedTransition('test', 'execute')).toBe(true)
    expect(isAllowedTransition('document', 'plan')).toBe(true)
    expect(isAllowedTransition('release', 'aborted')).toBe(true)
  })

  it('rejects skips, other backward moves and anything from a terminal stage', () => {
    expect(isAllowedTransition('plan', 'verify')).toBe(false)
    expect(isAllowedTransition('release', 'document')).toBe(false)
    expect(isAllowedTransition('verify', 'plan')).toBe(false)
    expect(isAllowedTransition('done', 'aborted')).toBe(false)
    expect(isAllowedTransition('aborted', 'plan')).toBe(false)
  })

  it('classifies stages', () => {
    expect(isTerminal('done')).toBe(true)
    expect(isTerminal('release')).toBe(false)
    expect(isGateStage('test')).toBe(true)
    expect(isGateStage('document')).toBe(false)
    expect(isReturnEdge('execute', 'plan')).toBe(true)
    expect(isReturnEdge('plan', 'execute')).toBe(false)
  })

  it.each([
    ['plan', 'planning'],
    ['execute', 'in_progress'],
    ['verify', 'in_progress'],
    ['release', 'ready_for_next'],
    ['done', 'complete'],
    ['aborted', 'aborted'],
  ] as const)('%s implies %s', (stage, status) => {
    expect(statusForStage(stage)).toBe(status)
  })
})
