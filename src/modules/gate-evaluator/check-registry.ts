/**
 * Check Registry: built-in check types and custom check registration.
 *
 * Built-in types:
 * - command: runs an external tool and parses `file:line[:col]: message` output
 * - required-artifacts: requires committed artifacts of given kinds
 *
 * Custom types can be registered with `registerCheckType(type, factory)`.
 */

import { CheckUnavailableError } from '../../core/errors.js'
import { createCommandCheck } from './command-check.js'
import { createRequiredArtifactsCheck } from './required-artifacts-check.js'
import type { CapabilityCheck, CheckDefinition, CheckFactory } from './types.js'

// ---------------------------------------------------------------------------
// Registry state
// ---------------------------------------------------------------------------

const _registry: Map<string, CheckFactory> = new Map()

_registry.set('command', createCommandCheck)
_registry.set('required-artifacts', createRequiredArtifactsCheck)

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Register a custom check type (replaces an existing one of the same name).
 */
export function registerCheckType(type: string, factory: CheckFactory): void {
  _registry.set(type, factory)
}

/**
 * Build a check from its configured definition.
 *
 * @throws {CheckUnavailableError} for an unregistered type
 */
export function createCheck(id: string, definition: CheckDefinition): CapabilityCheck {
  const factory = _registry.get(definition.type)
  if (factory === undefined) {
    throw new CheckUnavailableError(id, `unknown check type "${definition.type}"`)
  }
  return factory(id, definition)
}

/**
 * Build every configured check, keyed by id.
 */
export function createChecks(definitions: Record<string, CheckDefinition>): Map<string, CapabilityCheck> {
  const checks = new Map<string, CapabilityCheck>()
  for (const [id, definition] of Object.entries(definitions)) {
    checks.set(id, createCheck(id, definition))
  }
  return checks
}

/**
 * Get all registered check type names.
 */
export function getRegisteredCheckTypes(): string[] {
  return Array.from(_registry.keys())
}
