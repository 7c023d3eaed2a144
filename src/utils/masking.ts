/**
 * Secret masking utilities for logs and persisted check output.
 *
 * Capability checks run arbitrary tools whose output is stored verbatim in
 * verdict artifacts; known credential shapes are scrubbed before that happens.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Regex patterns that identify credential values in free text.
 */
export const SECRET_PATTERNS: RegExp[] = [
  // GitHub tokens: ghp_, gho_, ghu_, ghs_, ghr_
  /gh[pousr]_[A-Za-z0-9]{36,}/g,
  // GitHub fine-grained PATs
  /github_pat_[A-Za-z0-9_]{22,}/g,
  // AWS access key ids
  /AKIA[0-9A-Z]{16}/g,
]

/** `password=…`, `token: …` style assignments; the key is kept, the value masked */
const ASSIGNMENT_PATTERN = /\b(password|passwd|secret|token|api[_-]?key)(\s*[=:]\s*)([^\s'"]+)/gi

/**
 * Pino redaction paths for credential fields.
 * Pass this array to the `pino({ redact: ... })` option.
 */
export const PINO_REDACT_PATHS: string[] = [
  'token',
  '*.token',
  'password',
  '*.password',
  'env.GITHUB_TOKEN',
  'env.GH_TOKEN',
  'headers.authorization',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

/**
 * Replace recognized secrets in a string with `***`.
 *
 * Best-effort: it does NOT guarantee removal of every possible secret format.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of SECRET_PATTERNS) {
    // Reset lastIndex in case the regex is reused (global flag)
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  ASSIGNMENT_PATTERN.lastIndex = 0
  return result.replace(ASSIGNMENT_PATTERN, (_match, key: string, sep: string) => `${key}${sep}${MASKED_VALUE}`)
}
