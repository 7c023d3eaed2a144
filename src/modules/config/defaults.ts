/**
 * Built-in default values for the Waypoint configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type { GlobalSettings, PipelineSettings, ReleaseSettings, WaypointConfig } from './config-schema.js'

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'warn',
  database_path: '.waypoint/waypoint.db',
  knowledge_base_dir: 'docs/knowledge-base',
}

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  max_retries: 3,
  check_timeout_ms: 120_000,
}

export const DEFAULT_RELEASE_SETTINGS: ReleaseSettings = {
  remote: 'origin',
  base_branch: 'main',
  branch_prefix: 'waypoint/',
  open_review: true,
}

// ---------------------------------------------------------------------------
// Full default config document
// ---------------------------------------------------------------------------

/** No checks are configured out of the box: both gates pass vacuously */
export const DEFAULT_CONFIG: WaypointConfig = {
  config_format_version: '1',
  global: DEFAULT_GLOBAL_SETTINGS,
  pipeline: DEFAULT_PIPELINE_SETTINGS,
  stages: {
    verify: { checks: [] },
    test: { checks: [] },
  },
  checks: {},
  release: DEFAULT_RELEASE_SETTINGS,
}
