/**
 * GitReleasePackager: branch, commit, push, and optionally open a pull
 * request with the `gh` CLI.
 *
 * Steps run in order and stop at the first failure:
 *  1. git checkout -b <branch_prefix><work item id> (or checkout, when the
 *     branch survives an earlier failed attempt)
 *  2. git add -A, excluding the `.waypoint/` state directory
 *  3. git commit, skipped when nothing is staged and HEAD already carries
 *     this item's `Work-Item:` trailer
 *  4. git rev-parse HEAD
 *  5. git push -u <remote> <branch>
 *  6. gh pr create (when open_review is set)
 *
 * Every step can be repeated, so a failed release can be retried.
 */

import { ReleaseError } from '../../core/errors.js'
import type { WorkItem } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { spawnProcess } from '../../utils/process.js'
import type { SpawnOptions, SpawnResult } from '../../utils/process.js'
import type { ReleasePackage, ReleasePackager } from './release-packager.js'

const logger = createLogger('release-packager')

/** Pathspec keeping the coordinator's own state out of release commits */
export const STATE_DIR_EXCLUDE = ':(exclude).waypoint'

export type CommandRunner = (command: string, args: string[], options?: SpawnOptions) => Promise<SpawnResult>

export interface GitReleasePackagerOptions {
  /** Repository working directory */
  cwd: string
  remote: string
  baseBranch: string
  branchPrefix: string
  openReview: boolean
  /** Defaults to spawning real processes */
  run?: CommandRunner
}

export function commitTrailer(item: WorkItem): string {
  return `Work-Item: ${item.id}`
}

export function buildCommitMessage(item: WorkItem): string {
  const body = item.problemStatement === '' ? '' : `\n\n${item.problemStatement}`
  return `${item.title}${body}\n\n${commitTrailer(item)}`
}

export function buildReviewBody(item: WorkItem): string {
  const lines = [item.problemStatement === '' ? item.title : item.problemStatement, '']
  const criteria = Object.entries(item.acceptanceCriteria)
  if (criteria.length > 0) {
    lines.push('Acceptance criteria:')
    for (const [name, met] of criteria) lines.push(`- [${met ? 'x' : ' '}] ${name}`)
    lines.push('')
  }
  lines.push(`Work item: ${item.id}`)
  return lines.join('\n')
}

export class GitReleasePackager implements ReleasePackager {
  private readonly _options: GitReleasePackagerOptions
  private readonly _run: CommandRunner

  constructor(options: GitReleasePackagerOptions) {
    this._options = options
    this._run = options.run ?? spawnProcess
  }

  async package(item: WorkItem): Promise<ReleasePackage> {
    const { remote, baseBranch, branchPrefix, openReview } = this._options
    const branch = `${branchPrefix}${item.id}`

    logger.info({ workItemId: item.id, branch }, 'Packaging release')

    const existing = await this._query('git', ['rev-parse', '--verify', '--quiet', `refs/heads/${branch}`])
    if (existing.code === 0) {
      logger.info({ workItemId: item.id, branch }, 'Reusing branch from an earlier attempt')
      await this._step('git', ['checkout', branch])
    } else {
      await this._step('git', ['checkout', '-b', branch])
    }

    await this._step('git', ['add', '-A', '--', '.', STATE_DIR_EXCLUDE])
    if (await this._needsCommit(item)) {
      await this._step('git', ['commit', '-m', buildCommitMessage(item)])
    }
    const commitRef = (await this._step('git', ['rev-parse', 'HEAD'])).stdout
    await this._step('git', ['push', '-u', remote, branch])

    let reviewRef = `${remote}/${branch}`
    if (openReview) {
      const pr = await this._step('gh', [
        'pr',
        'create',
        '--base',
        baseBranch,
        '--head',
        branch,
        '--title',
        item.title,
        '--body',
        buildReviewBody(item),
      ])
      // gh prints the PR URL as the last line
      const url = pr.stdout.split('\n').pop()?.trim() ?? ''
      if (url !== '') reviewRef = url
    }

    logger.info({ workItemId: item.id, branch, commitRef, reviewRef }, 'Release packaged')

    return {
      branch,
      commitRef,
      reviewRef,
      rollback: `git revert ${commitRef}`,
    }
  }

  /** True unless nothing is staged and HEAD is already this item's commit */
  private async _needsCommit(item: WorkItem): Promise<boolean> {
    const staged = await this._query('git', ['diff', '--cached', '--quiet'])
    if (staged.code === 1) return true
    if (staged.code !== 0) this._fail('git', ['diff'], staged)

    const head = await this._step('git', ['log', '-1', '--format=%B'])
    const alreadyCommitted = head.stdout.includes(commitTrailer(item))
    if (alreadyCommitted) logger.info({ workItemId: item.id }, 'HEAD already carries the release commit')
    return !alreadyCommitted
  }

  /** Run a command whose exit code is an answer, not a failure */
  private async _query(command: string, args: string[]): Promise<SpawnResult> {
    const result = await this._run(command, args, { cwd: this._options.cwd })
    if (result.spawnError === 'ENOENT') {
      throw new ReleaseError(`${command} is not installed`, { command })
    }
    return result
  }

  private async _step(command: string, args: string[]): Promise<SpawnResult> {
    const result = await this._query(command, args)
    if (result.code !== 0) this._fail(command, args, result)
    return result
  }

  private _fail(command: string, args: string[], result: SpawnResult): never {
    const detail = result.stderr !== '' ? result.stderr : result.stdout
    throw new ReleaseError(`${command} ${args[0] ?? ''} failed: ${detail}`, {
      command,
      args,
      code: result.code,
    })
  }
}

export function createGitReleasePackager(options: GitReleasePackagerOptions): ReleasePackager {
  return new GitReleasePackager(options)
}
