/**
 * Tests for GitReleasePackager with a recording command runner.
 */

import { describe, it, expect } from 'vitest'
import { ReleaseError } from '../../../core/errors.js'
import type { WorkItem } from '../../../core/types.js'
import type { SpawnResult } from '../../../utils/process.js'
import {
  buildCommitMessage,
  buildReviewBody,
  createGitReleasePackager,
  STATE_DIR_EXCLUDE,
} from '../git-release-packager.js'
import type { CommandRunner, GitReleasePackagerOptions } from '../git-release-packager.js'

const ITEM: WorkItem = {
  id: '20240301-100000-fix-null',
  title: 'Fix null handling',
  problemStatement: 'Parser crashes on null input',
  stage: 'release',
  status: 'ready_for_next',
  requiredDocs: [],
  acceptanceCriteria: { 'null input handled': true },
  artifacts: {},
  history: [],
  retryCount: 0,
  pendingFindings: [],
  abortReason: null,
  version: 6,
  createdAt: '2024-03-01T10:00:00.000Z',
  updatedAt: '2024-03-01T10:00:00.000Z',
}

const OK: SpawnResult = { stdout: '', stderr: '', code: 0 }

interface RecordedCall {
  command: string
  args: string[]
  cwd: string | undefined
}

const BRANCH = 'waypoint/20240301-100000-fix-null'
const VERIFY_BRANCH = `git rev-parse --verify --quiet refs/heads/${BRANCH}`

/** A repository where the branch does not exist yet and the work is unstaged */
const FRESH: Record<string, SpawnResult> = {
  [VERIFY_BRANCH]: { ...OK, code: 1 },
  'git diff --cached --quiet': { ...OK, code: 1 },
  'git rev-parse HEAD': { ...OK, stdout: 'abc1234' },
}

/**
 * Runner that records calls and answers from `responses`, looked up by the
 * full command line first and then by `command subcommand`.
 */
function recordingRunner(responses: Record<string, SpawnResult> = {}): { run: CommandRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = []
  const run: CommandRunner = (command, args, options) => {
    calls.push({ command, args, cwd: options?.cwd })
    const answer = responses[`${command} ${args.join(' ')}`] ?? responses[`${command} ${args[0] ?? ''}`]
    return Promise.resolve(answer ?? OK)
  }
  return { run, calls }
}

function commandLines(calls: RecordedCall[]): string[] {
  return calls.map((c) => `${c.command} ${c.args.join(' ')}`)
}

function options(run: CommandRunner, overrides: Partial<GitReleasePackagerOptions> = {}): GitReleasePackagerOptions {
  return {
    cwd: '/work/repo',
    remote: 'origin',
    baseBranch: 'main',
    branchPrefix: 'waypoint/',
    openReview: false,
    run,
    ...overrides,
  }
}

describe('GitReleasePackager', () => {
  it('branches, commits and pushes in order', async () => {
    const { run, calls } = recordingRunner(FRESH)

    const pkg = await createGitReleasePackager(options(run)).package(ITEM)

    expect(pkg).toEqual({
      branch: BRANCH,
      commitRef: 'abc1234',
      reviewRef: `origin/${BRANCH}`,
      rollback: 'git revert abc1234',
    })
    expect(commandLines(calls)).toEqual([
      VERIFY_BRANCH,
      `git checkout -b ${BRANCH}`,
      'git add -A -- . :(exclude).waypoint',
      'git diff --cached --quiet',
      `git commit -m ${buildCommitMessage(ITEM)}`,
      'git rev-parse HEAD',
      `git push -u origin ${BRANCH}`,
    ])
    expect(calls.every((c) => c.cwd === '/work/repo')).toBe(true)
  })

  it('keeps the state directory out of the release commit', async () => {
    const { run, calls } = recordingRunner(FRESH)

    await createGitReleasePackager(options(run)).package(ITEM)

    const add = calls.find((c) => c.args[0] === 'add')
    expect(add?.args).toEqual(['add', '-A', '--', '.', STATE_DIR_EXCLUDE])
  })

  it('retries after a failed push without recreating the branch or the commit', async () => {
    const first = recordingRunner({ ...FRESH, 'git push': { stdout: '', stderr: 'no such remote', code: 128 } })
    await expect(createGitReleasePackager(options(first.run)).package(ITEM)).rejects.toThrow(
      'git push failed: no such remote',
    )

    // The branch and commit from the first attempt are still there
    const retry = recordingRunner({
      [VERIFY_BRANCH]: OK,
      'git diff --cached --quiet': OK,
      'git log -1 --format=%B': { ...OK, stdout: buildCommitMessage(ITEM) },
      'git rev-parse HEAD': { ...OK, stdout: 'abc1234' },
    })
    const pkg = await createGitReleasePackager(options(retry.run)).package(ITEM)

    expect(pkg.commitRef).toBe('abc1234')
    expect(commandLines(retry.calls)).toEqual([
      VERIFY_BRANCH,
      `git checkout ${BRANCH}`,
      'git add -A -- . :(exclude).waypoint',
      'git diff --cached --quiet',
      'git log -1 --format=%B',
      'git rev-parse HEAD',
      `git push -u origin ${BRANCH}`,
    ])
  })

  it('commits on a reused branch when new changes are staged', async () => {
    const { run, calls } = recordingRunner({ ...FRESH, [VERIFY_BRANCH]: OK })

    await createGitReleasePackager(options(run)).package(ITEM)

    expect(commandLines(calls).slice(1, 5)).toEqual([
      `git checkout ${BRANCH}`,
      'git add -A -- . :(exclude).waypoint',
      'git diff --cached --quiet',
      `git commit -m ${buildCommitMessage(ITEM)}`,
    ])
  })

  it('fails when the index cannot be read', async () => {
    const { run } = recordingRunner({
      ...FRESH,
      'git diff --cached --quiet': { stdout: '', stderr: 'not a git repository', code: 128 },
    })

    await expect(createGitReleasePackager(options(run)).package(ITEM)).rejects.toThrow(
      'git diff failed: not a git repository',
    )
  })

  it('opens a review and uses its URL', async () => {
    const { run, calls } = recordingRunner({
      ...FRESH,
      'gh pr': { ...OK, stdout: 'Creating pull request\nhttps://example.test/pr/7' },
    })

    const pkg = await createGitReleasePackager(options(run, { openReview: true })).package(ITEM)

    expect(pkg.reviewRef).toBe('https://example.test/pr/7')
    expect(calls.at(-1)?.args).toEqual([
      'pr',
      'create',
      '--base',
      'main',
      '--head',
      BRANCH,
      '--title',
      'Fix null handling',
      '--body',
      buildReviewBody(ITEM),
    ])
  })

  it('stops at the first failing step', async () => {
    const { run, calls } = recordingRunner({
      ...FRESH,
      'git push': { stdout: '', stderr: 'rejected: non-fast-forward', code: 1 },
    })

    const packaging = createGitReleasePackager(options(run)).package(ITEM)

    await expect(packaging).rejects.toBeInstanceOf(ReleaseError)
    await expect(packaging).rejects.toThrow('git push failed: rejected: non-fast-forward')
    expect(calls.at(-1)?.args[0]).toBe('push')
  })

  it('reports a missing tool', async () => {
    const { run } = recordingRunner({
      ...FRESH,
      'gh pr': { stdout: '', stderr: 'spawn gh ENOENT', code: 1, spawnError: 'ENOENT' },
    })

    await expect(createGitReleasePackager(options(run, { openReview: true })).package(ITEM)).rejects.toThrow(
      'gh is not installed',
    )
  })
})

describe('commit and review text', () => {
  it('puts the problem statement and trailer in the commit message', () => {
    expect(buildCommitMessage(ITEM)).toBe(
      'Fix null handling\n\nParser crashes on null input\n\nWork-Item: 20240301-100000-fix-null',
    )
    expect(buildCommitMessage({ ...ITEM, problemStatement: '' })).toBe(
      'Fix null handling\n\nWork-Item: 20240301-100000-fix-null',
    )
  })

  it('lists acceptance criteria in the review body', () => {
    expect(buildReviewBody(ITEM)).toBe(
      [
        'Parser crashes on null input',
        '',
        'Acceptance criteria:',
        '- [x] null input handled',
        '',
        'Work item: 20240301-100000-fix-null',
      ].join('\n'),
    )
  })
})
