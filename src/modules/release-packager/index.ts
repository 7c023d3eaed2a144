/**
 * release-packager module: reviewable change sets for approved work items.
 */

export type { ReleasePackage, ReleasePackager } from './release-packager.js'
export {
  GitReleasePackager,
  createGitReleasePackager,
  buildCommitMessage,
  buildReviewBody,
} from './git-release-packager.js'
export type { CommandRunner, GitReleasePackagerOptions } from './git-release-packager.js'
