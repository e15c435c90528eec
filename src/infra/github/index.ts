/**
 * GitHub integration - barrel exports
 */

export type { GitHubClientOptions } from './client.js';
export type { HttpStatusError } from './errors.js';
export type { IssuePatch } from './repository.js';
export type { RepositoryFactory } from './types.js';

export { createGitHubClient } from './client.js';
export { GitHubResponseError, formatApiError, isHttpStatusError } from './errors.js';
export { parseOwnerRepo, formatRemoteIdentity } from './remote.js';
export {
  GitHubRepository,
  toPullRequestRecord,
  toIssueRecord,
  toCommitRecord,
} from './repository.js';
