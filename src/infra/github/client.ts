/**
 * Octokit construction
 */

import { Octokit } from '@octokit/rest';
import { APP_NAME } from '../../shared/constants.js';
import { createLogger } from '../../shared/utils/index.js';

const log = createLogger('github-client');

export interface GitHubClientOptions {
  /** Personal access token; requests are anonymous without one */
  token: string | null;
  baseUrl: string;
  /** Replaces the global fetch (tests) */
  fetch?: typeof fetch;
}

export function createGitHubClient(options: GitHubClientOptions): Octokit {
  return new Octokit({
    ...(options.token ? { auth: options.token } : {}),
    baseUrl: options.baseUrl,
    userAgent: APP_NAME,
    log: {
      debug: (message: string) => log.debug(message),
      info: (message: string) => log.info(message),
      warn: (message: string) => log.warn(message),
      error: (message: string) => log.error(message),
    },
    ...(options.fetch ? { request: { fetch: options.fetch } } : {}),
  });
}
