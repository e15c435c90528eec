/**
 * Owner/repository extraction from a git remote URL
 */

import type { RemoteIdentity } from '../../core/models/index.js';

/** `user@host:owner/repo.git` or `host:owner/repo.git` */
const SCP_LIKE = /^(?:[^@\s/:]+@)?[^@\s/:]+:(?!\/)(\S+)$/;

const URL_PROTOCOLS = new Set(['http:', 'https:', 'ssh:', 'git:']);

function identityFromPath(path: string): RemoteIdentity | null {
  const segments = path
    .replace(/\/+$/, '')
    .replace(/\.git$/, '')
    .split('/')
    .filter((segment) => segment.length > 0);
  const owner = segments[segments.length - 2];
  const repo = segments[segments.length - 1];
  if (!owner || !repo) {
    return null;
  }
  return { owner, repo };
}

/**
 * Parse owner and repo from an SSH (`git@host:owner/repo.git`) or URL
 * (`https://host/owner/repo.git`) remote: drop trailing slashes and a trailing `.git`, split the
 * path on `/` and take the last two segments. Anything else yields null.
 */
export function parseOwnerRepo(remoteUrl: string): RemoteIdentity | null {
  const trimmed = remoteUrl.trim();
  if (trimmed.length === 0) {
    return null;
  }

  if (trimmed.includes('://')) {
    let url: URL;
    try {
      url = new URL(trimmed);
    } catch {
      return null;
    }
    if (!URL_PROTOCOLS.has(url.protocol) || !url.hostname) {
      return null;
    }
    let path: string;
    try {
      path = decodeURIComponent(url.pathname);
    } catch {
      return null;
    }
    return identityFromPath(path);
  }

  const match = SCP_LIKE.exec(trimmed);
  if (!match?.[1]) {
    return null;
  }
  return identityFromPath(match[1]);
}

/** `owner/repo` */
export function formatRemoteIdentity(identity: RemoteIdentity): string {
  return `${identity.owner}/${identity.repo}`;
}
