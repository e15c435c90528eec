/**
 * Settings tab: saving and clearing GitHub credentials
 */

import type { ActionOutcome, Credentials } from '../../core/models/index.js';
import { storeGitCredentials, type CredentialProvider } from '../../infra/credentials/index.js';

export interface SaveCredentialsOptions {
  /** Also append to the plain-text git credential store */
  gitCredentialStore: boolean;
  /** Overrides ~/.git-credentials */
  gitCredentialsPath?: string;
}

/**
 * Keep the credentials for this session, persist them to the secret
 * store, and optionally to git's credential store. One outcome per target.
 */
export function saveCredentials(
  provider: CredentialProvider,
  credentials: Credentials,
  options: SaveCredentialsOptions,
): ActionOutcome[] {
  const outcomes = [provider.save(credentials)];
  if (options.gitCredentialStore) {
    outcomes.push(storeGitCredentials(provider.getCredentials(), options.gitCredentialsPath));
  }
  return outcomes;
}

export function clearCredentials(provider: CredentialProvider): ActionOutcome {
  return provider.clear();
}

/** Token shown as its last four characters */
export function maskToken(token: string): string {
  if (!token) return '(not set)';
  return token.length <= 4 ? '****' : `****${token.slice(-4)}`;
}
