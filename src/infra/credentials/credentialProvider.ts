/**
 * GitHub credentials with one read path: the secret store first, then
 * the values entered during this session.
 */

import type { ActionOutcome, Credentials } from '../../core/models/index.js';
import { SECRET_ACCOUNT_TOKEN, SECRET_ACCOUNT_USER } from '../../shared/constants.js';
import { createLogger, failed, getErrorMessage, succeeded } from '../../shared/utils/index.js';
import type { SecretStore } from './secretStore.js';

const log = createLogger('credentials');

export class CredentialProvider {
  private session: Credentials = { user: '', token: '' };

  constructor(private readonly store: SecretStore) {}

  getUser(): string {
    return this.store.get(SECRET_ACCOUNT_USER) || this.session.user;
  }

  /** Token for API calls, or null for anonymous access */
  getToken(): string | null {
    return this.store.get(SECRET_ACCOUNT_TOKEN) || this.session.token || null;
  }

  getCredentials(): Credentials {
    return { user: this.getUser(), token: this.getToken() ?? '' };
  }

  /** Why credentials cannot be persisted, or null when they can */
  storageWarning(): string | null {
    return this.store.unavailableReason();
  }

  /** Values typed into the Settings tab, used when the store has none */
  setSessionCredentials(credentials: Credentials): void {
    this.session = { user: credentials.user.trim(), token: credentials.token.trim() };
  }

  /** Keep the credentials for this session and persist the non-empty ones */
  save(credentials: Credentials): ActionOutcome {
    this.setSessionCredentials(credentials);

    const warning = this.store.unavailableReason();
    if (warning) {
      return failed('precondition', warning);
    }

    try {
      if (this.session.user) {
        this.store.set(SECRET_ACCOUNT_USER, this.session.user);
      }
      if (this.session.token) {
        this.store.set(SECRET_ACCOUNT_TOKEN, this.session.token);
      }
    } catch (err) {
      log.error('Saving credentials failed', { error: getErrorMessage(err) });
      return failed('transport', `Saving credentials failed: ${getErrorMessage(err)}`);
    }

    return succeeded('Credentials saved to the secret store.');
  }

  /** Forget the session values and remove both stored secrets */
  clear(): ActionOutcome {
    this.session = { user: '', token: '' };

    const warning = this.store.unavailableReason();
    if (warning) {
      return failed('precondition', warning);
    }

    for (const account of [SECRET_ACCOUNT_USER, SECRET_ACCOUNT_TOKEN]) {
      try {
        this.store.delete(account);
      } catch (err) {
        log.debug('Nothing to delete', { account, error: getErrorMessage(err) });
      }
    }

    return succeeded('Credentials erased from the secret store.');
  }
}
