/**
 * OS secret storage.
 *
 * Secrets live under one service name, one entry per account. The
 * backing store is probed once; when it cannot be reached every
 * operation becomes a no-op and `unavailableReason` says why.
 */

import { Entry } from '@napi-rs/keyring';
import { SECRET_ACCOUNT_USER } from '../../shared/constants.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';

const log = createLogger('secret-store');

/** Minimal password-store surface; the keyring in production, a Map in tests */
export interface SecretBackend {
  getPassword(service: string, account: string): string | null;
  setPassword(service: string, account: string, secret: string): void;
  deletePassword(service: string, account: string): void;
}

export const keyringBackend: SecretBackend = {
  getPassword(service, account) {
    return new Entry(service, account).getPassword() ?? null;
  },
  setPassword(service, account, secret) {
    new Entry(service, account).setPassword(secret);
  },
  deletePassword(service, account) {
    new Entry(service, account).deletePassword();
  },
};

type Availability = { available: true } | { available: false; reason: string };

export class SecretStore {
  private availability: Availability | null = null;

  constructor(
    readonly service: string,
    private readonly backend: SecretBackend = keyringBackend,
  ) {}

  private probe(): Availability {
    if (this.availability) {
      return this.availability;
    }
    try {
      this.backend.getPassword(this.service, SECRET_ACCOUNT_USER);
      this.availability = { available: true };
    } catch (err) {
      const reason = getErrorMessage(err);
      log.warn('Secret store unavailable', { service: this.service, reason });
      this.availability = { available: false, reason };
    }
    return this.availability;
  }

  isAvailable(): boolean {
    return this.probe().available;
  }

  /** Warning text when the store cannot be used, otherwise null */
  unavailableReason(): string | null {
    const availability = this.probe();
    return availability.available
      ? null
      : `Secure credential storage is unavailable (${availability.reason}); credentials are kept for this session only.`;
  }

  /** Stored secret, or null when missing, unreadable or the store is unavailable */
  get(account: string): string | null {
    if (!this.isAvailable()) {
      return null;
    }
    try {
      return this.backend.getPassword(this.service, account);
    } catch (err) {
      log.warn('Secret read failed', { account, error: getErrorMessage(err) });
      return null;
    }
  }

  /** Throws when the backend rejects the write */
  set(account: string, secret: string): void {
    if (!this.isAvailable()) {
      return;
    }
    this.backend.setPassword(this.service, account, secret);
    log.debug('Secret stored', { account });
  }

  /** Throws when the backend rejects the delete (including a missing entry) */
  delete(account: string): void {
    if (!this.isAvailable()) {
      return;
    }
    this.backend.deletePassword(this.service, account);
    log.debug('Secret deleted', { account });
  }
}
