/**
 * Path utilities for vpush configuration
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { existsSync, mkdirSync } from 'node:fs';

/** Get vpush global config directory (~/.vpush or VPUSH_CONFIG_DIR) */
export function getGlobalConfigDir(): string {
  return process.env.VPUSH_CONFIG_DIR || join(homedir(), '.vpush');
}

/** Get vpush global config file path */
export function getGlobalConfigPath(): string {
  return join(getGlobalConfigDir(), 'config.yaml');
}

/** Get vpush global logs directory */
export function getGlobalLogsDir(): string {
  return join(getGlobalConfigDir(), 'logs');
}

/** Plain-text credential file read by `git credential-store` */
export function getGitCredentialsPath(): string {
  return join(homedir(), '.git-credentials');
}

/** Per-user application launcher directory (freedesktop) */
export function getApplicationsDir(): string {
  return join(homedir(), '.local', 'share', 'applications');
}

/** Ensure a directory exists, create if not */
export function ensureDir(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}
