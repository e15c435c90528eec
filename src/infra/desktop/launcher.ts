/**
 * freedesktop.org launcher entry for the application menu
 */

import { chmodSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { APP_NAME, APP_TITLE } from '../../shared/constants.js';
import { ensureDir, getApplicationsDir } from '../config/index.js';
import { createLogger } from '../../shared/utils/index.js';

const log = createLogger('launcher');

export interface LauncherOptions {
  /** Command line placed in `Exec=` */
  execCommand: string;
  /** Defaults to ~/.local/share/applications */
  applicationsDir?: string;
}

/** Quote one Exec argument following Desktop Entry quoting rules */
export function quoteExecArg(arg: string): string {
  if (!/[\s"'\\$`]/.test(arg)) {
    return arg;
  }
  return `"${arg.replace(/(["`$\\])/g, '\\$1')}"`;
}

/** Exec line that reruns the current Node entry point */
export function currentExecCommand(): string {
  const script = process.argv[1];
  const parts = script ? [process.execPath, script] : [process.execPath];
  return parts.map(quoteExecArg).join(' ');
}

export function buildDesktopEntry(execCommand: string): string {
  return [
    '[Desktop Entry]',
    'Type=Application',
    `Name=${APP_TITLE}`,
    `Exec=${execCommand}`,
    'Icon=utilities-terminal',
    'Terminal=true',
    'Categories=Development;',
    '',
  ].join('\n');
}

/** Write `<APP_NAME>.desktop` (mode 0755) and return its path. Throws on I/O failure. */
export function writeDesktopLauncher(options: LauncherOptions): string {
  const dir = options.applicationsDir ?? getApplicationsDir();
  ensureDir(dir);
  const filePath = join(dir, `${APP_NAME}.desktop`);
  writeFileSync(filePath, buildDesktopEntry(options.execCommand), 'utf-8');
  chmodSync(filePath, 0o755);
  log.info('Launcher written', { filePath });
  return filePath;
}
