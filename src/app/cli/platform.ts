/**
 * Startup checks for the interactive shell
 */

import { EXIT_NOT_INTERACTIVE, EXIT_UNSUPPORTED_PLATFORM } from '../../shared/exitCodes.js';

export const UNSUPPORTED_PLATFORM_MESSAGE = 'This app runs on Linux only.';
export const NOT_INTERACTIVE_MESSAGE = 'vpush needs an interactive terminal.';

export interface StartupCheck {
  ok: boolean;
  message?: string;
  exitCode?: number;
}

export function checkPlatform(platform: NodeJS.Platform = process.platform): StartupCheck {
  if (platform !== 'linux') {
    return { ok: false, message: UNSUPPORTED_PLATFORM_MESSAGE, exitCode: EXIT_UNSUPPORTED_PLATFORM };
  }
  return { ok: true };
}

export function checkInteractive(isTTY: boolean | undefined = process.stdin.isTTY): StartupCheck {
  if (!isTTY) {
    return { ok: false, message: NOT_INTERACTIVE_MESSAGE, exitCode: EXIT_NOT_INTERACTIVE };
  }
  return { ok: true };
}
