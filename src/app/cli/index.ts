#!/usr/bin/env node

/**
 * vpush CLI entry point
 *
 * Import order matters: program setup → commands → parse.
 */

import { error } from '../../shared/ui/index.js';
import { EXIT_GENERAL_ERROR } from '../../shared/exitCodes.js';
import { checkPlatform } from './platform.js';

const platform = checkPlatform();
if (!platform.ok) {
  console.error(platform.message);
  process.exit(platform.exitCode);
}

// Import in dependency order
import { program } from './program.js';
import './commands.js';

(async () => {
  await program.parseAsync();
  // Keyring and HTTP handles may outlive the shell.
  process.exit(typeof process.exitCode === 'number' ? process.exitCode : 0);
})().catch((err: unknown) => {
  error(err instanceof Error ? err.message : String(err));
  process.exit(EXIT_GENERAL_ERROR);
});
