/**
 * Commander program setup
 *
 * Creates the Command instance, registers global options,
 * and sets up the preAction hook for initialization.
 */

import { createRequire } from 'node:module';
import { Command } from 'commander';
import { getGlobalLogsDir, loadGlobalConfig } from '../../infra/config/index.js';
import { setLogLevel } from '../../shared/ui/index.js';
import { initDebugLogger, createLogger, setVerboseConsole } from '../../shared/utils/debug.js';

const require = createRequire(import.meta.url);
const { version: cliVersion } = require('../../../package.json') as { version: string };

const log = createLogger('cli');

export { cliVersion };

export const program = new Command();

program
  .name('vpush')
  .description('Version & Push: bump, commit, tag and push a project, and work its GitHub pull requests and issues')
  .version(cliVersion);

program.option('-v, --verbose', 'Verbose console logging');

// Common initialization for all commands
program.hook('preAction', () => {
  const config = loadGlobalConfig();
  const verbose = program.opts().verbose === true || config.verbose;

  let debugConfig = config.debug;
  if (verbose && (!debugConfig || !debugConfig.enabled)) {
    debugConfig = { enabled: true };
  }
  initDebugLogger(debugConfig, getGlobalLogsDir());

  if (verbose) {
    setVerboseConsole(true);
    setLogLevel('debug');
  } else {
    setLogLevel(config.logLevel);
  }

  log.info('vpush starting', { version: cliVersion, cwd: process.cwd(), verbose });
});
