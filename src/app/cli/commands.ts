/**
 * CLI command definitions
 *
 * The default action opens the interactive shell; `shortcut` writes the
 * desktop launcher without opening it.
 */

import { resolve } from 'node:path';
import { loadGlobalConfig } from '../../infra/config/index.js';
import { CredentialProvider, SecretStore } from '../../infra/credentials/index.js';
import { currentExecCommand, writeDesktopLauncher } from '../../infra/desktop/index.js';
import { runShell } from '../../features/shell/index.js';
import { error, success } from '../../shared/ui/index.js';
import { program } from './program.js';
import { checkInteractive } from './platform.js';

program
  .argument('[folder]', 'Project folder to open on start')
  .action(async (folder?: string) => {
    const interactive = checkInteractive();
    if (!interactive.ok) {
      error(interactive.message ?? '');
      process.exitCode = interactive.exitCode;
      return;
    }
    const config = loadGlobalConfig();
    const credentials = new CredentialProvider(new SecretStore(config.credentialService));
    await runShell({
      config,
      credentials,
      folder: folder ? resolve(folder) : undefined,
    });
  });

program
  .command('shortcut')
  .description('Create a desktop launcher in ~/.local/share/applications')
  .option('--dir <path>', 'Directory to write the launcher into')
  .action((opts: { dir?: string }) => {
    const path = writeDesktopLauncher({
      execCommand: currentExecCommand(),
      applicationsDir: opts.dir ? resolve(opts.dir) : undefined,
    });
    success(`Launcher created at ${path}`);
  });
