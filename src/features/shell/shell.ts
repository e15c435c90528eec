/**
 * Interactive shell: the tab loop.
 */

import type { GlobalConfig } from '../../core/models/index.js';
import type { CredentialProvider } from '../../infra/credentials/index.js';
import { APP_TITLE } from '../../shared/constants.js';
import { selectOption } from '../../shared/prompt/index.js';
import { blankLine, header } from '../../shared/ui/index.js';
import { createLogger } from '../../shared/utils/index.js';
import { dashboardTab } from './dashboardTab.js';
import { helpTab } from './helpTab.js';
import { ShellSession } from './session.js';
import { settingsTab } from './settingsTab.js';
import { selectFolder, versionTab } from './versionTab.js';
import { renderProject, renderTitle } from './views.js';

const log = createLogger('shell');

type Tab = 'dashboard' | 'version' | 'settings' | 'help';

export interface ShellOptions {
  config: GlobalConfig;
  credentials: CredentialProvider;
  /** Folder to open on start */
  folder?: string;
}

export async function runShell(options: ShellOptions): Promise<void> {
  const session = new ShellSession({ config: options.config, credentials: options.credentials });
  log.info('Shell started', { folder: options.folder ?? null });

  try {
    if (options.folder) {
      await selectFolder(session, options.folder);
    }

    for (;;) {
      header(renderTitle(APP_TITLE, session.dashboard.getSnapshot()));
      renderProject(session).forEach((line) => console.log(line));
      blankLine();

      const tab = await selectOption<Tab>(
        'Tab',
        [
          { label: 'Dashboard', value: 'dashboard', description: 'Pull requests, issues and commits of origin' },
          { label: 'Version & Push', value: 'version', description: 'Files, commits, tags and publishing' },
          { label: 'Settings', value: 'settings', description: 'GitHub credentials and launcher' },
          { label: 'Help', value: 'help' },
        ],
        'Exit',
      );
      if (tab === null) {
        break;
      }

      switch (tab) {
        case 'dashboard':
          await dashboardTab(session);
          break;
        case 'version':
          await versionTab(session);
          break;
        case 'settings':
          await settingsTab(session);
          break;
        case 'help':
          helpTab();
          break;
      }
    }
  } finally {
    session.broker.cancelAll();
    await session.jobs.idle();
    log.info('Shell closed');
  }
}
