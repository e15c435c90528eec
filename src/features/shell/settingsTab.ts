/**
 * Settings tab
 */

import type { Credentials } from '../../core/models/index.js';
import { currentExecCommand, writeDesktopLauncher } from '../../infra/desktop/index.js';
import { confirm, promptInput, selectOption } from '../../shared/prompt/index.js';
import { blankLine, header, status, warn } from '../../shared/ui/index.js';
import { failed, getErrorMessage, succeeded } from '../../shared/utils/index.js';
import { clearCredentials, maskToken, saveCredentials } from '../settings/index.js';
import type { ShellSession } from './session.js';
import { renderStatus } from './views.js';

type SettingsAction = 'user' | 'token' | 'save' | 'clear' | 'launcher';

function reportAll(session: ShellSession, outcomes: ReturnType<typeof saveCredentials>): void {
  for (const outcome of outcomes) {
    session.report(outcome);
  }
}

export async function settingsTab(session: ShellSession): Promise<void> {
  const draft: Credentials = session.credentials.getCredentials();

  for (;;) {
    header('Settings');
    status('GitHub user', draft.user || '(not set)');
    status('GitHub token', maskToken(draft.token));
    const warning = session.credentials.storageWarning();
    if (warning) {
      warn(warning);
    }
    blankLine();
    renderStatus(session).forEach((line) => console.log(line));

    const action = await selectOption<SettingsAction>(
      'Settings',
      [
        { label: 'Set GitHub username', value: 'user' },
        { label: 'Set GitHub token', value: 'token' },
        { label: 'Save credentials', value: 'save' },
        { label: 'Clear credentials', value: 'clear' },
        { label: 'Create desktop launcher', value: 'launcher' },
      ],
      'Back',
    );

    switch (action) {
      case null:
        return;
      case 'user': {
        const user = await promptInput('GitHub username', draft.user || undefined);
        if (user !== null) draft.user = user.trim();
        break;
      }
      case 'token': {
        const token = await promptInput('GitHub token');
        if (token !== null) draft.token = token.trim();
        break;
      }
      case 'save': {
        const gitCredentialStore = await confirm(
          'Also save to git credential store (plain-text ~/.git-credentials)?',
          false,
        );
        reportAll(session, saveCredentials(session.credentials, draft, { gitCredentialStore }));
        session.startDashboardRefresh();
        break;
      }
      case 'clear': {
        if (!(await confirm('Erase the stored GitHub credentials?', false))) break;
        session.report(clearCredentials(session.credentials));
        draft.user = '';
        draft.token = '';
        break;
      }
      case 'launcher': {
        try {
          const path = writeDesktopLauncher({ execCommand: currentExecCommand() });
          session.report(succeeded(`Launcher created at ${path}`));
        } catch (err) {
          session.report(failed('subprocess', `Failed to create launcher: ${getErrorMessage(err)}`));
        }
        break;
      }
    }
  }
}
