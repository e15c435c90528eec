/**
 * Version & Push tab
 */

import { resolve } from 'node:path';
import type { ActionOutcome } from '../../core/models/index.js';
import { getGitOutputText, clearGitOutput } from '../../infra/git/index.js';
import { filterCandidates } from '../../infra/manifest/index.js';
import { confirm, promptInput, selectMany, selectOption } from '../../shared/prompt/index.js';
import { blankLine, divider, header, info, warn } from '../../shared/ui/index.js';
import { succeeded } from '../../shared/utils/index.js';
import {
  chooseProject,
  commitOnly,
  createLocalTag,
  deleteLocalTag,
  loadTags,
  pullChanges,
  pushSelectedTag,
  refreshFileList,
  runPublishSequence,
  stageSelected,
  unstageSelected,
  updateRemoteUrl,
  loadProject,
} from '../repository/index.js';
import type { ShellSession } from './session.js';
import { renderProject, renderStatus } from './views.js';

type VersionAction =
  | 'folder'
  | 'files'
  | 'stage'
  | 'unstage'
  | 'commit'
  | 'publish'
  | 'pull'
  | 'pull-rebase'
  | 'tags'
  | 'remote'
  | 'push-tags'
  | 'output'
  | 'clear-output'
  | 'clear';

type TagAction = 'reload' | 'select' | 'create' | 'push' | 'delete';

/** Filter prompt, then a picker over the matching paths */
export async function pickManifest(candidates: string[]): Promise<string | null> {
  const query = await promptInput(`${candidates.length} manifests found. Filter by path (empty for all)`);
  let matches = filterCandidates(candidates, query ?? '');
  if (matches.length === 0) {
    warn(`No path contains "${query ?? ''}"; showing all.`);
    matches = candidates;
  }
  return selectOption(
    'Select manifest',
    matches.map((path) => ({ label: path, value: path })),
  );
}

/** Choose a folder and select its manifest; reloads tags and the dashboard */
export async function selectFolder(session: ShellSession, folder: string): Promise<void> {
  session.clearFields();
  const choice = await chooseProject(folder, session.config.manifest, pickManifest);
  session.report(choice.outcome);
  if (!choice.selection) {
    return;
  }
  session.setSelection(choice.selection);
  const tags = loadTags(choice.selection.projectDir);
  session.tags = tags.tags;
  session.startDashboardRefresh();
}

/** Re-read version, branch and remote after something changed them */
function reloadSelection(session: ShellSession): void {
  if (!session.selection) return;
  const reloaded = loadProject(session.selection.manifestPath);
  if (reloaded.selection) {
    session.selection = reloaded.selection;
  }
}

async function chooseFiles(session: ShellSession, message: string): Promise<string[] | null> {
  if (session.files.length === 0) {
    const listed = refreshFileList(session.projectDir);
    session.files = listed.files;
  }
  return selectMany(
    message,
    session.files.map((file) => ({ label: file, value: file })),
  );
}

async function manageTags(session: ShellSession): Promise<void> {
  for (;;) {
    const action = await selectOption<TagAction>(
      `Tags (${session.tags.tags.length}, selected: ${session.tags.selected ?? 'none'})`,
      [
        { label: 'Refresh tags', value: 'reload' },
        { label: 'Select tag', value: 'select' },
        { label: 'Create tag locally', value: 'create' },
        { label: 'Push selected tag', value: 'push' },
        { label: 'Delete selected tag', value: 'delete' },
      ],
      'Back',
    );
    if (action === null) return;

    let outcome: ActionOutcome | null = null;
    switch (action) {
      case 'reload': {
        const loaded = loadTags(session.projectDir);
        session.tags = loaded.tags;
        outcome = loaded.outcome;
        break;
      }
      case 'select': {
        const tag = await selectOption(
          'Select tag',
          session.tags.tags.map((name) => ({ label: name, value: name })),
        );
        if (tag !== null) session.tags = { ...session.tags, selected: tag };
        break;
      }
      case 'create': {
        const name = await promptInput('New tag name');
        outcome = createLocalTag(session.projectDir, name ?? '');
        if (outcome.ok) session.tags = loadTags(session.projectDir).tags;
        break;
      }
      case 'push':
        outcome = pushSelectedTag(session.projectDir, session.tags.selected);
        break;
      case 'delete': {
        const tag = session.tags.selected;
        if (tag && !(await confirm(`Delete tag '${tag}' locally? This cannot be undone!`, false))) {
          break;
        }
        outcome = deleteLocalTag(session.projectDir, tag);
        if (outcome.ok) session.tags = loadTags(session.projectDir).tags;
        break;
      }
    }
    if (outcome) {
      session.report(outcome);
      renderStatus(session).forEach((line) => console.log(line));
    }
  }
}

async function publish(session: ShellSession): Promise<void> {
  if (!session.selection) {
    session.report(runPublishSequence({ selection: null, newVersion: '', commitMessage: '', pushTags: session.pushTags }).outcome);
    return;
  }
  const newVersion = await promptInput(`New version (current ${session.selection.currentVersion})`);
  const commitMessage = await promptInput('Commit message');
  clearGitOutput();
  const report = runPublishSequence({
    selection: session.selection,
    newVersion: newVersion ?? '',
    commitMessage: commitMessage ?? '',
    pushTags: session.pushTags,
  });
  session.report(report.outcome);
  if (report.completed.includes('manifest')) {
    reloadSelection(session);
  }
  if (report.outcome.ok) {
    session.tags = loadTags(session.projectDir).tags;
    session.files = refreshFileList(session.projectDir).files;
    session.startDashboardRefresh();
  }
}

async function runVersionAction(session: ShellSession, action: VersionAction): Promise<void> {
  switch (action) {
    case 'folder': {
      const folder = await promptInput('Project folder', session.projectDir ?? process.cwd());
      if (folder) await selectFolder(session, resolve(folder));
      break;
    }
    case 'files': {
      const listed = refreshFileList(session.projectDir);
      session.files = listed.files;
      session.report(listed.outcome);
      listed.files.forEach((file) => info(file));
      break;
    }
    case 'stage':
    case 'unstage': {
      const files = await chooseFiles(session, action === 'stage' ? 'Files to stage' : 'Files to unstage');
      const outcome =
        action === 'stage'
          ? stageSelected(session.projectDir, files ?? [])
          : unstageSelected(session.projectDir, files ?? []);
      session.report(outcome);
      session.files = refreshFileList(session.projectDir).files;
      break;
    }
    case 'commit': {
      const files = await chooseFiles(session, 'Files to commit');
      const message = files && files.length > 0 ? await promptInput('Commit message') : null;
      session.report(commitOnly(session.projectDir, message ?? '', files ?? []));
      session.files = refreshFileList(session.projectDir).files;
      break;
    }
    case 'publish':
      await publish(session);
      break;
    case 'pull':
    case 'pull-rebase':
      session.report(pullChanges(session.projectDir, action === 'pull-rebase'));
      break;
    case 'tags':
      await manageTags(session);
      break;
    case 'remote': {
      const url = await promptInput('Set remote to', session.selection?.remoteUrl ?? undefined);
      session.report(updateRemoteUrl(session.projectDir, url ?? ''));
      reloadSelection(session);
      break;
    }
    case 'push-tags':
      session.pushTags = !session.pushTags;
      session.report(succeeded(`Push tags ${session.pushTags ? 'enabled' : 'disabled'}.`));
      break;
    case 'output':
      session.showGitOutput = !session.showGitOutput;
      break;
    case 'clear-output':
      clearGitOutput();
      break;
    case 'clear':
      session.clearFields();
      break;
  }
}

export async function versionTab(session: ShellSession): Promise<void> {
  for (;;) {
    header('Version & Push');
    renderProject(session).forEach((line) => console.log(line));
    if (session.showGitOutput) {
      divider();
      console.log(getGitOutputText() || '(no git output)');
      divider();
    }
    blankLine();
    renderStatus(session).forEach((line) => console.log(line));

    const action = await selectOption<VersionAction>(
      'Version & Push',
      [
        { label: 'Choose folder', value: 'folder' },
        { label: 'Refresh file list', value: 'files' },
        { label: 'Stage files', value: 'stage' },
        { label: 'Unstage files', value: 'unstage' },
        { label: 'Commit only', value: 'commit', description: 'Stage the chosen files and commit; nothing is pushed' },
        { label: 'Version & Push', value: 'publish', description: 'Bump version, commit, tag and push' },
        { label: 'Pull (merge)', value: 'pull' },
        { label: 'Pull (rebase)', value: 'pull-rebase' },
        { label: 'Tags…', value: 'tags' },
        { label: 'Set remote URL', value: 'remote' },
        { label: `Push tags: ${session.pushTags ? 'on' : 'off'}`, value: 'push-tags' },
        { label: session.showGitOutput ? 'Hide git output' : 'Show git output', value: 'output' },
        { label: 'Clear git output', value: 'clear-output' },
        { label: 'Clear all fields', value: 'clear' },
      ],
      'Back',
    );
    if (action === null) return;
    await runVersionAction(session, action);
  }
}
