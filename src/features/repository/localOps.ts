/**
 * Local git actions of the Version & Push tab.
 *
 * Every action checks its preconditions first, runs its git commands in
 * the project directory, and reports one status line.
 */

import type { ActionOutcome, TagSet } from '../../core/models/index.js';
import {
  commit,
  createTag,
  deleteTag,
  getRemoteUrl,
  listChangedFiles,
  listTags,
  pull,
  pushTag,
  setRemoteUrl,
  stageFiles,
  unstageFiles,
} from '../../infra/git/index.js';
import { failed, succeeded } from '../../shared/utils/index.js';

export const NO_PROJECT = 'Select a project folder first.';

function subprocessFailure(prefix: string, message: string): ActionOutcome {
  return failed('subprocess', `${prefix}: ${message}`);
}

export function refreshFileList(projectDir: string | null): { outcome: ActionOutcome; files: string[] } {
  if (!projectDir) {
    return { outcome: failed('precondition', NO_PROJECT), files: [] };
  }
  const result = listChangedFiles(projectDir);
  if (!result.success) {
    return { outcome: subprocessFailure('Error listing files', result.message), files: [] };
  }
  const count = result.value.length;
  return {
    outcome: succeeded(count === 0 ? 'No changed files.' : `${count} changed file${count === 1 ? '' : 's'}.`),
    files: result.value,
  };
}

export function stageSelected(projectDir: string | null, files: readonly string[]): ActionOutcome {
  if (!projectDir) return failed('precondition', NO_PROJECT);
  if (files.length === 0) return failed('precondition', 'No files selected to stage.');
  const result = stageFiles(projectDir, files);
  return result.success ? succeeded('Files staged.') : subprocessFailure('Error', result.message);
}

export function unstageSelected(projectDir: string | null, files: readonly string[]): ActionOutcome {
  if (!projectDir) return failed('precondition', NO_PROJECT);
  if (files.length === 0) return failed('precondition', 'No files selected to unstage.');
  const result = unstageFiles(projectDir, files);
  return result.success ? succeeded('Files unstaged.') : subprocessFailure('Error', result.message);
}

/** Stage the selected files and commit them locally */
export function commitOnly(projectDir: string | null, message: string, files: readonly string[]): ActionOutcome {
  if (!projectDir) return failed('precondition', 'No project folder selected.');
  const commitMessage = message.trim();
  if (!commitMessage) return failed('precondition', 'Enter a commit message before committing.');
  if (files.length === 0) return failed('precondition', 'No files selected to commit.');

  const staged = stageFiles(projectDir, files);
  if (!staged.success) return subprocessFailure('Error', staged.message);

  const committed = commit(projectDir, commitMessage);
  if (!committed.success) return subprocessFailure('Error', committed.message);

  return succeeded('Files committed, but NOT pushed.');
}

export function pullChanges(projectDir: string | null, rebase: boolean): ActionOutcome {
  if (!projectDir) return failed('precondition', NO_PROJECT);
  const result = pull(projectDir, rebase);
  return result.success
    ? succeeded(`Pulled from remote (${rebase ? 'rebase' : 'merge'}).`)
    : subprocessFailure('Error', result.message);
}

/** Reload tags; the last listed tag becomes the selection */
export function loadTags(projectDir: string | null): { outcome: ActionOutcome; tags: TagSet } {
  if (!projectDir) {
    return { outcome: failed('precondition', NO_PROJECT), tags: { tags: [], selected: null } };
  }
  const result = listTags(projectDir);
  if (!result.success) {
    return {
      outcome: subprocessFailure('Failed to get tags', result.message),
      tags: { tags: [], selected: null },
    };
  }
  return {
    outcome: succeeded('Tag list refreshed.'),
    tags: { tags: result.value, selected: result.value[result.value.length - 1] ?? null },
  };
}

export function createLocalTag(projectDir: string | null, tag: string): ActionOutcome {
  if (!projectDir) return failed('precondition', NO_PROJECT);
  const name = tag.trim();
  if (!name) return failed('precondition', 'Enter new tag name.');
  const result = createTag(projectDir, name);
  return result.success
    ? succeeded(`Tag '${name}' created locally.`)
    : subprocessFailure('Failed to create tag', result.message);
}

/** Callers confirm with the user before deleting */
export function deleteLocalTag(projectDir: string | null, tag: string | null): ActionOutcome {
  if (!projectDir) return failed('precondition', NO_PROJECT);
  if (!tag) return failed('precondition', 'Select a tag to delete.');
  const result = deleteTag(projectDir, tag);
  return result.success
    ? succeeded(`Tag '${tag}' deleted locally.`)
    : subprocessFailure('Failed to delete tag', result.message);
}

export function pushSelectedTag(projectDir: string | null, tag: string | null): ActionOutcome {
  if (!projectDir) return failed('precondition', NO_PROJECT);
  if (!tag) return failed('precondition', 'Select a tag to push.');
  const result = pushTag(projectDir, tag);
  return result.success
    ? succeeded(`Tag '${tag}' pushed to origin.`)
    : subprocessFailure('Failed to push tag', result.message);
}

/** Point origin at `url`; nothing runs when it already does */
export function updateRemoteUrl(projectDir: string | null, url: string): ActionOutcome {
  if (!projectDir) return failed('precondition', NO_PROJECT);
  const newUrl = url.trim();
  if (!newUrl) return failed('precondition', 'Remote URL field is empty.');
  if (getRemoteUrl(projectDir) === newUrl) return succeeded('Remote already set correctly.');
  const result = setRemoteUrl(projectDir, newUrl);
  return result.success ? succeeded('Remote URL updated.') : subprocessFailure('Error', result.message);
}
