/**
 * git subprocess operations
 *
 * Every call runs `git` with a fixed argument vector in the project
 * directory and reduces the exit code to success or failure. Output is
 * never parsed for meaning except for the branch, remote URL, tag list
 * and changed-file list.
 */

import { spawnSync } from 'node:child_process';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';
import { appendGitOutput } from './outputLog.js';

const log = createLogger('git');

export type GitResult =
  | { success: true; output: string }
  | { success: false; message: string; output: string };

/** Result of a git call whose output is parsed into a value */
export type GitQuery<T> =
  | { success: true; value: T }
  | { success: false; message: string };

/**
 * Run `git <args>` in cwd, capturing stdout and stderr together.
 * Never throws: spawn errors become failures too.
 */
export function runGit(cwd: string, args: readonly string[]): GitResult {
  const commandLine = `$ git ${args.join(' ')}`;
  log.debug('Running git', { cwd, args });

  const result = spawnSync('git', args, { cwd, encoding: 'utf-8', stdio: 'pipe' });

  if (result.error) {
    const message = getErrorMessage(result.error);
    appendGitOutput(`${commandLine}\n${message}\n`);
    log.error('git could not be started', { args, error: message });
    return { success: false, message, output: '' };
  }

  const output = (result.stdout ?? '') + (result.stderr ?? '');
  appendGitOutput(`${commandLine}\n${output}`);

  if (result.status !== 0) {
    const trimmed = output.trim();
    log.info('git failed', { args, status: result.status, output: trimmed });
    return {
      success: false,
      message: trimmed || `git ${args[0] ?? ''} exited with code ${String(result.status)}`,
      output,
    };
  }

  return { success: true, output };
}

function query<T>(cwd: string, args: readonly string[], parse: (output: string) => T): GitQuery<T> {
  const result = runGit(cwd, args);
  if (!result.success) {
    return { success: false, message: result.message };
  }
  return { success: true, value: parse(result.output) };
}

/** Current branch name, or null outside a repository */
export function getBranchName(cwd: string): string | null {
  const result = query(cwd, ['rev-parse', '--abbrev-ref', 'HEAD'], (output) => output.trim());
  return result.success && result.value ? result.value : null;
}

/** URL of the `origin` remote, or null when none is configured */
export function getRemoteUrl(cwd: string): string | null {
  const result = query(cwd, ['remote', 'get-url', 'origin'], (output) => output.trim());
  return result.success && result.value ? result.value : null;
}

export function setRemoteUrl(cwd: string, url: string): GitResult {
  return runGit(cwd, ['remote', 'set-url', 'origin', url]);
}

/**
 * Paths from `git status --porcelain` output.
 * Each line is two status columns, a space, then the path; renames
 * list `old -> new` and yield the new path.
 */
export function parsePorcelainStatus(output: string): string[] {
  const files: string[] = [];
  for (const line of output.split('\n')) {
    if (line.length < 4) continue;
    let path = line.slice(3);
    const arrow = path.indexOf(' -> ');
    if (arrow !== -1) {
      path = path.slice(arrow + 4);
    }
    if (path.length >= 2 && path.startsWith('"') && path.endsWith('"')) {
      path = path.slice(1, -1);
    }
    files.push(path);
  }
  return files;
}

export function listChangedFiles(cwd: string): GitQuery<string[]> {
  return query(cwd, ['status', '--porcelain'], parsePorcelainStatus);
}

export function stageFiles(cwd: string, files: readonly string[]): GitResult {
  return runGit(cwd, ['add', ...files]);
}

export function unstageFiles(cwd: string, files: readonly string[]): GitResult {
  return runGit(cwd, ['reset', 'HEAD', ...files]);
}

export function commit(cwd: string, message: string): GitResult {
  return runGit(cwd, ['commit', '-m', message]);
}

/** Local tags in `git tag --list` order */
export function listTags(cwd: string): GitQuery<string[]> {
  return query(cwd, ['tag', '--list'], (output) =>
    output.split('\n').map((tag) => tag.trim()).filter((tag) => tag.length > 0),
  );
}

export function createTag(cwd: string, tag: string): GitResult {
  return runGit(cwd, ['tag', tag]);
}

export function deleteTag(cwd: string, tag: string): GitResult {
  return runGit(cwd, ['tag', '-d', tag]);
}

export function pushTag(cwd: string, tag: string): GitResult {
  return runGit(cwd, ['push', 'origin', tag]);
}

/** Push the current branch to its upstream */
export function pushBranch(cwd: string): GitResult {
  return runGit(cwd, ['push']);
}

export function pushAllTags(cwd: string): GitResult {
  return runGit(cwd, ['push', '--tags']);
}

export function pull(cwd: string, rebase: boolean): GitResult {
  return runGit(cwd, rebase ? ['pull', '--rebase'] : ['pull']);
}

/** Switch the global credential helper to the plain-text `store` helper */
export function enableCredentialStoreHelper(cwd: string): GitResult {
  return runGit(cwd, ['config', '--global', 'credential.helper', 'store']);
}
