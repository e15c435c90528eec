/**
 * Version bump and publish.
 *
 * Rewrite the manifest version, stage it, commit, tag `v<version>`,
 * push the branch and optionally push tags. Steps run in order and the
 * first failure stops the rest. Completed steps are not undone.
 */

import { basename } from 'node:path';
import type { ActionOutcome, ProjectSelection } from '../../core/models/index.js';
import {
  appendGitOutput,
  commit,
  createTag,
  pushAllTags,
  pushBranch,
  stageFiles,
  type GitResult,
} from '../../infra/git/index.js';
import { writeManifestVersion } from '../../infra/manifest/index.js';
import { createLogger, failed, succeeded } from '../../shared/utils/index.js';

const log = createLogger('publish');

export type PublishStep = 'manifest' | 'add' | 'commit' | 'tag' | 'push' | 'push-tags';

export interface PublishRequest {
  selection: ProjectSelection | null;
  newVersion: string;
  commitMessage: string;
  pushTags: boolean;
}

export interface PublishReport {
  outcome: ActionOutcome;
  /** Steps that succeeded, in order */
  completed: PublishStep[];
  failedStep: PublishStep | null;
}

interface GitStep {
  step: PublishStep;
  run: () => GitResult;
}

export function runPublishSequence(request: PublishRequest): PublishReport {
  const { selection } = request;
  if (!selection) {
    return {
      outcome: failed('precondition', 'Select a project folder and package.json first.'),
      completed: [],
      failedStep: null,
    };
  }

  const version = request.newVersion.trim();
  const message = request.commitMessage.trim();
  if (!version || !message) {
    return {
      outcome: failed('precondition', 'You must enter both the new version and commit message.'),
      completed: [],
      failedStep: null,
    };
  }

  const completed: PublishStep[] = [];

  const written = writeManifestVersion(selection.manifestPath, version);
  if (!written.success) {
    log.error('Manifest update failed', { manifestPath: selection.manifestPath, error: written.message });
    return {
      outcome: failed('parse', `Failed to update ${basename(selection.manifestPath)}: ${written.message}`),
      completed,
      failedStep: 'manifest',
    };
  }
  completed.push('manifest');
  appendGitOutput(`Version updated: ${written.previousVersion ?? 'none'} → ${version}`);

  const cwd = selection.projectDir;
  const tag = `v${version}`;
  const steps: GitStep[] = [
    { step: 'add', run: () => stageFiles(cwd, [basename(selection.manifestPath)]) },
    { step: 'commit', run: () => commit(cwd, message) },
    { step: 'tag', run: () => createTag(cwd, tag) },
    { step: 'push', run: () => pushBranch(cwd) },
  ];
  if (request.pushTags) {
    steps.push({ step: 'push-tags', run: () => pushAllTags(cwd) });
  }

  for (const { step, run } of steps) {
    const result = run();
    if (!result.success) {
      log.error('Publish step failed', { step, error: result.message });
      return { outcome: failed('subprocess', `Error: ${result.message}`), completed, failedStep: step };
    }
    completed.push(step);
  }

  log.info('Published', { version, tag, pushTags: request.pushTags });
  return {
    outcome: succeeded('Version updated, committed, tagged and pushed successfully!'),
    completed,
    failedStep: null,
  };
}
