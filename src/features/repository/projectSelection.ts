/**
 * Choosing the project: find the manifest under a folder, read its
 * version, and look up the branch and origin of its directory.
 */

import { existsSync, statSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { ActionOutcome, ManifestConfig, ProjectSelection } from '../../core/models/index.js';
import { getBranchName, getRemoteUrl } from '../../infra/git/index.js';
import { findManifests, readManifest } from '../../infra/manifest/index.js';
import { createLogger, failed, succeeded } from '../../shared/utils/index.js';

const log = createLogger('project');

/** Picks one manifest out of several; null when the user gives up */
export type ManifestPicker = (candidates: string[]) => Promise<string | null>;

export interface ProjectChoice {
  outcome: ActionOutcome;
  selection: ProjectSelection | null;
}

/** Selection for an already chosen manifest */
export function loadProject(manifestPath: string): ProjectChoice {
  const manifest = readManifest(manifestPath);
  if (!manifest.success) {
    return {
      outcome: failed('parse', `Error reading ${manifestPath}: ${manifest.message}`),
      selection: null,
    };
  }

  const projectDir = dirname(manifestPath);
  const branch = getBranchName(projectDir) ?? 'Unknown';
  const remoteUrl = getRemoteUrl(projectDir);
  const selection: ProjectSelection = {
    projectDir,
    manifestPath,
    currentVersion: manifest.version,
    branch,
    remoteUrl,
  };

  log.info('Project selected', { ...selection });
  return {
    outcome: succeeded(
      `Manifest: ${manifestPath}\nVersion: ${manifest.version}\nBranch: ${branch} Remote: ${remoteUrl ?? 'None set'}`,
    ),
    selection,
  };
}

/**
 * Search `folder` for manifests and select one. A single match is taken
 * directly; several go through `pick`.
 */
export async function chooseProject(
  folder: string,
  config: ManifestConfig,
  pick: ManifestPicker,
): Promise<ProjectChoice> {
  const root = resolve(folder);
  if (!existsSync(root) || !statSync(root).isDirectory()) {
    return { outcome: failed('precondition', `Not a folder: ${root}`), selection: null };
  }

  const candidates = findManifests(root, config);
  if (candidates.length === 0) {
    return {
      outcome: failed('precondition', `No ${config.fileName} found anywhere under that folder.`),
      selection: null,
    };
  }

  const chosen = candidates.length === 1 ? candidates[0] : await pick(candidates);
  if (!chosen) {
    return { outcome: failed('precondition', 'No file selected.'), selection: null };
  }

  return loadProject(chosen);
}
