/**
 * Dashboard refresh: one remote parse and three independent reads.
 */

import type { ProjectSelection } from '../../core/models/index.js';
import {
  formatApiError,
  isHttpStatusError,
  parseOwnerRepo,
  type RepositoryFactory,
} from '../../infra/github/index.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';
import type { DashboardStore, PanelResult } from './store.js';

const log = createLogger('dashboard');

export const NO_PROJECT_NOTICE = 'Load/select a project to get dashboard';
export const UNPARSABLE_REMOTE_NOTICE = "Couldn't parse owner/repo from origin URL.";

export interface DashboardSource {
  store: DashboardStore;
  getSelection: () => ProjectSelection | null;
  openRepository: RepositoryFactory;
  /** Used when the local branch is unknown */
  defaultBranch: string;
  commitLimit: number;
}

/** Panel error text: `Failed to load PRs: 404` for HTTP errors, `Error: ...` otherwise */
export function describeLoadError(label: string, err: unknown): string {
  if (isHttpStatusError(err)) {
    return `Failed to load ${label}: ${formatApiError(err)}`;
  }
  return `Error: ${getErrorMessage(err)}`;
}

async function fetchPanel<T>(label: string, load: () => Promise<T[]>): Promise<PanelResult<T>> {
  try {
    return { success: true, items: await load() };
  } catch (err) {
    log.warn('Panel load failed', { label, error: getErrorMessage(err) });
    return { success: false, error: describeLoadError(label, err) };
  }
}

/** Branch whose commits are listed */
export function commitBranch(selection: ProjectSelection, defaultBranch: string): string {
  return selection.branch && selection.branch !== 'Unknown' && selection.branch !== 'HEAD'
    ? selection.branch
    : defaultBranch;
}

/**
 * Re-read the remote from the current selection and reload all three
 * panels. Never rejects: every failure lands in the store.
 */
export async function refreshDashboard(source: DashboardSource): Promise<void> {
  const { store } = source;
  const generation = store.beginRefresh();

  const selection = source.getSelection();
  if (!selection || !selection.remoteUrl) {
    store.showNotice(generation, NO_PROJECT_NOTICE);
    return;
  }

  const identity = parseOwnerRepo(selection.remoteUrl);
  if (!identity) {
    store.showNotice(generation, UNPARSABLE_REMOTE_NOTICE);
    return;
  }

  store.setRemote(generation, identity);
  const repository = source.openRepository(identity);
  const branch = commitBranch(selection, source.defaultBranch);

  log.debug('Refreshing dashboard', { ...identity, branch, generation });

  await Promise.all([
    fetchPanel('PRs', () => repository.listPullRequests()).then((result) =>
      store.applyPanel(generation, { key: 'pulls', result }),
    ),
    fetchPanel('issues', () => repository.listIssues()).then((result) =>
      store.applyPanel(generation, { key: 'issues', result }),
    ),
    fetchPanel('commits', () => repository.listCommits(branch, source.commitLimit)).then((result) =>
      store.applyPanel(generation, { key: 'commits', result }),
    ),
  ]);

  store.finishRefresh(generation);
}
