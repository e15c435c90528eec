/**
 * Tests for the dashboard refresh
 */

import { describe, it, expect } from 'vitest';
import type { ProjectSelection } from '../core/models/index.js';
import {
  DashboardStore,
  NO_PROJECT_NOTICE,
  UNPARSABLE_REMOTE_NOTICE,
  commitBranch,
  describeLoadError,
  refreshDashboard,
  type DashboardSource,
} from '../features/dashboard/index.js';
import {
  commitJson,
  createGitHubStub,
  createStubRepository,
  issueJson,
  pullRequestJson,
  type GitHubStub,
} from './helpers/github-stub.js';

function selection(overrides: Partial<ProjectSelection> = {}): ProjectSelection {
  return {
    projectDir: '/work/widgets',
    manifestPath: '/work/widgets/package.json',
    currentVersion: '1.2.0',
    branch: 'main',
    remoteUrl: 'git@github.com:octo/widgets.git',
    ...overrides,
  };
}

function source(stub: GitHubStub, current: ProjectSelection | null): DashboardSource {
  return {
    store: new DashboardStore(),
    getSelection: () => current,
    openRepository: () => createStubRepository(stub),
    defaultBranch: 'main',
    commitLimit: 20,
  };
}

describe('refreshDashboard', () => {
  it('should show the project notice without a selection', async () => {
    const stub = createGitHubStub();
    const dashboard = source(stub, null);

    await refreshDashboard(dashboard);

    expect(dashboard.store.getSnapshot().notice).toBe(NO_PROJECT_NOTICE);
    expect(stub.requests).toHaveLength(0);
  });

  it('should show the parse notice for a remote that is not owner/repo', async () => {
    const stub = createGitHubStub();
    const dashboard = source(stub, selection({ remoteUrl: '/srv/git/widgets' }));

    await refreshDashboard(dashboard);

    expect(dashboard.store.getSnapshot().notice).toBe(UNPARSABLE_REMOTE_NOTICE);
    expect(stub.requests).toHaveLength(0);
  });

  it('should settle with the parse notice for a remote with a broken percent escape', async () => {
    const stub = createGitHubStub();
    const dashboard = source(stub, selection({ remoteUrl: 'https://github.com/octo/wid%get.git' }));

    await refreshDashboard(dashboard);

    expect(dashboard.store.getSnapshot().notice).toBe(UNPARSABLE_REMOTE_NOTICE);
    expect(dashboard.store.getSnapshot().refreshing).toBe(false);
    expect(stub.requests).toHaveLength(0);
  });

  it('should load all three panels', async () => {
    // Given
    const stub = createGitHubStub({
      'GET /repos/octo/widgets/pulls': { status: 200, body: [pullRequestJson(1)] },
      'GET /repos/octo/widgets/issues': { status: 200, body: [issueJson(2), issueJson(3)] },
      'GET /repos/octo/widgets/commits': { status: 200, body: [commitJson('abcdef1234', 'Initial commit')] },
    });
    const dashboard = source(stub, selection());

    // When
    await refreshDashboard(dashboard);

    // Then
    const snapshot = dashboard.store.getSnapshot();
    expect(snapshot.remote).toEqual({ owner: 'octo', repo: 'widgets' });
    expect(snapshot.refreshing).toBe(false);
    expect(snapshot.panels.pulls.items).toHaveLength(1);
    expect(snapshot.panels.issues.items).toHaveLength(2);
    expect(snapshot.panels.commits.items[0]?.shortSha).toBe('abcdef12');
  });

  it('should fail one panel without affecting the others', async () => {
    const stub = createGitHubStub({
      'GET /repos/octo/widgets/pulls': { status: 200, body: [pullRequestJson(1)] },
      'GET /repos/octo/widgets/issues': { status: 410, body: { message: 'Issues are disabled for this repo' } },
      'GET /repos/octo/widgets/commits': { status: 200, body: [] },
    });
    const dashboard = source(stub, selection());

    await refreshDashboard(dashboard);

    const { panels } = dashboard.store.getSnapshot();
    expect(panels.pulls.error).toBeNull();
    expect(panels.issues.error).toBe('Failed to load issues: 410 Issues are disabled for this repo');
    expect(panels.commits).toEqual({ items: [], error: null, loaded: true });
  });

  it('should list commits of the default branch on a detached HEAD', async () => {
    const stub = createGitHubStub({
      'GET /repos/octo/widgets/pulls': { status: 200, body: [] },
      'GET /repos/octo/widgets/issues': { status: 200, body: [] },
      'GET /repos/octo/widgets/commits': { status: 200, body: [] },
    });
    const dashboard = source(stub, selection({ branch: 'HEAD' }));

    await refreshDashboard(dashboard);

    const commitsRequest = stub.requests.find((request) => request.path.endsWith('/commits'));
    expect(commitsRequest?.query.get('sha')).toBe('main');
    expect(commitsRequest?.query.get('per_page')).toBe('20');
  });
});

describe('commitBranch', () => {
  it('should keep a named branch', () => {
    expect(commitBranch(selection({ branch: 'release/2.x' }), 'main')).toBe('release/2.x');
  });

  it('should fall back for Unknown', () => {
    expect(commitBranch(selection({ branch: 'Unknown' }), 'trunk')).toBe('trunk');
  });
});

describe('describeLoadError', () => {
  it('should prefix other errors with Error', () => {
    expect(describeLoadError('PRs', new Error('socket hang up'))).toBe('Error: socket hang up');
  });
});
