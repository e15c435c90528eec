/**
 * Tests for pull request and issue actions
 */

import { describe, it, expect } from 'vitest';
import type { IssueRecord, PullRequestRecord } from '../core/models/index.js';
import {
  CANCELLED,
  editIssue,
  formatReviews,
  mergePullRequest,
  postComment,
  reactToIssue,
  setIssueState,
  showReviews,
  submitReview,
  type ActionContext,
} from '../features/dashboard/index.js';
import { createGitHubStub, createStubRepository, type GitHubStub, type StubRoute } from './helpers/github-stub.js';
import { createScriptedPrompter, type ScriptedAnswer } from './helpers/scripted-prompter.js';

const pr: PullRequestRecord = {
  number: 4,
  title: 'Add dark mode',
  author: 'alice',
  state: 'open',
  createdAt: '2024-05-01T10:00:00Z',
  mergeStatus: 'unmerged',
};

const openIssue: IssueRecord = {
  number: 3,
  title: 'Crash on start',
  author: 'bob',
  state: 'open',
  createdAt: '2024-04-02T08:30:00Z',
  body: 'Steps to reproduce',
};

interface Harness {
  stub: GitHubStub;
  context: ActionContext;
  refreshes: () => number;
  asked: string[];
}

function harness(answers: ScriptedAnswer[], routes: Record<string, StubRoute> = {}): Harness {
  const stub = createGitHubStub(routes);
  const prompter = createScriptedPrompter(answers);
  let refreshes = 0;
  return {
    stub,
    asked: prompter.asked,
    refreshes: () => refreshes,
    context: {
      repository: createStubRepository(stub),
      prompter,
      refresh: async () => {
        refreshes += 1;
      },
    },
  };
}

describe('setIssueState', () => {
  it('should make no call when the issue is already in that state', async () => {
    const { stub, context, refreshes } = harness([]);

    const outcome = await setIssueState(context, openIssue, 'open');

    expect(outcome).toEqual({ ok: false, kind: 'precondition', message: 'Issue already in that state.' });
    expect(stub.requests).toHaveLength(0);
    expect(refreshes()).toBe(0);
  });

  it('should send exactly one PATCH and refresh', async () => {
    const { stub, context, refreshes } = harness([], {
      'PATCH /repos/octo/widgets/issues/3': { status: 200, body: {} },
    });

    const outcome = await setIssueState(context, openIssue, 'closed');

    expect(outcome).toEqual({ ok: true, message: 'Issue #3 marked closed' });
    expect(stub.writes()).toHaveLength(1);
    expect(stub.writes()[0]?.body).toEqual({ state: 'closed' });
    expect(refreshes()).toBe(1);
  });

  it('should refresh even when the PATCH fails', async () => {
    const { context, refreshes } = harness([], {
      'PATCH /repos/octo/widgets/issues/3': { status: 403, body: { message: 'Must have admin rights' } },
    });

    const outcome = await setIssueState(context, openIssue, 'closed');

    expect(outcome).toEqual({
      ok: false,
      kind: 'api',
      message: 'Failed to update issue: 403 Must have admin rights',
    });
    expect(refreshes()).toBe(1);
  });
});

describe('submitReview', () => {
  it('should approve without asking for a body', async () => {
    const { stub, context, asked } = harness([], {
      'POST /repos/octo/widgets/pulls/4/reviews': { status: 200, body: {} },
    });

    const outcome = await submitReview(context, pr, 'APPROVE');

    expect(asked).toEqual([]);
    expect(outcome.message).toBe('APPROVE sent for PR #4');
    expect(stub.writes()[0]?.body).toEqual({ event: 'APPROVE' });
  });

  it('should ask what to change for REQUEST_CHANGES', async () => {
    const { stub, context, asked } = harness(['Please split this up'], {
      'POST /repos/octo/widgets/pulls/4/reviews': { status: 200, body: {} },
    });

    await submitReview(context, pr, 'REQUEST_CHANGES');

    expect(asked).toEqual(['Describe the changes you request']);
    expect(stub.writes()[0]?.body).toEqual({ event: 'REQUEST_CHANGES', body: 'Please split this up' });
  });

  it('should make no call when the comment prompt is cancelled', async () => {
    const { stub, context, refreshes } = harness([null]);

    const outcome = await submitReview(context, pr, 'COMMENT');

    expect(outcome).toEqual({ ok: true, message: CANCELLED });
    expect(stub.requests).toHaveLength(0);
    expect(refreshes()).toBe(0);
  });
});

describe('mergePullRequest', () => {
  it('should not merge without confirmation', async () => {
    const { stub, context } = harness([false]);

    const outcome = await mergePullRequest(context, pr);

    expect(outcome.message).toBe(CANCELLED);
    expect(stub.requests).toHaveLength(0);
  });

  it('should report a refused merge', async () => {
    const { context, refreshes } = harness([true], {
      'PUT /repos/octo/widgets/pulls/4/merge': { status: 405, body: { message: 'Pull Request is not mergeable' } },
    });

    const outcome = await mergePullRequest(context, pr);

    expect(outcome.message).toBe('Merge failed: 405 Pull Request is not mergeable');
    expect(refreshes()).toBe(1);
  });
});

describe('postComment', () => {
  it('should comment on a pull request through the issues endpoint', async () => {
    const { stub, context } = harness(['Looks good'], {
      'POST /repos/octo/widgets/issues/4/comments': { status: 201, body: { id: 1 } },
    });

    const outcome = await postComment(context, { number: 4, kind: 'PR' });

    expect(outcome.message).toBe('Comment posted on PR #4');
    expect(stub.writes()[0]?.body).toEqual({ body: 'Looks good' });
  });

  it('should treat an empty comment as cancelled', async () => {
    const { stub, context } = harness(['']);

    const outcome = await postComment(context, { number: 3, kind: 'issue' });

    expect(outcome.message).toBe(CANCELLED);
    expect(stub.requests).toHaveLength(0);
  });
});

describe('showReviews', () => {
  it('should list reviews without refreshing', async () => {
    const { context, refreshes } = harness([], {
      'GET /repos/octo/widgets/pulls/4/reviews': {
        status: 200,
        body: [
          { user: { login: 'carol' }, state: 'APPROVED', body: 'Ship it' },
          { user: { login: 'dave' }, state: 'COMMENTED', body: null },
        ],
      },
    });

    const outcome = await showReviews(context, pr);

    expect(outcome.message).toBe('PR #4 Reviews\ncarol: APPROVED (Ship it)\ndave: COMMENTED ()');
    expect(refreshes()).toBe(0);
  });

  it('should say so when there are none', () => {
    expect(formatReviews([])).toBe('No reviews.');
  });
});

describe('editIssue', () => {
  it('should keep the current body when the body prompt is cancelled', async () => {
    const { stub, context } = harness(['Crash on start with empty config', null], {
      'PATCH /repos/octo/widgets/issues/3': { status: 200, body: {} },
    });

    const outcome = await editIssue(context, openIssue);

    expect(outcome.message).toBe('Issue edited.');
    expect(stub.writes()[0]?.body).toEqual({
      title: 'Crash on start with empty config',
      body: 'Steps to reproduce',
    });
  });
});

describe('reactToIssue', () => {
  it('should react to the issue itself', async () => {
    const { stub, context } = harness(['issue', 'rocket'], {
      'POST /repos/octo/widgets/issues/3/reactions': { status: 201, body: { id: 1, content: 'rocket' } },
    });

    const outcome = await reactToIssue(context, openIssue);

    expect(outcome.message).toBe('Reacted to issue!');
    expect(stub.writes()[0]?.body).toEqual({ content: 'rocket' });
  });

  it('should react to the most recent comment', async () => {
    const { stub, context } = harness(['comment', 'heart'], {
      'GET /repos/octo/widgets/issues/3/comments': {
        status: 200,
        body: [
          { id: 21, user: { login: 'alice' }, body: 'first' },
          { id: 22, user: { login: 'bob' }, body: 'latest' },
        ],
      },
      'POST /repos/octo/widgets/issues/comments/22/reactions': { status: 201, body: { id: 1, content: 'heart' } },
    });

    const outcome = await reactToIssue(context, openIssue);

    expect(outcome.message).toBe('Reacted to comment!');
    expect(stub.writes().map((request) => request.path)).toEqual([
      '/repos/octo/widgets/issues/comments/22/reactions',
    ]);
  });

  it('should stop when the issue has no comments', async () => {
    const { stub, context, refreshes } = harness(['comment'], {
      'GET /repos/octo/widgets/issues/3/comments': { status: 200, body: [] },
    });

    const outcome = await reactToIssue(context, openIssue);

    expect(outcome).toEqual({ ok: false, kind: 'precondition', message: 'No comments to react to!' });
    expect(stub.writes()).toHaveLength(0);
    expect(refreshes()).toBe(0);
  });
});
