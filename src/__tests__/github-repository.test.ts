/**
 * Tests for GitHubRepository against an in-process API stub
 */

import { describe, it, expect } from 'vitest';
import { GitHubResponseError, formatApiError, isHttpStatusError } from '../infra/github/index.js';
import {
  commitJson,
  createGitHubStub,
  createStubRepository,
  issueJson,
  pullRequestJson,
} from './helpers/github-stub.js';

describe('GitHubRepository', () => {
  describe('listPullRequests', () => {
    it('should map merge status from merged_at and draft', async () => {
      // Given
      const stub = createGitHubStub({
        'GET /repos/octo/widgets/pulls': {
          status: 200,
          body: [
            pullRequestJson(1, { merged_at: '2024-05-02T00:00:00Z' }),
            pullRequestJson(2, { draft: true }),
            pullRequestJson(3),
          ],
        },
      });
      const repository = createStubRepository(stub);

      // When
      const pulls = await repository.listPullRequests();

      // Then
      expect(pulls.map((pr) => pr.mergeStatus)).toEqual(['merged', 'draft', 'unmerged']);
      expect(pulls[0]).toEqual({
        number: 1,
        title: 'Pull request 1',
        author: 'alice',
        state: 'open',
        createdAt: '2024-05-01T10:00:00Z',
        mergeStatus: 'merged',
      });
    });

    it('should show a deleted user as ghost', async () => {
      const stub = createGitHubStub({
        'GET /repos/octo/widgets/pulls': { status: 200, body: [pullRequestJson(7, { user: null })] },
      });

      const pulls = await createStubRepository(stub).listPullRequests();

      expect(pulls[0]?.author).toBe('ghost');
    });

    it('should reject a payload missing required fields', async () => {
      const stub = createGitHubStub({
        'GET /repos/octo/widgets/pulls': { status: 200, body: [{ number: 1 }] },
      });

      await expect(createStubRepository(stub).listPullRequests()).rejects.toBeInstanceOf(GitHubResponseError);
    });

    it('should propagate HTTP errors with their status', async () => {
      const stub = createGitHubStub({
        'GET /repos/octo/widgets/pulls': { status: 403, body: { message: 'API rate limit exceeded' } },
      });

      const error: unknown = await createStubRepository(stub).listPullRequests().catch((err: unknown) => err);

      expect(isHttpStatusError(error)).toBe(true);
      expect(formatApiError(error)).toBe('403 API rate limit exceeded');
    });
  });

  describe('listIssues', () => {
    it('should request every state and drop pull requests', async () => {
      // Given
      const stub = createGitHubStub({
        'GET /repos/octo/widgets/issues': {
          status: 200,
          body: [
            issueJson(10),
            issueJson(11, { pull_request: { url: 'https://api.github.test/repos/octo/widgets/pulls/11' } }),
            issueJson(12, { state: 'closed', body: null }),
          ],
        },
      });

      // When
      const issues = await createStubRepository(stub).listIssues();

      // Then
      expect(issues.map((issue) => issue.number)).toEqual([10, 12]);
      expect(issues[1]?.body).toBe('');
      expect(issues[1]?.state).toBe('closed');
      expect(stub.requests[0]?.query.get('state')).toBe('all');
    });
  });

  describe('listCommits', () => {
    it('should pass branch and limit and shorten each commit', async () => {
      // Given
      const longMessage = 'Rework the settings loader so defaults apply per key and more\n\nDetails here';
      const stub = createGitHubStub({
        'GET /repos/octo/widgets/commits': {
          status: 200,
          body: [commitJson('0123456789abcdef', longMessage)],
        },
      });

      // When
      const commits = await createStubRepository(stub).listCommits('develop', 5);

      // Then
      expect(stub.requests[0]?.query.get('sha')).toBe('develop');
      expect(stub.requests[0]?.query.get('per_page')).toBe('5');
      expect(commits).toEqual([
        {
          shortSha: '01234567',
          author: 'Carol',
          message: 'Rework the settings loader so defaults apply per k',
          date: '2024-03-15',
        },
      ]);
    });
  });

  describe('writes', () => {
    it('should send APPROVE without a body', async () => {
      const stub = createGitHubStub({
        'POST /repos/octo/widgets/pulls/4/reviews': { status: 200, body: { id: 1 } },
      });

      await createStubRepository(stub).submitReview(4, 'APPROVE');

      expect(stub.writes()).toHaveLength(1);
      expect(stub.writes()[0]?.body).toEqual({ event: 'APPROVE' });
    });

    it('should send a review body when given', async () => {
      const stub = createGitHubStub({
        'POST /repos/octo/widgets/pulls/4/reviews': { status: 200, body: { id: 1 } },
      });

      await createStubRepository(stub).submitReview(4, 'REQUEST_CHANGES', 'Please add tests');

      expect(stub.writes()[0]?.body).toEqual({ event: 'REQUEST_CHANGES', body: 'Please add tests' });
    });

    it('should merge through PUT', async () => {
      const stub = createGitHubStub({
        'PUT /repos/octo/widgets/pulls/9/merge': { status: 200, body: { merged: true } },
      });

      await createStubRepository(stub).mergePullRequest(9);

      expect(stub.writes().map((request) => `${request.method} ${request.path}`)).toEqual([
        'PUT /repos/octo/widgets/pulls/9/merge',
      ]);
    });

    it('should patch only the given issue fields', async () => {
      const stub = createGitHubStub({
        'PATCH /repos/octo/widgets/issues/3': { status: 200, body: issueJson(3, { state: 'closed' }) },
      });

      await createStubRepository(stub).updateIssue(3, { state: 'closed' });

      expect(stub.writes()[0]?.body).toEqual({ state: 'closed' });
    });

    it('should react to an issue comment by id', async () => {
      const stub = createGitHubStub({
        'POST /repos/octo/widgets/issues/comments/55/reactions': { status: 201, body: { id: 2, content: 'heart' } },
      });

      await createStubRepository(stub).reactToIssueComment(55, 'heart');

      expect(stub.writes()[0]?.body).toEqual({ content: 'heart' });
    });
  });

  describe('listIssueComments', () => {
    it('should map comments oldest first', async () => {
      const stub = createGitHubStub({
        'GET /repos/octo/widgets/issues/3/comments': {
          status: 200,
          body: [
            { id: 1, user: { login: 'alice' }, body: 'first' },
            { id: 2, user: null, body: 'second' },
          ],
        },
      });

      const comments = await createStubRepository(stub).listIssueComments(3);

      expect(comments).toEqual([
        { id: 1, author: 'alice', body: 'first' },
        { id: 2, author: 'ghost', body: 'second' },
      ]);
      expect(stub.requests[0]?.query.get('per_page')).toBe('100');
    });
  });
});
