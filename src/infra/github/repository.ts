/**
 * GitHub REST access for one repository.
 *
 * Every response is validated against the schemas in core/models before
 * it is mapped to a dashboard record. HTTP failures propagate as the
 * errors Octokit throws; formatApiError renders them.
 */

import type { Octokit } from '@octokit/rest';
import { z } from 'zod/v4';
import {
  CommitResponseSchema,
  IssueCommentResponseSchema,
  IssueResponseSchema,
  PullRequestResponseSchema,
  ReviewResponseSchema,
} from '../../core/models/index.js';
import type {
  CommitRecord,
  CommitResponse,
  IssueCommentRecord,
  IssueRecord,
  IssueResponse,
  IssueState,
  PullRequestRecord,
  PullRequestResponse,
  ReactionContent,
  RemoteIdentity,
  ReviewEvent,
  ReviewRecord,
} from '../../core/models/index.js';
import { createLogger, firstLine } from '../../shared/utils/index.js';
import { GitHubResponseError } from './errors.js';

const log = createLogger('github');

const COMMIT_MESSAGE_LENGTH = 50;

/** Fields of an issue that can be changed in one PATCH */
export interface IssuePatch {
  title?: string;
  body?: string;
  state?: IssueState;
}

function parseList<T extends z.ZodType>(schema: T, resource: string, data: unknown): z.infer<T>[] {
  const parsed = z.array(schema).safeParse(data);
  if (!parsed.success) {
    throw new GitHubResponseError(resource, z.prettifyError(parsed.error));
  }
  return parsed.data;
}

function login(user: { login: string } | null): string {
  return user?.login ?? 'ghost';
}

export function toPullRequestRecord(pr: PullRequestResponse): PullRequestRecord {
  return {
    number: pr.number,
    title: pr.title,
    author: login(pr.user),
    state: pr.state,
    createdAt: pr.created_at,
    mergeStatus: pr.merged_at ? 'merged' : pr.draft ? 'draft' : 'unmerged',
  };
}

export function toIssueRecord(issue: IssueResponse): IssueRecord {
  return {
    number: issue.number,
    title: issue.title,
    author: login(issue.user),
    state: issue.state,
    createdAt: issue.created_at,
    body: issue.body ?? '',
  };
}

export function toCommitRecord(commit: CommitResponse): CommitRecord {
  return {
    shortSha: commit.sha.slice(0, 8),
    author: commit.commit.author?.name ?? 'unknown',
    message: firstLine(commit.commit.message).slice(0, COMMIT_MESSAGE_LENGTH),
    date: commit.commit.committer?.date.slice(0, 10) ?? '',
  };
}

export class GitHubRepository {
  constructor(
    private readonly octokit: Octokit,
    readonly identity: RemoteIdentity,
  ) {}

  async listPullRequests(): Promise<PullRequestRecord[]> {
    const { data } = await this.octokit.rest.pulls.list({ ...this.identity });
    return parseList(PullRequestResponseSchema, 'pull request list', data).map(toPullRequestRecord);
  }

  /** Issues in every state; pull requests returned by the endpoint are dropped */
  async listIssues(): Promise<IssueRecord[]> {
    const { data } = await this.octokit.rest.issues.listForRepo({ ...this.identity, state: 'all' });
    return parseList(IssueResponseSchema, 'issue list', data)
      .filter((issue) => issue.pull_request === undefined)
      .map(toIssueRecord);
  }

  async listCommits(branch: string, limit: number): Promise<CommitRecord[]> {
    const { data } = await this.octokit.rest.repos.listCommits({
      ...this.identity,
      sha: branch,
      per_page: limit,
    });
    return parseList(CommitResponseSchema, 'commit list', data).map(toCommitRecord);
  }

  async listReviews(pullNumber: number): Promise<ReviewRecord[]> {
    const { data } = await this.octokit.rest.pulls.listReviews({ ...this.identity, pull_number: pullNumber });
    return parseList(ReviewResponseSchema, 'review list', data).map((review) => ({
      author: login(review.user),
      state: review.state,
      body: review.body ?? '',
    }));
  }

  async submitReview(pullNumber: number, event: ReviewEvent, body?: string): Promise<void> {
    log.info('Submitting review', { pullNumber, event });
    await this.octokit.rest.pulls.createReview({
      ...this.identity,
      pull_number: pullNumber,
      event,
      ...(body !== undefined ? { body } : {}),
    });
  }

  async mergePullRequest(pullNumber: number): Promise<void> {
    log.info('Merging pull request', { pullNumber });
    await this.octokit.rest.pulls.merge({ ...this.identity, pull_number: pullNumber });
  }

  async createIssueComment(issueNumber: number, body: string): Promise<void> {
    await this.octokit.rest.issues.createComment({ ...this.identity, issue_number: issueNumber, body });
  }

  async updateIssue(issueNumber: number, patch: IssuePatch): Promise<void> {
    log.info('Updating issue', { issueNumber, fields: Object.keys(patch) });
    await this.octokit.rest.issues.update({ ...this.identity, issue_number: issueNumber, ...patch });
  }

  /** All comments on an issue, oldest first */
  async listIssueComments(issueNumber: number): Promise<IssueCommentRecord[]> {
    const data = await this.octokit.paginate(this.octokit.rest.issues.listComments, {
      ...this.identity,
      issue_number: issueNumber,
      per_page: 100,
    });
    return parseList(IssueCommentResponseSchema, 'issue comment list', data).map((comment) => ({
      id: comment.id,
      author: login(comment.user),
      body: comment.body ?? '',
    }));
  }

  async reactToIssue(issueNumber: number, content: ReactionContent): Promise<void> {
    await this.octokit.rest.reactions.createForIssue({ ...this.identity, issue_number: issueNumber, content });
  }

  async reactToIssueComment(commentId: number, content: ReactionContent): Promise<void> {
    await this.octokit.rest.reactions.createForIssueComment({ ...this.identity, comment_id: commentId, content });
  }
}
