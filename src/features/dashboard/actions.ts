/**
 * Pull request and issue actions.
 *
 * Each action asks its questions through a Prompter, makes at most one
 * write call, and then reloads the whole dashboard whatever the outcome.
 * Cancelled prompts and unmet preconditions return before any call and
 * do not reload.
 */

import {
  REACTION_CONTENTS,
  type ActionOutcome,
  type IssueRecord,
  type IssueState,
  type PullRequestRecord,
  type ReactionContent,
  type ReviewEvent,
} from '../../core/models/index.js';
import { formatApiError, isHttpStatusError, type GitHubRepository } from '../../infra/github/index.js';
import type { Prompter, SelectOptionItem } from '../../shared/prompt/index.js';
import { createLogger, failed, getErrorMessage, succeeded } from '../../shared/utils/index.js';

const log = createLogger('dashboard-actions');

export interface ActionContext {
  repository: GitHubRepository;
  prompter: Prompter;
  /** Full dashboard reload */
  refresh: () => Promise<void>;
}

export const CANCELLED = 'Cancelled.';

function apiFailure(prefix: string, err: unknown): ActionOutcome {
  log.warn(prefix, { error: getErrorMessage(err) });
  return failed(isHttpStatusError(err) ? 'api' : 'transport', `${prefix}: ${formatApiError(err)}`);
}

/** Run one write call, then reload regardless of the result */
async function writeThenRefresh(
  context: ActionContext,
  write: () => Promise<void>,
  successMessage: string,
  failurePrefix: string,
): Promise<ActionOutcome> {
  let outcome: ActionOutcome;
  try {
    await write();
    outcome = succeeded(successMessage);
  } catch (err) {
    outcome = apiFailure(failurePrefix, err);
  }
  await context.refresh();
  return outcome;
}

/** APPROVE sends no body; COMMENT and REQUEST_CHANGES ask for one */
export async function submitReview(
  context: ActionContext,
  pr: PullRequestRecord,
  event: ReviewEvent,
): Promise<ActionOutcome> {
  let body: string | undefined;
  if (event !== 'APPROVE') {
    const answer = await context.prompter.multiline(
      event === 'COMMENT' ? 'Enter PR review comment' : 'Describe the changes you request',
    );
    if (answer === null) {
      return succeeded(CANCELLED);
    }
    body = answer;
  }

  return writeThenRefresh(
    context,
    () => context.repository.submitReview(pr.number, event, body),
    `${event} sent for PR #${pr.number}`,
    'Failed',
  );
}

export async function mergePullRequest(context: ActionContext, pr: PullRequestRecord): Promise<ActionOutcome> {
  const confirmed = await context.prompter.confirm(`Merge PR #${pr.number} "${pr.title}"?`, false);
  if (!confirmed) {
    return succeeded(CANCELLED);
  }
  return writeThenRefresh(
    context,
    () => context.repository.mergePullRequest(pr.number),
    `Merged PR #${pr.number}`,
    'Merge failed',
  );
}

/** Comment on a PR or an issue; both go through the issue comments endpoint */
export async function postComment(
  context: ActionContext,
  target: { number: number; kind: 'PR' | 'issue' },
): Promise<ActionOutcome> {
  const body = await context.prompter.multiline('Type comment to post');
  if (!body) {
    return succeeded(CANCELLED);
  }
  return writeThenRefresh(
    context,
    () => context.repository.createIssueComment(target.number, body),
    `Comment posted on ${target.kind} #${target.number}`,
    'Failed',
  );
}

/** `login: STATE (body)` per review, or `No reviews.` */
export function formatReviews(reviews: readonly { author: string; state: string; body: string }[]): string {
  if (reviews.length === 0) {
    return 'No reviews.';
  }
  return reviews.map((review) => `${review.author}: ${review.state} (${review.body})`).join('\n');
}

export async function showReviews(context: ActionContext, pr: PullRequestRecord): Promise<ActionOutcome> {
  try {
    const reviews = await context.repository.listReviews(pr.number);
    return succeeded(`PR #${pr.number} Reviews\n${formatReviews(reviews)}`);
  } catch (err) {
    return apiFailure('Error', err);
  }
}

/** Empty answers keep the current title or body */
export async function editIssue(context: ActionContext, issue: IssueRecord): Promise<ActionOutcome> {
  const title = (await context.prompter.input('New title', issue.title)) ?? issue.title;
  const body = (await context.prompter.multiline('New body')) ?? issue.body;

  return writeThenRefresh(
    context,
    () => context.repository.updateIssue(issue.number, { title, body }),
    'Issue edited.',
    'Edit failed',
  );
}

/** No call at all when the issue is already in `state` */
export async function setIssueState(
  context: ActionContext,
  issue: IssueRecord,
  state: IssueState,
): Promise<ActionOutcome> {
  if (issue.state === state) {
    return failed('precondition', 'Issue already in that state.');
  }
  return writeThenRefresh(
    context,
    () => context.repository.updateIssue(issue.number, { state }),
    `Issue #${issue.number} marked ${state}`,
    'Failed to update issue',
  );
}

const REACTION_OPTIONS: SelectOptionItem<ReactionContent>[] = REACTION_CONTENTS.map((content) => ({
  label: content,
  value: content,
}));

type ReactionTarget = 'issue' | 'comment';

/** React to the issue itself or to its most recent comment */
export async function reactToIssue(context: ActionContext, issue: IssueRecord): Promise<ActionOutcome> {
  const target = await context.prompter.select<ReactionTarget>(`React to issue #${issue.number} or its last comment?`, [
    { label: 'Issue', value: 'issue' },
    { label: 'Last comment', value: 'comment' },
  ]);
  if (target === null) {
    return succeeded(CANCELLED);
  }

  let commentId: number | null = null;
  if (target === 'comment') {
    try {
      const comments = await context.repository.listIssueComments(issue.number);
      const last = comments[comments.length - 1];
      if (!last) {
        return failed('precondition', 'No comments to react to!');
      }
      commentId = last.id;
    } catch (err) {
      return apiFailure('Failed', err);
    }
  }

  const content = await context.prompter.select('Reaction', REACTION_OPTIONS);
  if (content === null) {
    return succeeded(CANCELLED);
  }

  return writeThenRefresh(
    context,
    () =>
      commentId === null
        ? context.repository.reactToIssue(issue.number, content)
        : context.repository.reactToIssueComment(commentId, content),
    `Reacted to ${target}!`,
    'Failed',
  );
}
