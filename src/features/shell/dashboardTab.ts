/**
 * Dashboard tab: the three GitHub panels and the PR/issue actions.
 *
 * Actions run as background jobs. While one runs, its questions come in
 * through the session's prompt broker and are answered here, with the
 * spinner paused for each.
 */

import type { ActionOutcome, IssueRecord, PullRequestRecord } from '../../core/models/index.js';
import { answerOnTerminal, selectOption, type PromptRequest } from '../../shared/prompt/index.js';
import { Spinner, blankLine, header, info } from '../../shared/ui/index.js';
import { failed, truncateText } from '../../shared/utils/index.js';
import {
  UNPARSABLE_REMOTE_NOTICE,
  editIssue,
  mergePullRequest,
  postComment,
  reactToIssue,
  setIssueState,
  showReviews,
  submitReview,
  type ActionContext,
} from '../dashboard/index.js';
import type { ShellSession } from './session.js';
import { renderDashboard, renderStatus, renderTitle } from './views.js';

type DashboardMenu = 'refresh' | 'pulls' | 'issues';

type PullRequestAction = 'approve' | 'request-changes' | 'review-comment' | 'reply' | 'merge' | 'reviews';

type IssueAction = 'reply' | 'edit' | 'close' | 'reopen' | 'react';

type DashboardAction = (context: ActionContext) => Promise<ActionOutcome>;

/**
 * Run `action` in the background and answer its prompts until it ends.
 * Reports the outcome on the session.
 */
export async function runDashboardAction(
  session: ShellSession,
  label: string,
  action: DashboardAction,
): Promise<void> {
  const context = session.actionContext();
  if (!context) {
    session.report(failed('precondition', UNPARSABLE_REMOTE_NOTICE));
    return;
  }

  const result: { outcome?: ActionOutcome } = {};
  const spinner = new Spinner(label);
  const job = session.jobs.spawn(label, async () => {
    result.outcome = await action(context);
  });

  spinner.start();
  try {
    await session.broker.serveUntil(job, async (request: PromptRequest) => {
      spinner.stop();
      await answerOnTerminal(request);
      spinner.start();
    });
  } finally {
    spinner.stop();
  }

  if (result.outcome) {
    session.report(result.outcome);
  }
}

function pullRequestLabel(pr: PullRequestRecord): string {
  return `#${pr.number} ${truncateText(pr.title, 50)} (${pr.author}, ${pr.mergeStatus})`;
}

function issueLabel(issue: IssueRecord): string {
  return `#${issue.number} ${truncateText(issue.title, 50)} (${issue.state})`;
}

async function pullRequestMenu(session: ShellSession): Promise<void> {
  const pulls = session.dashboard.getSnapshot().panels.pulls.items;
  if (pulls.length === 0) {
    info('No pull requests loaded.');
    return;
  }
  const picked = await selectOption(
    'Pull request',
    pulls.map((pr) => ({ label: pullRequestLabel(pr), value: String(pr.number) })),
    'Back',
  );
  const pr = pulls.find((candidate) => String(candidate.number) === picked);
  if (!pr) return;

  const action = await selectOption<PullRequestAction>(
    `PR #${pr.number}`,
    [
      { label: 'Approve', value: 'approve' },
      { label: 'Request changes', value: 'request-changes' },
      { label: 'Review comment', value: 'review-comment' },
      { label: 'Reply comment', value: 'reply' },
      { label: 'Merge', value: 'merge' },
      { label: 'Show reviews', value: 'reviews' },
    ],
    'Back',
  );
  if (action === null) return;

  const run: Record<PullRequestAction, DashboardAction> = {
    approve: (context) => submitReview(context, pr, 'APPROVE'),
    'request-changes': (context) => submitReview(context, pr, 'REQUEST_CHANGES'),
    'review-comment': (context) => submitReview(context, pr, 'COMMENT'),
    reply: (context) => postComment(context, { number: pr.number, kind: 'PR' }),
    merge: (context) => mergePullRequest(context, pr),
    reviews: (context) => showReviews(context, pr),
  };
  await runDashboardAction(session, `PR #${pr.number}`, run[action]);
}

async function issueMenu(session: ShellSession): Promise<void> {
  const issues = session.dashboard.getSnapshot().panels.issues.items;
  if (issues.length === 0) {
    info('No issues loaded.');
    return;
  }
  const picked = await selectOption(
    'Issue',
    issues.map((issue) => ({ label: issueLabel(issue), value: String(issue.number) })),
    'Back',
  );
  const issue = issues.find((candidate) => String(candidate.number) === picked);
  if (!issue) return;

  const action = await selectOption<IssueAction>(
    `Issue #${issue.number}`,
    [
      { label: 'Reply', value: 'reply' },
      { label: 'Edit', value: 'edit' },
      { label: 'Close', value: 'close' },
      { label: 'Reopen', value: 'reopen' },
      { label: 'React', value: 'react' },
    ],
    'Back',
  );
  if (action === null) return;

  const run: Record<IssueAction, DashboardAction> = {
    reply: (context) => postComment(context, { number: issue.number, kind: 'issue' }),
    edit: (context) => editIssue(context, issue),
    close: (context) => setIssueState(context, issue, 'closed'),
    reopen: (context) => setIssueState(context, issue, 'open'),
    react: (context) => reactToIssue(context, issue),
  };
  await runDashboardAction(session, `Issue #${issue.number}`, run[action]);
}

export async function dashboardTab(session: ShellSession): Promise<void> {
  for (;;) {
    const snapshot = session.dashboard.getSnapshot();
    header(renderTitle('Dashboard', snapshot));
    renderDashboard(snapshot).forEach((line) => console.log(line));
    blankLine();
    renderStatus(session).forEach((line) => console.log(line));

    const choice = await selectOption<DashboardMenu>(
      'Dashboard',
      [
        { label: 'Refresh', value: 'refresh', description: 'Reload pull requests, issues and commits' },
        { label: 'Pull requests…', value: 'pulls' },
        { label: 'Issues…', value: 'issues' },
      ],
      'Back',
    );
    switch (choice) {
      case null:
        return;
      case 'refresh': {
        const spinner = new Spinner('Loading dashboard…');
        spinner.start();
        try {
          await session.refreshDashboard();
        } finally {
          spinner.stop();
        }
        break;
      }
      case 'pulls':
        await pullRequestMenu(session);
        break;
      case 'issues':
        await issueMenu(session);
        break;
    }
  }
}
