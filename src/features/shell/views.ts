/**
 * Text rendering for the shell tabs. Pure: every function returns lines.
 */

import chalk from 'chalk';
import type { CommitRecord, IssueRecord, PullRequestRecord } from '../../core/models/index.js';
import { renderTable, type TableColumn } from '../../shared/ui/index.js';
import { formatBadge, type DashboardSnapshot, type PanelState } from '../dashboard/index.js';
import { formatRemoteIdentity } from '../../infra/github/index.js';
import type { ShellSession } from './session.js';

const PR_COLUMNS: TableColumn[] = [
  { header: '#', width: 6 },
  { header: 'Title', width: 40 },
  { header: 'User', width: 16 },
  { header: 'Status', width: 8 },
  { header: 'Merge', width: 9 },
  { header: 'Date', width: 10 },
];

const ISSUE_COLUMNS: TableColumn[] = [
  { header: '#', width: 6 },
  { header: 'Title', width: 45 },
  { header: 'User', width: 16 },
  { header: 'State', width: 7 },
  { header: 'Date', width: 10 },
];

const COMMIT_COLUMNS: TableColumn[] = [
  { header: 'SHA', width: 8 },
  { header: 'Author', width: 18 },
  { header: 'Msg', width: 50 },
  { header: 'Date', width: 10 },
];

export function pullRequestRow(pr: PullRequestRecord): string[] {
  return [`#${pr.number}`, pr.title, pr.author, pr.state, pr.mergeStatus, pr.createdAt.slice(0, 10)];
}

export function issueRow(issue: IssueRecord): string[] {
  return [`#${issue.number}`, issue.title, issue.author, issue.state, issue.createdAt.slice(0, 10)];
}

export function commitRow(commit: CommitRecord): string[] {
  return [commit.shortSha, commit.author, commit.message, commit.date];
}

function renderPanel<T>(
  title: string,
  panel: PanelState<T>,
  columns: TableColumn[],
  toRow: (item: T) => string[],
): string[] {
  const lines = [chalk.bold.underline(title)];
  if (panel.error) {
    lines.push(chalk.red(panel.error));
  }
  if (panel.items.length > 0) {
    lines.push(...renderTable(columns, panel.items.map(toRow)));
  } else if (panel.loaded) {
    lines.push(chalk.gray('(none)'));
  } else if (!panel.error) {
    lines.push(chalk.gray('(not loaded)'));
  }
  return lines;
}

export function renderDashboard(snapshot: DashboardSnapshot): string[] {
  const lines: string[] = [];
  if (snapshot.remote) {
    lines.push(chalk.cyan(formatRemoteIdentity(snapshot.remote)) + (snapshot.refreshing ? chalk.gray(' (refreshing…)') : ''));
  }
  if (snapshot.notice) {
    lines.push(chalk.yellow(snapshot.notice));
    return lines;
  }
  const { pulls, issues, commits } = snapshot.panels;
  lines.push(
    '',
    ...renderPanel('Pull Requests', pulls, PR_COLUMNS, pullRequestRow),
    '',
    ...renderPanel('Issues', issues, ISSUE_COLUMNS, issueRow),
    '',
    ...renderPanel('Recent Commits', commits, COMMIT_COLUMNS, commitRow),
  );
  return lines;
}

/** Title bar: app name plus the dashboard badge when there is one */
export function renderTitle(title: string, snapshot: DashboardSnapshot): string {
  const badge = formatBadge(snapshot);
  return badge ? `${title}  ${chalk.bgMagenta.white.bold(` ${badge} `)}` : title;
}

export function renderProject(session: ShellSession): string[] {
  const { selection } = session;
  if (!selection) {
    return [`${chalk.gray('Project')}: (None selected)`];
  }
  return [
    `${chalk.gray('Project')}: ${chalk.blue(selection.projectDir)}`,
    `${chalk.gray('Manifest')}: ${selection.manifestPath}`,
    `${chalk.gray('Version')}: ${selection.currentVersion}`,
    `${chalk.gray('Branch')}: ${selection.branch}`,
    `${chalk.gray('Remote')}: ${selection.remoteUrl ?? 'None set'}`,
    `${chalk.gray('Tag')}: ${session.tags.selected ?? '(none)'}  ${chalk.gray('Push tags')}: ${session.pushTags ? 'on' : 'off'}`,
  ];
}

export function renderStatus(session: ShellSession): string[] {
  if (!session.lastOutcome) {
    return [];
  }
  const color = session.lastOutcome.ok ? chalk.green : chalk.red;
  return session.lastOutcome.message.split('\n').map((line) => color(line));
}
