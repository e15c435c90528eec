/**
 * Dashboard panel state.
 *
 * Each refresh takes a generation number; results from an older
 * generation are dropped. A panel is replaced whole on success. On
 * failure it keeps its last good list and records the error.
 */

import type {
  CommitRecord,
  IssueRecord,
  PullRequestRecord,
  RemoteIdentity,
} from '../../core/models/index.js';

interface PanelItems {
  pulls: PullRequestRecord;
  issues: IssueRecord;
  commits: CommitRecord;
}

export type PanelKey = keyof PanelItems;

export interface PanelState<T> {
  items: readonly T[];
  /** Error of the latest fetch; null once a fetch succeeds */
  error: string | null;
  /** At least one fetch has succeeded */
  loaded: boolean;
}

export type Panels = { [K in PanelKey]: PanelState<PanelItems[K]> };

export type PanelResult<T> = { success: true; items: T[] } | { success: false; error: string };

export type PanelUpdate =
  | { key: 'pulls'; result: PanelResult<PullRequestRecord> }
  | { key: 'issues'; result: PanelResult<IssueRecord> }
  | { key: 'commits'; result: PanelResult<CommitRecord> };

export interface DashboardSnapshot {
  remote: RemoteIdentity | null;
  /** Why there is nothing to show (no project, unparsable remote) */
  notice: string | null;
  refreshing: boolean;
  panels: Panels;
}

function nextPanel<T>(previous: PanelState<T>, result: PanelResult<T>): PanelState<T> {
  return result.success
    ? { items: result.items, error: null, loaded: true }
    : { items: previous.items, error: result.error, loaded: previous.loaded };
}

function emptyPanels(): Panels {
  return {
    pulls: { items: [], error: null, loaded: false },
    issues: { items: [], error: null, loaded: false },
    commits: { items: [], error: null, loaded: false },
  };
}

export class DashboardStore {
  private generation = 0;
  private snapshot: DashboardSnapshot = {
    remote: null,
    notice: null,
    refreshing: false,
    panels: emptyPanels(),
  };

  getSnapshot(): DashboardSnapshot {
    return this.snapshot;
  }

  /** Start a refresh; later calls supersede it */
  beginRefresh(): number {
    this.generation += 1;
    this.snapshot = { ...this.snapshot, refreshing: true };
    return this.generation;
  }

  isCurrent(generation: number): boolean {
    return generation === this.generation;
  }

  /** Nothing can be loaded: panels are emptied and the notice shown */
  showNotice(generation: number, notice: string): boolean {
    if (!this.isCurrent(generation)) return false;
    this.snapshot = { remote: null, notice, refreshing: false, panels: emptyPanels() };
    return true;
  }

  setRemote(generation: number, remote: RemoteIdentity): boolean {
    if (!this.isCurrent(generation)) return false;
    const sameRemote =
      this.snapshot.remote?.owner === remote.owner && this.snapshot.remote.repo === remote.repo;
    this.snapshot = {
      ...this.snapshot,
      remote,
      notice: null,
      panels: sameRemote ? this.snapshot.panels : emptyPanels(),
    };
    return true;
  }

  /** Apply one panel fetch. Returns false when the result is stale. */
  applyPanel(generation: number, update: PanelUpdate): boolean {
    if (!this.isCurrent(generation)) return false;
    const panels: Panels = { ...this.snapshot.panels };
    switch (update.key) {
      case 'pulls':
        panels.pulls = nextPanel(panels.pulls, update.result);
        break;
      case 'issues':
        panels.issues = nextPanel(panels.issues, update.result);
        break;
      case 'commits':
        panels.commits = nextPanel(panels.commits, update.result);
        break;
    }
    this.snapshot = { ...this.snapshot, panels };
    return true;
  }

  finishRefresh(generation: number): void {
    if (!this.isCurrent(generation)) return;
    this.snapshot = { ...this.snapshot, refreshing: false };
  }

  /** Forget everything (project cleared) and invalidate running refreshes */
  reset(): void {
    this.generation += 1;
    this.snapshot = { remote: null, notice: null, refreshing: false, panels: emptyPanels() };
  }
}

/** `3 PRs, 5 Issues, 20 Commits`; empty panels are left out */
export function formatBadge(snapshot: DashboardSnapshot): string {
  const { pulls, issues, commits } = snapshot.panels;
  const parts: string[] = [];
  if (pulls.items.length > 0) parts.push(`${pulls.items.length} PRs`);
  if (issues.items.length > 0) parts.push(`${issues.items.length} Issues`);
  if (commits.items.length > 0) parts.push(`${commits.items.length} Commits`);
  return parts.join(', ');
}
