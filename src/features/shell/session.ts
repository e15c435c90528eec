/**
 * State shared by the shell tabs: the selected project, the working
 * lists of the Version & Push tab, the dashboard, and the background
 * job and prompt plumbing.
 */

import type { ActionOutcome, GlobalConfig, ProjectSelection, TagSet } from '../../core/models/index.js';
import type { CredentialProvider } from '../../infra/credentials/index.js';
import { appendGitOutput, clearGitOutput } from '../../infra/git/index.js';
import {
  GitHubRepository,
  createGitHubClient,
  parseOwnerRepo,
  type RepositoryFactory,
} from '../../infra/github/index.js';
import { PromptBroker, type Prompter } from '../../shared/prompt/index.js';
import { BackgroundJobs, createLogger } from '../../shared/utils/index.js';
import { DashboardStore, refreshDashboard, type ActionContext, type DashboardSource } from '../dashboard/index.js';

const log = createLogger('session');

export interface SessionOptions {
  config: GlobalConfig;
  credentials: CredentialProvider;
  /** Defaults to an Octokit client authenticated with the current token */
  openRepository?: RepositoryFactory;
}

export class ShellSession {
  readonly config: GlobalConfig;
  readonly credentials: CredentialProvider;
  readonly dashboard = new DashboardStore();
  readonly broker = new PromptBroker();
  readonly jobs: BackgroundJobs;
  private readonly openRepository: RepositoryFactory;

  selection: ProjectSelection | null = null;
  /** Output of the last `git status --porcelain` */
  files: string[] = [];
  tags: TagSet = { tags: [], selected: null };
  pushTags: boolean;
  showGitOutput = false;
  /** Last status line */
  status = '';
  lastOutcome: ActionOutcome | null = null;

  constructor(options: SessionOptions) {
    this.config = options.config;
    this.credentials = options.credentials;
    this.pushTags = options.config.pushTags;
    this.openRepository =
      options.openRepository ??
      ((identity) =>
        new GitHubRepository(
          createGitHubClient({ token: this.credentials.getToken(), baseUrl: this.config.github.apiUrl }),
          identity,
        ));
    this.jobs = new BackgroundJobs((name, message) => {
      this.report({ ok: false, kind: 'transport', message: `${name} failed: ${message}` });
    });
  }

  get projectDir(): string | null {
    return this.selection?.projectDir ?? null;
  }

  /** Record an outcome as the status line and in the git output pane */
  report(outcome: ActionOutcome): void {
    this.status = outcome.message;
    this.lastOutcome = outcome;
    appendGitOutput(outcome.message);
    if (!outcome.ok) {
      log.info('Action failed', { kind: outcome.kind, message: outcome.message });
    }
  }

  dashboardSource(): DashboardSource {
    return {
      store: this.dashboard,
      getSelection: () => this.selection,
      openRepository: this.openRepository,
      defaultBranch: this.config.github.defaultBranch,
      commitLimit: this.config.github.commitLimit,
    };
  }

  refreshDashboard(): Promise<void> {
    return refreshDashboard(this.dashboardSource());
  }

  /** Reload the dashboard in the background */
  startDashboardRefresh(): void {
    void this.jobs.spawn('Dashboard refresh', () => this.refreshDashboard());
  }

  /** Context for PR/issue actions, or null when origin is not a parsable GitHub remote */
  actionContext(prompter: Prompter = this.broker): ActionContext | null {
    const remoteUrl = this.selection?.remoteUrl;
    const identity = remoteUrl ? parseOwnerRepo(remoteUrl) : null;
    if (!identity) {
      return null;
    }
    return {
      repository: this.openRepository(identity),
      prompter,
      refresh: () => this.refreshDashboard(),
    };
  }

  setSelection(selection: ProjectSelection): void {
    this.selection = selection;
    this.files = [];
    this.tags = { tags: [], selected: null };
  }

  /** Forget the project and everything derived from it */
  clearFields(): void {
    this.selection = null;
    this.files = [];
    this.tags = { tags: [], selected: null };
    this.status = '';
    this.lastOutcome = null;
    this.dashboard.reset();
    clearGitOutput();
  }
}
