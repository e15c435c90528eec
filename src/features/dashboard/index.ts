/**
 * Dashboard feature exports
 */

export {
  DashboardStore,
  formatBadge,
  type DashboardSnapshot,
  type PanelKey,
  type PanelResult,
  type PanelState,
  type PanelUpdate,
  type Panels,
} from './store.js';
export {
  NO_PROJECT_NOTICE,
  UNPARSABLE_REMOTE_NOTICE,
  commitBranch,
  describeLoadError,
  refreshDashboard,
  type DashboardSource,
} from './sync.js';
export {
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
} from './actions.js';
