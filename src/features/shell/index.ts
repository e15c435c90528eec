/**
 * Interactive shell exports
 */

export { type ShellOptions, runShell } from './shell.js';
export { type SessionOptions, ShellSession } from './session.js';
export { runDashboardAction } from './dashboardTab.js';
export { pickManifest, selectFolder } from './versionTab.js';
export { commitRow, issueRow, pullRequestRow, renderDashboard, renderProject, renderStatus, renderTitle } from './views.js';
