/**
 * git integration - barrel exports
 */

export type { GitResult, GitQuery } from './git.js';

export {
  runGit,
  getBranchName,
  getRemoteUrl,
  setRemoteUrl,
  parsePorcelainStatus,
  listChangedFiles,
  stageFiles,
  unstageFiles,
  commit,
  listTags,
  createTag,
  deleteTag,
  pushTag,
  pushBranch,
  pushAllTags,
  pull,
  enableCredentialStoreHelper,
} from './git.js';

export { GitOutputLog, appendGitOutput, clearGitOutput, getGitOutputText } from './outputLog.js';
