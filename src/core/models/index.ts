export type {
  DebugConfig,
  LogLevel,
  GitHubConfig,
  ManifestConfig,
  GlobalConfig,
} from './global-config.js';

export type {
  RemoteIdentity,
  MergeStatus,
  PullRequestRecord,
  IssueRecord,
  IssueState,
  CommitRecord,
  ReviewRecord,
  IssueCommentRecord,
  ReviewEvent,
  ReactionContent,
} from './github.js';
export { REACTION_CONTENTS } from './github.js';

export type {
  ProjectSelection,
  TagSet,
  Credentials,
  FailureKind,
  ActionOutcome,
} from './project.js';

export * from './schemas.js';
