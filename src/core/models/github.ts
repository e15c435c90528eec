/**
 * Dashboard record types.
 *
 * These are the shapes the dashboard renders, already narrowed from the
 * GitHub REST responses by the schemas in schemas.ts.
 */

/** Owner/repository pair parsed from the origin URL */
export interface RemoteIdentity {
  owner: string;
  repo: string;
}

export type MergeStatus = 'merged' | 'draft' | 'unmerged';

export interface PullRequestRecord {
  number: number;
  title: string;
  author: string;
  state: string;
  /** ISO timestamp as returned by the API */
  createdAt: string;
  mergeStatus: MergeStatus;
}

export interface IssueRecord {
  number: number;
  title: string;
  author: string;
  state: IssueState;
  createdAt: string;
  body: string;
}

export type IssueState = 'open' | 'closed';

export interface CommitRecord {
  shortSha: string;
  author: string;
  message: string;
  /** YYYY-MM-DD */
  date: string;
}

export interface ReviewRecord {
  author: string;
  state: string;
  body: string;
}

export interface IssueCommentRecord {
  id: number;
  author: string;
  body: string;
}

export type ReviewEvent = 'APPROVE' | 'REQUEST_CHANGES' | 'COMMENT';

/** Reaction names accepted by the GitHub reactions API */
export const REACTION_CONTENTS = ['+1', '-1', 'laugh', 'confused', 'heart', 'hooray', 'rocket', 'eyes'] as const;

export type ReactionContent = (typeof REACTION_CONTENTS)[number];
