/**
 * Zod schemas for configuration and GitHub response validation
 *
 * Response schemas list only the fields the dashboard reads. A payload
 * missing one of them fails to parse and is reported as a transport error.
 */

import { z } from 'zod/v4';
import { REACTION_CONTENTS } from './github.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const DebugConfigSchema = z.object({
  enabled: z.boolean().optional().default(false),
  log_file: z.string().optional(),
});

export const GitHubConfigSchema = z.object({
  api_url: z.url().optional(),
  default_branch: z.string().min(1).optional(),
  /** The commits endpoint caps per_page at 100 */
  commit_limit: z.number().int().positive().max(100).optional(),
});

export const ManifestConfigSchema = z.object({
  file_name: z.string().min(1).optional(),
  skip_dirs: z.array(z.string()).optional(),
});

export const CredentialsConfigSchema = z.object({
  service: z.string().min(1).optional(),
});

/** Global config schema (~/.vpush/config.yaml) */
export const GlobalConfigSchema = z.object({
  log_level: LogLevelSchema.optional().default('info'),
  verbose: z.boolean().optional().default(false),
  debug: DebugConfigSchema.optional(),
  github: GitHubConfigSchema.optional(),
  push_tags: z.boolean().optional().default(true),
  manifest: ManifestConfigSchema.optional(),
  credentials: CredentialsConfigSchema.optional(),
});

const UserSchema = z.object({ login: z.string() }).nullable();

export const PullRequestResponseSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  user: UserSchema,
  state: z.string(),
  created_at: z.string(),
  merged_at: z.string().nullable().optional(),
  draft: z.boolean().optional(),
});

export const IssueResponseSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  user: UserSchema,
  state: z.enum(['open', 'closed']),
  created_at: z.string(),
  body: z.string().nullable().optional(),
  /** Present on pull requests, which the issues endpoint also returns */
  pull_request: z.unknown().optional(),
});

export const CommitResponseSchema = z.object({
  sha: z.string(),
  commit: z.object({
    message: z.string(),
    author: z.object({ name: z.string() }).nullable(),
    committer: z.object({ date: z.string() }).nullable(),
  }),
});

export const ReviewResponseSchema = z.object({
  user: UserSchema,
  state: z.string(),
  body: z.string().nullable().optional(),
});

export const IssueCommentResponseSchema = z.object({
  id: z.number().int(),
  user: UserSchema,
  body: z.string().optional(),
});

export const ReactionContentSchema = z.enum(REACTION_CONTENTS);

/** Manifest: any JSON object; only `version` is read */
export const ManifestSchema = z.looseObject({
  version: z.string().optional(),
});

export type PullRequestResponse = z.infer<typeof PullRequestResponseSchema>;
export type IssueResponse = z.infer<typeof IssueResponseSchema>;
export type CommitResponse = z.infer<typeof CommitResponseSchema>;
