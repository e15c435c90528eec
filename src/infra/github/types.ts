/**
 * GitHub module type definitions
 */

import type { RemoteIdentity } from '../../core/models/index.js';
import type { GitHubRepository } from './repository.js';

/** Builds the repository client for a parsed remote */
export type RepositoryFactory = (identity: RemoteIdentity) => GitHubRepository;
