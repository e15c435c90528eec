/**
 * Configuration types
 */

/** Debug configuration for vpush */
export interface DebugConfig {
  enabled: boolean;
  logFile?: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** GitHub API settings */
export interface GitHubConfig {
  /** REST API base URL (GitHub Enterprise installs use their own) */
  apiUrl: string;
  /** Branch used for the commit panel when the checkout has none */
  defaultBranch: string;
  /** Number of commits fetched for the commit panel */
  commitLimit: number;
}

/** Manifest discovery settings */
export interface ManifestConfig {
  /** File name searched for under the chosen folder */
  fileName: string;
  /** Directory names the search never enters */
  skipDirs: string[];
}

/** Global configuration for vpush (~/.vpush/config.yaml) */
export interface GlobalConfig {
  logLevel: LogLevel;
  verbose: boolean;
  debug?: DebugConfig;
  github: GitHubConfig;
  /** Default for the "push tags" option of the publish sequence */
  pushTags: boolean;
  manifest: ManifestConfig;
  /** Secret store service name holding github_user / github_token */
  credentialService: string;
}
