/**
 * Local project state types
 */

/** One working directory paired with the manifest found under it */
export interface ProjectSelection {
  /** Directory holding the manifest; every git command runs here */
  projectDir: string;
  manifestPath: string;
  currentVersion: string;
  /** `Unknown` when HEAD cannot be resolved */
  branch: string;
  /** null when origin is not configured */
  remoteUrl: string | null;
}

export interface TagSet {
  tags: string[];
  /** Latest tag after a reload, or the one the user picked */
  selected: string | null;
}

export interface Credentials {
  user: string;
  token: string;
}

/** Error taxonomy for user-visible failures */
export type FailureKind = 'parse' | 'transport' | 'api' | 'subprocess' | 'precondition';

/** Result of one user action, rendered as a status line */
export type ActionOutcome =
  | { ok: true; message: string }
  | { ok: false; kind: FailureKind; message: string };
