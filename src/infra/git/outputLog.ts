/**
 * Captured git output shown by the "git output" pane.
 *
 * GitOutputLog is a singleton: every git invocation appends its
 * command line and combined output, user-facing notes are appended
 * alongside, and the shell renders or clears the buffer.
 */

/** Oldest entries are dropped past this many */
const MAX_ENTRIES = 500;

export class GitOutputLog {
  private static instance: GitOutputLog | null = null;
  private entries: string[] = [];

  private constructor() {}

  static getInstance(): GitOutputLog {
    if (!GitOutputLog.instance) {
      GitOutputLog.instance = new GitOutputLog();
    }
    return GitOutputLog.instance;
  }

  /** Reset singleton for testing */
  static resetInstance(): void {
    GitOutputLog.instance = null;
  }

  append(entry: string): void {
    this.entries.push(entry);
    if (this.entries.length > MAX_ENTRIES) {
      this.entries.splice(0, this.entries.length - MAX_ENTRIES);
    }
  }

  clear(): void {
    this.entries = [];
  }

  getEntries(): readonly string[] {
    return this.entries;
  }

  getText(): string {
    return this.entries.join('\n');
  }
}

export function appendGitOutput(entry: string): void {
  GitOutputLog.getInstance().append(entry);
}

export function clearGitOutput(): void {
  GitOutputLog.getInstance().clear();
}

export function getGitOutputText(): string {
  return GitOutputLog.getInstance().getText();
}
