/**
 * Fire-and-forget background jobs.
 *
 * Callers start a job and move on; nobody awaits its value. Every job is
 * tracked so its failure is logged and reported instead of becoming an
 * unhandled rejection, and so tests (and shutdown) can wait for the set
 * to drain.
 */

import { createLogger } from './debug.js';
import { getErrorMessage } from './error.js';

const log = createLogger('background');

export type JobFailureHandler = (name: string, message: string) => void;

export class BackgroundJobs {
  private readonly running = new Set<Promise<void>>();
  private readonly onFailure: JobFailureHandler | undefined;

  constructor(onFailure?: JobFailureHandler) {
    this.onFailure = onFailure;
  }

  /**
   * Start a job. The returned promise settles when the job does and never
   * rejects; callers that do not care can drop it.
   */
  spawn(name: string, job: () => Promise<void>): Promise<void> {
    log.debug('Job started', { name });
    const tracked = Promise.resolve()
      .then(job)
      .then(
        () => {
          log.debug('Job finished', { name });
        },
        (err: unknown) => {
          const message = getErrorMessage(err);
          log.error('Job failed', { name, error: message });
          this.onFailure?.(name, message);
        },
      )
      .finally(() => {
        this.running.delete(tracked);
      });
    this.running.add(tracked);
    return tracked;
  }

  get size(): number {
    return this.running.size;
  }

  /** Resolve once no job is running, including jobs spawned while waiting. */
  async idle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }
}
