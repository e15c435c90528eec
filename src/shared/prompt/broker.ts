/**
 * Prompt requests from background jobs.
 *
 * A job never touches the terminal itself: it queues a request and
 * awaits its answer. The interactive side takes requests one at a time
 * with `serveUntil` and settles each one exactly once.
 */

import type { SelectOptionItem } from './select.js';

/** Questions a background job may ask */
export interface Prompter {
  input(message: string, defaultValue?: string): Promise<string | null>;
  multiline(message: string): Promise<string | null>;
  confirm(message: string, defaultYes?: boolean): Promise<boolean>;
  select<T extends string>(message: string, options: SelectOptionItem<T>[]): Promise<T | null>;
}

export type PromptRequest =
  | { kind: 'input'; message: string; defaultValue?: string; resolve: (answer: string | null) => void }
  | { kind: 'multiline'; message: string; resolve: (answer: string | null) => void }
  | { kind: 'confirm'; message: string; defaultYes: boolean; resolve: (answer: boolean) => void }
  | { kind: 'select'; message: string; options: SelectOptionItem<string>[]; resolve: (answer: string | null) => void };

/** Answers one request; called on the interactive side */
export type PromptHandler = (request: PromptRequest) => Promise<void>;

export class PromptBroker implements Prompter {
  private readonly queue: PromptRequest[] = [];
  private waiters: Array<() => void> = [];

  get pending(): number {
    return this.queue.length;
  }

  input(message: string, defaultValue?: string): Promise<string | null> {
    return new Promise((resolve) => this.enqueue({ kind: 'input', message, defaultValue, resolve }));
  }

  multiline(message: string): Promise<string | null> {
    return new Promise((resolve) => this.enqueue({ kind: 'multiline', message, resolve }));
  }

  confirm(message: string, defaultYes = true): Promise<boolean> {
    return new Promise((resolve) => this.enqueue({ kind: 'confirm', message, defaultYes, resolve }));
  }

  select<T extends string>(message: string, options: SelectOptionItem<T>[]): Promise<T | null> {
    return new Promise((resolve) => {
      this.enqueue({
        kind: 'select',
        message,
        options,
        resolve: (answer) => {
          const match = options.find((option) => option.value === answer);
          resolve(match ? match.value : null);
        },
      });
    });
  }

  /** Oldest unanswered request, removed from the queue */
  take(): PromptRequest | undefined {
    return this.queue.shift();
  }

  /**
   * Answer requests with `handler` until `done` settles and the queue is
   * empty. Requests are served in arrival order, one at a time.
   */
  async serveUntil(done: Promise<unknown>, handler: PromptHandler): Promise<void> {
    let finished = false;
    const settled = done.then(
      () => {
        finished = true;
      },
      () => {
        finished = true;
      },
    );

    for (;;) {
      const request = this.take();
      if (request) {
        await handler(request);
        continue;
      }
      if (finished) {
        return;
      }
      await Promise.race([settled, this.nextRequest()]);
    }
  }

  /** Settle every queued request with its empty answer */
  cancelAll(): void {
    for (let request = this.take(); request; request = this.take()) {
      switch (request.kind) {
        case 'confirm':
          request.resolve(false);
          break;
        case 'input':
        case 'multiline':
        case 'select':
          request.resolve(null);
          break;
      }
    }
  }

  private enqueue(request: PromptRequest): void {
    this.queue.push(request);
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }

  private nextRequest(): Promise<void> {
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
