/**
 * Tests for the prompt broker and background jobs
 */

import { describe, it, expect, vi } from 'vitest';
import { PromptBroker, type PromptRequest } from '../shared/prompt/index.js';
import { BackgroundJobs } from '../shared/utils/index.js';

describe('PromptBroker', () => {
  it('should serve questions in order until the job finishes', async () => {
    // Given
    const broker = new PromptBroker();
    const job = (async () => {
      const name = await broker.input('Tag name');
      const sure = await broker.confirm('Push it?');
      return `${name ?? ''}:${String(sure)}`;
    })();
    const served: string[] = [];

    // When
    await broker.serveUntil(job, async (request: PromptRequest) => {
      served.push(request.message);
      if (request.kind === 'input') request.resolve('v1.0.0');
      if (request.kind === 'confirm') request.resolve(true);
    });

    // Then
    expect(served).toEqual(['Tag name', 'Push it?']);
    expect(await job).toBe('v1.0.0:true');
    expect(broker.pending).toBe(0);
  });

  it('should return once a job without questions settles', async () => {
    const broker = new PromptBroker();
    const handler = vi.fn(async () => {});

    await broker.serveUntil(Promise.reject(new Error('boom')), handler);

    expect(handler).not.toHaveBeenCalled();
  });

  it('should map a select answer back to its option', async () => {
    const broker = new PromptBroker();
    const answer = broker.select('Reaction', [
      { label: 'Heart', value: 'heart' },
      { label: 'Rocket', value: 'rocket' },
    ]);

    const request = broker.take();
    if (request?.kind === 'select') request.resolve('rocket');

    expect(await answer).toBe('rocket');
  });

  it('should answer every queued request with its empty value on cancel', async () => {
    const broker = new PromptBroker();
    const input = broker.input('Title');
    const confirmed = broker.confirm('Merge?', true);
    const multiline = broker.multiline('Body');

    broker.cancelAll();

    expect(await input).toBeNull();
    expect(await confirmed).toBe(false);
    expect(await multiline).toBeNull();
    expect(broker.pending).toBe(0);
  });
});

describe('BackgroundJobs', () => {
  it('should report a failed job instead of rejecting', async () => {
    // Given
    const failures: string[] = [];
    const jobs = new BackgroundJobs((name, message) => failures.push(`${name}: ${message}`));

    // When
    const settled = jobs.spawn('Dashboard refresh', async () => {
      throw new Error('offline');
    });
    await settled;

    // Then
    expect(failures).toEqual(['Dashboard refresh: offline']);
    expect(jobs.size).toBe(0);
  });

  it('should wait for jobs spawned while idling', async () => {
    const jobs = new BackgroundJobs();
    const order: string[] = [];

    void jobs.spawn('first', async () => {
      order.push('first');
      void jobs.spawn('second', async () => {
        await Promise.resolve();
        order.push('second');
      });
    });
    await jobs.idle();

    expect(order).toEqual(['first', 'second']);
    expect(jobs.size).toBe(0);
  });
});
