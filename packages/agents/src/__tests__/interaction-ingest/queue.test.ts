/**
 * Task Queue Tests
 */

import { describe, it, expect } from 'vitest';
import { TaskQueue } from '../../interaction-ingest/queue';
import { createLogger } from '../../interaction-ingest/logger';
import { captureLogs } from '../fixtures';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('TaskQueue', () => {
  it('returns the task id before the task settles', async () => {
    const queue = new TaskQueue();
    const gate = deferred();

    const id = queue.enqueue('slow', () => gate.promise);

    expect(queue.getTask(id)?.status).toBe('running');
    gate.resolve();
    await queue.onIdle();
    expect(queue.getTask(id)?.status).toBe('done');
  });

  it('bounds concurrency', async () => {
    const queue = new TaskQueue({ concurrency: 2 });
    const gates = [deferred(), deferred(), deferred()];
    let peak = 0;
    let active = 0;

    const ids = gates.map((gate, i) =>
      queue.enqueue(`task-${i}`, async () => {
        active++;
        peak = Math.max(peak, active);
        await gate.promise;
        active--;
      })
    );

    expect(queue.stats()).toEqual({ queued: 1, running: 2, concurrency: 2 });
    expect(queue.getTask(ids[2] ?? '')?.status).toBe('queued');

    for (const gate of gates) gate.resolve();
    await queue.onIdle();

    expect(peak).toBe(2);
    expect(ids.map((id) => queue.getTask(id)?.status)).toEqual(['done', 'done', 'done']);
  });

  it('records and logs failures without rethrowing', async () => {
    const logs = captureLogs();
    const queue = new TaskQueue({}, createLogger(logs.config));

    const id = queue.enqueue('ingest:post_1', async () => {
      throw new Error('scraper down');
    });
    await queue.onIdle();

    expect(queue.getTask(id)).toMatchObject({ name: 'ingest:post_1', status: 'error', error: 'scraper down' });
    expect(logs.entries).toEqual([
      expect.objectContaining({
        event: 'task_failed',
        task_id: id,
        task_name: 'ingest:post_1',
        error_message: 'scraper down',
      }),
    ]);
  });

  it('resolves onIdle at once when empty', async () => {
    await expect(new TaskQueue().onIdle()).resolves.toBeUndefined();
  });

  it('forgets the oldest finished tasks past the retention limit', async () => {
    const queue = new TaskQueue({ maxFinished: 1 });

    const first = queue.enqueue('a', async () => undefined);
    const second = queue.enqueue('b', async () => undefined);
    await queue.onIdle();

    expect(queue.getTask(first)).toBeNull();
    expect(queue.getTask(second)?.status).toBe('done');
  });
});
