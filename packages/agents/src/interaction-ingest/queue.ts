/**
 * In-process Task Queue
 *
 * Bounded-concurrency queue for background work. `enqueue` returns the
 * task id at once; the task runs when a slot frees up. A task that
 * rejects is marked `error` and logged; the rejection never escapes.
 *
 * @module interaction-ingest/queue
 */

import { randomUUID } from 'node:crypto';
import { errorMessage } from '@leadforge/lib';
import { logger as defaultLogger } from './logger';
import type { IngestLogger } from './logger';

export type TaskStatus = 'queued' | 'running' | 'done' | 'error';

export interface TaskRecord {
  id: string;
  name: string;
  status: TaskStatus;
  error?: string;
  createdAt: number;
  startedAt?: number;
  finishedAt?: number;
}

export interface TaskQueueConfig {
  concurrency: number;
  /** Finished tasks kept for status lookups */
  maxFinished: number;
}

export const DEFAULT_TASK_QUEUE_CONFIG: TaskQueueConfig = {
  concurrency: 4,
  maxFinished: 1000,
};

interface PendingTask {
  record: TaskRecord;
  run: () => Promise<unknown>;
}

export class TaskQueue {
  private config: TaskQueueConfig;
  private pending: PendingTask[] = [];
  private tasks = new Map<string, TaskRecord>();
  private finished: string[] = [];
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    config: Partial<TaskQueueConfig> = {},
    private readonly logger: IngestLogger = defaultLogger
  ) {
    this.config = { ...DEFAULT_TASK_QUEUE_CONFIG, ...config };
  }

  enqueue(name: string, run: () => Promise<unknown>): string {
    const record: TaskRecord = { id: randomUUID(), name, status: 'queued', createdAt: Date.now() };
    this.tasks.set(record.id, record);
    this.pending.push({ record, run });
    this.drain();
    return record.id;
  }

  getTask(id: string): TaskRecord | null {
    const record = this.tasks.get(id);
    return record ? { ...record } : null;
  }

  stats(): { queued: number; running: number; concurrency: number } {
    return { queued: this.pending.length, running: this.running, concurrency: this.config.concurrency };
  }

  /**
   * Resolves once nothing is queued or running
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private isIdle(): boolean {
    return this.running === 0 && this.pending.length === 0;
  }

  private drain(): void {
    while (this.running < this.config.concurrency) {
      const next = this.pending.shift();
      if (!next) break;
      this.running++;
      void this.execute(next);
    }

    if (this.isIdle()) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private async execute({ record, run }: PendingTask): Promise<void> {
    record.status = 'running';
    record.startedAt = Date.now();

    try {
      await run();
      record.status = 'done';
    } catch (error) {
      record.status = 'error';
      record.error = errorMessage(error);
      this.logger.taskFailed({ task_id: record.id, task_name: record.name, error_message: record.error });
    } finally {
      record.finishedAt = Date.now();
      this.retire(record.id);
      this.running--;
      this.drain();
    }
  }

  private retire(id: string): void {
    this.finished.push(id);
    while (this.finished.length > this.config.maxFinished) {
      const oldest = this.finished.shift();
      if (oldest) this.tasks.delete(oldest);
    }
  }
}

export function createTaskQueue(config?: Partial<TaskQueueConfig>, logger?: IngestLogger): TaskQueue {
  return new TaskQueue(config, logger);
}
