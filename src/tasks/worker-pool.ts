/**
 * Worker pool - bounds how many forecast tasks run at once
 */

import { logger } from '../utils/logger.js';
import { getMetricsCollector } from '../monitoring/metrics.js';

const log = logger.child('tasks:pool');

export interface WorkerPoolState {
  busy: number;
  limit: number;
  queued: number;
}

/**
 * Tasks beyond `limit` wait in arrival order and stay `accepted` until a worker frees up.
 * Publishes `tasks_workers_busy` and `tasks_queued_current`.
 */
export class WorkerPool {
  private busy = 0;
  private readonly limit: number;
  private readonly waiting: Array<() => void> = [];

  constructor(limit: number) {
    this.limit = limit;
  }

  async run<T>(taskId: string, job: () => Promise<T>): Promise<T> {
    await this.claim(taskId);
    try {
      return await job();
    } finally {
      this.vacate();
    }
  }

  getState(): WorkerPoolState {
    return {
      busy: this.busy,
      limit: this.limit,
      queued: this.waiting.length,
    };
  }

  private claim(taskId: string): Promise<void> {
    if (this.busy < this.limit) {
      this.busy++;
      this.publish();
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
      this.publish();
      log.debug('Task waiting for a worker', { taskId, queued: this.waiting.length });
    });
  }

  private vacate(): void {
    const next = this.waiting.shift();
    if (next) {
      // The worker passes straight to the next task
      next();
    } else {
      this.busy--;
    }
    this.publish();
  }

  private publish(): void {
    const metrics = getMetricsCollector();
    metrics.setGauge('tasks_workers_busy', this.busy);
    metrics.setGauge('tasks_queued_current', this.waiting.length);
  }
}
