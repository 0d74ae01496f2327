/**
 * Task store - in-memory registry of forecast tasks
 */

import { EventEmitter } from 'node:events';
import type { TaskRecord, TaskStatus, TaskView } from '../types.js';
import { TERMINAL_STATUSES } from '../types.js';
import { logger } from '../utils/logger.js';
import { getMetricsCollector } from '../monitoring/metrics.js';

const log = logger.child('tasks:store');

export interface TaskStoreOptions {
  retentionMs: number;
  maxRetained: number;
}

export interface CreateTaskOptions {
  idempotencyKey?: string;
  callback?: string;
}

export type TaskPatch = Partial<Pick<TaskRecord, 'status' | 'outputs' | 'evidence' | 'idem'>>;

export class DuplicateTaskError extends Error {
  constructor(readonly taskId: string) {
    super('task already exists');
    this.name = 'DuplicateTaskError';
  }
}

function emptyCounts(): Record<TaskStatus, number> {
  return { accepted: 0, working: 0, completed: 0, error: 0 };
}

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Emits `task:created`, `task:updated` and `task:finished` with `(taskId, record)`
 */
export class TaskStore extends EventEmitter {
  private tasks: Map<string, TaskRecord> = new Map();
  private idempotencyIndex: Map<string, string> = new Map();
  // Kept in step with every status change so gauges need no scan
  private statusCounts: Record<TaskStatus, number> = emptyCounts();
  private readonly options: TaskStoreOptions;

  constructor(options: Partial<TaskStoreOptions> = {}) {
    super();
    this.options = {
      retentionMs: options.retentionMs ?? 3_600_000,
      maxRetained: options.maxRetained ?? 10_000,
    };
  }

  /**
   * Register a new task in `accepted` state
   */
  create(taskId: string, options: CreateTaskOptions = {}, now: Date = new Date()): TaskRecord {
    if (this.tasks.has(taskId)) {
      throw new DuplicateTaskError(taskId);
    }

    const record: TaskRecord = {
      status: 'accepted',
      outputs: {},
      evidence: [],
      idempotencyKey: options.idempotencyKey,
      callback: options.callback,
      createdAt: now,
      updatedAt: now,
    };

    this.tasks.set(taskId, record);
    this.statusCounts.accepted++;
    if (options.idempotencyKey) {
      this.idempotencyIndex.set(options.idempotencyKey, taskId);
    }

    this.refreshGauges();
    this.emit('task:created', taskId, record);
    log.debug('Task created', { taskId });

    return record;
  }

  get(taskId: string): TaskRecord | undefined {
    return this.tasks.get(taskId);
  }

  has(taskId: string): boolean {
    return this.tasks.has(taskId);
  }

  /**
   * Wire view of a task, or null when unknown
   */
  view(taskId: string): TaskView | null {
    const record = this.tasks.get(taskId);
    if (!record) return null;

    const view: TaskView = {
      task_id: taskId,
      status: record.status,
      outputs: record.outputs,
      evidence: record.evidence,
    };
    if (record.idem !== undefined) {
      view.idem = record.idem;
    }
    return view;
  }

  /**
   * Merge a patch into a task. Returns false for unknown ids.
   */
  update(taskId: string, patch: TaskPatch, now: Date = new Date()): boolean {
    const record = this.tasks.get(taskId);
    if (!record) return false;

    const previous = record.status;
    const wasTerminal = isTerminal(previous);
    Object.assign(record, patch);
    record.updatedAt = now;

    if (record.status !== previous) {
      this.statusCounts[previous]--;
      this.statusCounts[record.status]++;
    }

    this.refreshGauges();
    this.emit('task:updated', taskId, record);

    if (!wasTerminal && isTerminal(record.status)) {
      this.emit('task:finished', taskId, record);
    }

    return true;
  }

  findByIdempotencyKey(key: string): { taskId: string; record: TaskRecord } | null {
    const taskId = this.idempotencyIndex.get(key);
    if (taskId === undefined) return null;

    const record = this.tasks.get(taskId);
    if (!record) {
      this.idempotencyIndex.delete(key);
      return null;
    }
    return { taskId, record };
  }

  /**
   * Drop finished tasks past retention, then the oldest finished ones while over capacity.
   * Tasks still in flight are never removed.
   */
  prune(now: number = Date.now()): number {
    let removed = 0;

    for (const [taskId, record] of this.tasks) {
      if (isTerminal(record.status) && now - record.updatedAt.getTime() > this.options.retentionMs) {
        this.remove(taskId, record);
        removed++;
      }
    }

    if (this.tasks.size > this.options.maxRetained) {
      // Map iteration follows insertion, i.e. creation order
      for (const [taskId, record] of this.tasks) {
        if (this.tasks.size <= this.options.maxRetained) break;
        if (isTerminal(record.status)) {
          this.remove(taskId, record);
          removed++;
        }
      }
    }

    if (removed > 0) {
      this.refreshGauges();
      log.debug('Pruned tasks', { removed, retained: this.tasks.size });
    }

    return removed;
  }

  counts(): Record<TaskStatus, number> {
    return { ...this.statusCounts };
  }

  get size(): number {
    return this.tasks.size;
  }

  clear(): void {
    this.tasks.clear();
    this.idempotencyIndex.clear();
    this.statusCounts = emptyCounts();
    this.refreshGauges();
  }

  private remove(taskId: string, record: TaskRecord): void {
    this.tasks.delete(taskId);
    this.statusCounts[record.status]--;
    if (record.idempotencyKey && this.idempotencyIndex.get(record.idempotencyKey) === taskId) {
      this.idempotencyIndex.delete(record.idempotencyKey);
    }
  }

  private refreshGauges(): void {
    const metrics = getMetricsCollector();
    metrics.setGauge('tasks_inflight_current', this.statusCounts.accepted + this.statusCounts.working);
    metrics.setGauge('tasks_retained_current', this.tasks.size);
  }
}
