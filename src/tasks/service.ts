/**
 * Task service - intake, dispatch and lookup of forecast tasks
 */

import { randomUUID } from 'node:crypto';
import type { AgentConfig, TaskStatus, TaskView } from '../types.js';
import { logger } from '../utils/logger.js';
import { A2ATaskSchema, EXAMPLE_TASK, FORECAST_TASK_TYPE, validate, type A2ATask } from '../utils/validation.js';
import { getMetricsCollector } from '../monitoring/metrics.js';
import { OpenMeteoClient } from '../openmeteo/client.js';
import { CallbackNotifier } from '../integrations/callback-notifier.js';
import { TaskStore, DuplicateTaskError } from './store.js';
import { runForecastTask } from './worker.js';
import { WorkerPool, type WorkerPoolState } from './worker-pool.js';

const log = logger.child('tasks');

export interface InputRequiredResponse {
  status: 'input_required';
  outputs: Record<string, unknown>;
}

export type SubmitResult =
  | { kind: 'accepted'; body: { task_id: string; status: TaskStatus } }
  | { kind: 'duplicate'; body: { task_id: string; status: TaskStatus } }
  | { kind: 'input_required'; body: InputRequiredResponse }
  | { kind: 'conflict'; taskId: string };

export interface TaskServiceDeps {
  store?: TaskStore;
  client?: OpenMeteoClient;
  notifier?: CallbackNotifier;
}

export class TaskService {
  readonly store: TaskStore;
  readonly client: OpenMeteoClient;
  private readonly notifier: CallbackNotifier;
  private readonly config: AgentConfig;
  private readonly pool: WorkerPool;
  private readonly inFlight: Set<Promise<void>> = new Set();
  private pruneTimer: NodeJS.Timeout | null = null;

  constructor(config: AgentConfig, deps: TaskServiceDeps = {}) {
    this.config = config;
    this.store = deps.store ?? new TaskStore({
      retentionMs: config.tasks.retentionMs,
      maxRetained: config.tasks.maxRetained,
    });
    this.client = deps.client ?? new OpenMeteoClient(config.openMeteo);
    this.notifier = deps.notifier ?? new CallbackNotifier(config.callbacks);
    this.pool = new WorkerPool(config.tasks.maxConcurrent);
  }

  /**
   * Validate a raw request body and, when it is a forecast task, start it in the background.
   * `parseError` carries the reason the body could not be read as JSON.
   */
  submit(body: unknown, parseError?: string): SubmitResult {
    const metrics = getMetricsCollector();

    if (parseError !== undefined || body === undefined) {
      metrics.incrementCounter('tasks_input_required_total');
      return this.inputRequired(parseError ?? 'request body is required');
    }

    const parsed = validate(A2ATaskSchema, body);
    if (!parsed.success) {
      metrics.incrementCounter('tasks_input_required_total');
      return this.inputRequired(parsed.errors.join('; '));
    }

    const task = parsed.data;
    if (task.type !== FORECAST_TASK_TYPE) {
      metrics.incrementCounter('tasks_input_required_total');
      return {
        kind: 'input_required',
        body: { status: 'input_required', outputs: { expected_type: FORECAST_TASK_TYPE } },
      };
    }

    this.store.prune();

    if (task.idempotency_key) {
      const existing = this.store.findByIdempotencyKey(task.idempotency_key);
      if (existing) {
        log.debug('Idempotent replay', { taskId: existing.taskId });
        return {
          kind: 'duplicate',
          body: { task_id: existing.taskId, status: existing.record.status },
        };
      }
    }

    const taskId = task.task_id || randomUUID();

    try {
      this.store.create(taskId, {
        idempotencyKey: task.idempotency_key ?? undefined,
        callback: task.callback ?? undefined,
      });
    } catch (error) {
      if (error instanceof DuplicateTaskError) {
        return { kind: 'conflict', taskId };
      }
      throw error;
    }

    metrics.incrementCounter('tasks_created_total');
    log.info('Task accepted', { taskId });

    this.dispatch(taskId, task);

    return { kind: 'accepted', body: { task_id: taskId, status: 'accepted' } };
  }

  /**
   * Worker slots in use and tasks waiting for one
   */
  getWorkerState(): WorkerPoolState {
    return this.pool.getState();
  }

  getView(taskId: string): TaskView | null {
    return this.store.view(taskId);
  }

  /**
   * Resolves once every task started so far has finished, callbacks included
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  startPruning(intervalMs: number = 60_000): void {
    if (this.pruneTimer) return;
    this.pruneTimer = setInterval(() => {
      this.store.prune();
    }, intervalMs);
    this.pruneTimer.unref();
  }

  stopPruning(): void {
    if (this.pruneTimer) {
      clearInterval(this.pruneTimer);
      this.pruneTimer = null;
    }
  }

  private inputRequired(error: string): SubmitResult {
    return {
      kind: 'input_required',
      body: {
        status: 'input_required',
        outputs: { error, example: EXAMPLE_TASK },
      },
    };
  }

  private dispatch(taskId: string, task: A2ATask): void {
    const run = this.pool
      .run(taskId, () =>
        runForecastTask(taskId, task, {
          store: this.store,
          client: this.client,
          config: this.config.tasks,
        })
      )
      .then(() => this.deliverCallback(taskId))
      .catch((error: unknown) => {
        log.error('Task dispatch failed', { taskId, error });
      })
      .finally(() => {
        this.inFlight.delete(run);
      });

    this.inFlight.add(run);
  }

  private async deliverCallback(taskId: string): Promise<void> {
    const record = this.store.get(taskId);
    const view = this.store.view(taskId);
    if (!record?.callback || !view) return;

    await this.notifier.notify(record.callback, view);
  }
}
