/**
 * Forecast worker - runs one accepted task against Open-Meteo
 */

import type { EvidenceItem, ForecastSummary, TasksConfig } from '../types.js';
import type { A2ATask, TaskConstraints } from '../utils/validation.js';
import { logger } from '../utils/logger.js';
import { getMetricsCollector } from '../monitoring/metrics.js';
import type { OpenMeteoClient } from '../openmeteo/client.js';
import { buildQuery, queryHash } from '../openmeteo/query.js';
import type { TaskStore } from './store.js';

const log = logger.child('tasks:worker');

export interface WorkerDeps {
  store: TaskStore;
  client: OpenMeteoClient;
  config: Pick<TasksConfig, 'defaultLatencyMs' | 'minTimeoutSeconds' | 'maxTimeoutSeconds'>;
  /** Unix time in milliseconds */
  now?: () => number;
}

/**
 * Per-attempt upstream timeout in whole seconds, from the caller's latency budget
 */
export function computeTimeoutSeconds(
  constraints: TaskConstraints | null | undefined,
  config: WorkerDeps['config']
): number {
  const latencyMs = constraints?.latency_ms ?? config.defaultLatencyMs;
  const seconds = Math.floor(latencyMs / 1000);
  return Math.max(config.minTimeoutSeconds, Math.min(config.maxTimeoutSeconds, seconds));
}

function fieldNames(value: unknown): string[] {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return Object.keys(value);
  }
  return [];
}

export function summarize(data: Record<string, unknown>): ForecastSummary {
  return {
    latitude: data.latitude ?? null,
    longitude: data.longitude ?? null,
    hourly_fields: fieldNames(data.hourly),
    daily_fields: fieldNames(data.daily),
  };
}

export async function runForecastTask(taskId: string, task: A2ATask, deps: WorkerDeps): Promise<void> {
  const { store, client } = deps;
  const now = deps.now ?? Date.now;
  const metrics = getMetricsCollector();

  try {
    store.update(taskId, { status: 'working' });

    const timeoutSeconds = computeTimeoutSeconds(task.constraints, deps.config);
    const query = buildQuery(task.inputs);
    const hash = queryHash(query);
    store.update(taskId, { idem: task.idempotency_key || hash });

    // Inputs stay out of the logs; the hash identifies the query
    log.info('Task working', { taskId, querySha256: hash, timeoutSeconds });

    const result = await client.fetchForecast(query, timeoutSeconds);

    if (!result.ok) {
      store.update(taskId, {
        status: 'error',
        outputs: { message: 'upstream_failed', detail: result.error },
      });
      metrics.incrementCounter('tasks_failed_total');
      log.warn('Task failed', { taskId, querySha256: hash });
      return;
    }

    const evidence: EvidenceItem[] = [
      {
        type: 'upstream.http',
        value: {
          url: client.baseUrl,
          query_sha256: hash,
          timestamp: Math.floor(now() / 1000),
        },
      },
    ];

    store.update(taskId, {
      status: 'completed',
      outputs: { summary: summarize(result.json), open_meteo: result.json },
      evidence,
    });
    metrics.incrementCounter('tasks_completed_total');
    log.info('Task completed', { taskId, querySha256: hash });
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    store.update(taskId, {
      status: 'error',
      outputs: { message: 'internal_error', detail },
    });
    metrics.incrementCounter('tasks_failed_total');
    log.error('Task crashed', { taskId, error });
  }
}
