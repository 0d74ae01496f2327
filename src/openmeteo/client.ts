/**
 * Open-Meteo forecast client
 */

import type { OpenMeteoConfig } from '../types.js';
import { logger } from '../utils/logger.js';
import { CircuitBreaker, retryWithCircuitBreaker } from '../utils/retry.js';
import { getMetricsCollector } from '../monitoring/metrics.js';
import { toSearchParams, type ForecastQuery } from './query.js';

const log = logger.child('open-meteo');

export const DEFAULT_OPEN_METEO_CONFIG: OpenMeteoConfig = {
  baseUrl: 'https://api.open-meteo.com/v1/forecast',
  maxAttempts: 2,
  initialBackoffMs: 800,
  backoffMultiplier: 2,
  maxErrorBodyChars: 800,
  circuitFailureThreshold: 5,
  circuitResetMs: 30000,
};

export type ForecastResult =
  | { ok: true; json: Record<string, unknown> }
  | { ok: false; error: string };

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface OpenMeteoClientOptions {
  fetch?: FetchFn;
  circuitBreaker?: CircuitBreaker;
}

/** Raised for a single failed attempt; its message becomes the task's error detail */
export class UpstreamError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UpstreamError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export class OpenMeteoClient {
  private readonly config: OpenMeteoConfig;
  private readonly fetchImpl: FetchFn;
  private readonly breaker: CircuitBreaker;

  constructor(config: Partial<OpenMeteoConfig> = {}, options: OpenMeteoClientOptions = {}) {
    this.config = { ...DEFAULT_OPEN_METEO_CONFIG, ...config };
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.breaker = options.circuitBreaker ?? new CircuitBreaker('open-meteo', {
      failureThreshold: this.config.circuitFailureThreshold,
      timeout: this.config.circuitResetMs,
    });
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  /**
   * Circuit state; an open circuit whose reset timeout has passed reports HALF_OPEN
   */
  getCircuitState(): ReturnType<CircuitBreaker['getState']> {
    this.breaker.isOpen();
    return this.breaker.getState();
  }

  /**
   * Fetch a forecast. Never throws: failures come back as `{ ok: false, error }`
   * carrying the message of the last attempt.
   */
  async fetchForecast(query: ForecastQuery, timeoutSeconds: number): Promise<ForecastResult> {
    const url = new URL(this.config.baseUrl);
    url.search = toSearchParams(query).toString();

    const metrics = getMetricsCollector();
    const started = Date.now();

    try {
      const json = await retryWithCircuitBreaker(
        () => this.attempt(url, timeoutSeconds),
        this.breaker,
        {
          maxAttempts: this.config.maxAttempts,
          initialDelayMs: this.config.initialBackoffMs,
          backoffMultiplier: this.config.backoffMultiplier,
          maxDelayMs: 60000,
          jitter: 0,
          isRetryable: () => true,
        }
      );
      return { ok: true, json };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      metrics.incrementCounter('upstream_failures_total');
      log.warn('Forecast request failed', { error: message, circuit: this.breaker.getState() });
      return { ok: false, error: message };
    } finally {
      metrics.observeHistogram('upstream_request_duration_seconds', (Date.now() - started) / 1000);
    }
  }

  private async attempt(url: URL, timeoutSeconds: number): Promise<Record<string, unknown>> {
    getMetricsCollector().incrementCounter('upstream_requests_total');

    const response = await this.fetchImpl(url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutSeconds * 1000),
    });

    if (response.status !== 200) {
      const text = await response.text();
      throw new UpstreamError(
        `status=${response.status}, body=${text.slice(0, this.config.maxErrorBodyChars)}`
      );
    }

    const body: unknown = await response.json();
    if (!isRecord(body)) {
      throw new UpstreamError('upstream returned a non-object JSON body');
    }

    log.debug('Forecast received', { status: response.status });
    return body;
  }
}
