/**
 * Completion callbacks, gated by the egress allowlist
 */

import type { CallbacksConfig, TaskView } from '../types.js';
import { logger } from '../utils/logger.js';
import { getMetricsCollector } from '../monitoring/metrics.js';
import type { FetchFn } from '../openmeteo/client.js';

const log = logger.child('callbacks');

export class CallbackNotifier {
  private config: CallbacksConfig;
  private fetchImpl: FetchFn;

  constructor(config: CallbacksConfig, fetchImpl?: FetchFn) {
    this.config = config;
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  isEnabled(): boolean {
    return this.config.enabled && this.config.allowedHosts.length > 0;
  }

  /**
   * Whether a callback URL may be called. Entries match the host exactly;
   * an entry with a leading dot (".example.com") also matches its subdomains.
   */
  isAllowed(callbackUrl: string): boolean {
    let url: URL;
    try {
      url = new URL(callbackUrl);
    } catch {
      return false;
    }

    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
      return false;
    }

    const host = url.hostname.toLowerCase();
    return this.config.allowedHosts.some((entry) => {
      const allowed = entry.toLowerCase();
      if (allowed.startsWith('.')) {
        return host.endsWith(allowed) || host === allowed.slice(1);
      }
      return host === allowed;
    });
  }

  /**
   * POST the final task view. Resolves to whether it was delivered; never rejects.
   */
  async notify(callbackUrl: string, view: TaskView): Promise<boolean> {
    const metrics = getMetricsCollector();

    if (!this.isEnabled()) {
      log.debug('Callbacks disabled, skipping', { taskId: view.task_id });
      return false;
    }

    if (!this.isAllowed(callbackUrl)) {
      metrics.incrementCounter('callbacks_blocked_total');
      log.warn('Callback host not in allowlist', { taskId: view.task_id });
      return false;
    }

    try {
      const response = await this.fetchImpl(callbackUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(view),
        // A redirect could lead outside the allowlist
        redirect: 'manual',
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      if (response.status >= 300 && response.status < 400) {
        metrics.incrementCounter('callbacks_blocked_total');
        log.warn('Callback redirect refused', { taskId: view.task_id, status: response.status });
        return false;
      }

      if (!response.ok) {
        metrics.incrementCounter('callbacks_failed_total');
        log.warn('Callback rejected', { taskId: view.task_id, status: response.status });
        return false;
      }

      metrics.incrementCounter('callbacks_delivered_total');
      log.debug('Callback delivered', { taskId: view.task_id });
      return true;
    } catch (error) {
      metrics.incrementCounter('callbacks_failed_total');
      log.warn('Callback delivery failed', {
        taskId: view.task_id,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
