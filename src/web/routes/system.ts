/**
 * System routes - health probes and metrics
 */

import type { Router } from '../router.js';
import { sendJson } from '../router.js';
import type { HealthMonitor } from '../../monitoring/health.js';
import { getMetricsCollector } from '../../monitoring/metrics.js';

export function registerSystemRoutes(router: Router, monitor: HealthMonitor): void {
  // GET /healthz - Liveness probe
  router.get('/healthz', (_req, res) => {
    sendJson(res, monitor.livenessCheck());
  });

  // GET /healthz/ready - Readiness probe
  router.get('/healthz/ready', (_req, res) => {
    const result = monitor.readinessCheck();
    sendJson(res, result, result.status === 'ready' ? 200 : 503);
  });

  // GET /healthz/detailed - Component health
  router.get('/healthz/detailed', (_req, res) => {
    sendJson(res, monitor.performHealthCheck());
  });

  // GET /metrics - Prometheus metrics endpoint
  router.get('/metrics', (_req, res) => {
    const prometheusFormat = getMetricsCollector().exportPrometheus();

    res.writeHead(200, {
      'Content-Type': 'text/plain; version=0.0.4',
    });
    res.end(prometheusFormat);
  });
}
