/**
 * Health checks and probes
 */

import { logger } from '../utils/logger.js';
import type { AgentConfig } from '../types.js';
import type { TaskService } from '../tasks/service.js';
import type { ReadinessResult } from '../web/types.js';

const log = logger.child('health');

const HEAP_WARN_PERCENT = 75;
const HEAP_FAIL_PERCENT = 90;

export interface HealthCheckResult {
  status: 'healthy' | 'degraded' | 'unhealthy';
  checks: {
    memory: HealthCheck;
    upstream: HealthCheck;
    tasks: HealthCheck;
    auth: HealthCheck;
  };
  timestamp: string;
  uptime: number;
  version: string;
}

export interface HealthCheck {
  status: 'pass' | 'warn' | 'fail';
  message?: string;
  details?: Record<string, unknown>;
}

export class HealthMonitor {
  private config: AgentConfig;
  private service: TaskService;
  private startTime: number = Date.now();

  constructor(config: AgentConfig, service: TaskService) {
    this.config = config;
    this.service = service;
  }

  /**
   * Perform comprehensive health check
   */
  performHealthCheck(): HealthCheckResult {
    const checks = {
      memory: this.checkMemory(),
      upstream: this.checkUpstream(),
      tasks: this.checkTasks(),
      auth: this.checkAuth(),
    };

    const all = Object.values(checks);
    const hasFailures = all.some((check) => check.status === 'fail');
    const hasWarnings = all.some((check) => check.status === 'warn');

    const overallStatus = hasFailures ? 'unhealthy' : hasWarnings ? 'degraded' : 'healthy';

    log.debug('Health check completed', { status: overallStatus });

    return {
      status: overallStatus,
      checks,
      timestamp: new Date().toISOString(),
      uptime: this.uptime(),
      version: this.config.version,
    };
  }

  private checkMemory(): HealthCheck {
    const memUsage = process.memoryUsage();
    const heapUsedPercent = (memUsage.heapUsed / memUsage.heapTotal) * 100;
    const details = {
      heapUsedPercent: Math.round(heapUsedPercent),
      heapUsed: memUsage.heapUsed,
      heapTotal: memUsage.heapTotal,
      rss: memUsage.rss,
    };

    if (heapUsedPercent > HEAP_FAIL_PERCENT) {
      return { status: 'fail', message: 'Memory usage critical', details };
    }
    if (heapUsedPercent > HEAP_WARN_PERCENT) {
      return { status: 'warn', message: 'Memory usage high', details };
    }
    return { status: 'pass', message: 'Memory usage normal', details };
  }

  private checkUpstream(): HealthCheck {
    const circuit = this.service.client.getCircuitState();
    const details = { circuit, baseUrl: this.service.client.baseUrl };

    if (circuit === 'OPEN') {
      return { status: 'fail', message: 'Open-Meteo circuit is open', details };
    }
    if (circuit === 'HALF_OPEN') {
      return { status: 'warn', message: 'Open-Meteo circuit is probing', details };
    }
    return { status: 'pass', message: 'Open-Meteo reachable', details };
  }

  private checkTasks(): HealthCheck {
    const counts = this.service.store.counts();
    const retained = this.service.store.size;
    const workers = this.service.getWorkerState();
    const details = { ...counts, retained, workers };

    if (retained >= this.config.tasks.maxRetained) {
      return { status: 'warn', message: 'Task store at capacity', details };
    }
    return { status: 'pass', message: 'Task store normal', details };
  }

  private checkAuth(): HealthCheck {
    if (!this.config.auth.apiKey) {
      return { status: 'warn', message: 'AGENT_API_KEY not set, any bearer token is accepted' };
    }
    return { status: 'pass', message: 'API key enforced' };
  }

  /**
   * Liveness probe body
   */
  livenessCheck(): { ok: true } {
    return { ok: true };
  }

  /**
   * Readiness: not ready while the upstream circuit is open
   */
  readinessCheck(): ReadinessResult {
    const circuit = this.service.client.getCircuitState();
    return {
      status: circuit === 'OPEN' ? 'not_ready' : 'ready',
      circuit,
      tasks: this.service.store.counts(),
      uptime: this.uptime(),
      version: this.config.version,
    };
  }

  private uptime(): number {
    return (Date.now() - this.startTime) / 1000;
  }
}
