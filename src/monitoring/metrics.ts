/**
 * Prometheus metrics collection
 */

import { logger } from '../utils/logger.js';

const log = logger.child('metrics');

// Constants for histogram management
const MAX_HISTOGRAM_SAMPLES = 10000;
const HISTOGRAM_CLEANUP_THRESHOLD = 5000;

// Upper bounds in seconds; +Inf is implied
export const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60];

interface BucketSeries {
  bounds: number[];
  counts: number[];
  count: number;
  sum: number;
}

export interface Metric {
  name: string;
  type: 'counter' | 'gauge' | 'histogram' | 'summary';
  help: string;
  value: number | Record<string, number>;
  labels?: Record<string, string>;
}

export class MetricsCollector {
  private metrics: Map<string, Metric> = new Map();
  private startTime: number = Date.now();
  private histograms: Map<string, number[]> = new Map();
  private buckets: Map<string, BucketSeries> = new Map();

  constructor() {
    // Initialize system metrics
    this.initializeSystemMetrics();
  }

  private initializeSystemMetrics(): void {
    // Process metrics
    this.registerGauge('process_uptime_seconds', 'Process uptime in seconds');
    this.registerGauge('process_memory_heap_used_bytes', 'Heap memory used in bytes');
    this.registerGauge('process_memory_heap_total_bytes', 'Total heap memory in bytes');
    this.registerGauge('process_memory_external_bytes', 'External memory in bytes');
    this.registerGauge('process_memory_rss_bytes', 'Resident set size in bytes');
    this.registerGauge('process_cpu_usage_percent', 'CPU usage percentage');

    // HTTP
    this.registerCounter('http_requests_total', 'Total number of HTTP requests');
    this.registerCounter('http_requests_errors_total', 'Total number of HTTP responses with status >= 400');
    this.registerHistogram('http_request_duration_seconds', 'HTTP request duration in seconds');

    // Tasks
    this.registerCounter('tasks_created_total', 'Total number of forecast tasks accepted');
    this.registerCounter('tasks_completed_total', 'Total number of forecast tasks completed');
    this.registerCounter('tasks_failed_total', 'Total number of forecast tasks that ended in error');
    this.registerCounter('tasks_input_required_total', 'Total number of submissions answered with input_required');
    this.registerGauge('tasks_inflight_current', 'Current number of accepted or working tasks');
    this.registerGauge('tasks_retained_current', 'Current number of tasks held in memory');
    this.registerGauge('tasks_workers_busy', 'Current number of workers running a task');
    this.registerGauge('tasks_queued_current', 'Current number of accepted tasks waiting for a worker');

    // Upstream
    this.registerCounter('upstream_requests_total', 'Total number of Open-Meteo request attempts');
    this.registerCounter('upstream_failures_total', 'Total number of forecasts that failed after retries');
    this.registerHistogram('upstream_request_duration_seconds', 'Open-Meteo forecast duration in seconds, retries included');

    // Callbacks
    this.registerCounter('callbacks_delivered_total', 'Total number of completion callbacks delivered');
    this.registerCounter('callbacks_failed_total', 'Total number of completion callbacks that failed');
    this.registerCounter('callbacks_blocked_total', 'Total number of callbacks refused by the egress allowlist');

    log.debug('System metrics initialized');
  }

  // Register metric types
  registerCounter(name: string, help: string): void {
    if (!this.metrics.has(name)) {
      this.metrics.set(name, {
        name,
        type: 'counter',
        help,
        value: 0,
      });
    }
  }

  registerGauge(name: string, help: string): void {
    if (!this.metrics.has(name)) {
      this.metrics.set(name, {
        name,
        type: 'gauge',
        help,
        value: 0,
      });
    }
  }

  registerHistogram(name: string, help: string, bounds: number[] = DEFAULT_BUCKETS): void {
    if (!this.metrics.has(name)) {
      this.metrics.set(name, {
        name,
        type: 'histogram',
        help,
        value: {},
      });
      this.histograms.set(name, []);
      const sorted = [...bounds].sort((a, b) => a - b);
      this.buckets.set(name, { bounds: sorted, counts: sorted.map(() => 0), count: 0, sum: 0 });
    }
  }

  // Increment counter
  incrementCounter(name: string, value: number = 1, labels?: Record<string, string>): void {
    const metric = this.metrics.get(name);
    if (metric && metric.type === 'counter') {
      if (typeof metric.value === 'number') {
        metric.value += value;
        metric.labels = labels;
      }
    }
  }

  // Set gauge value
  setGauge(name: string, value: number, labels?: Record<string, string>): void {
    const metric = this.metrics.get(name);
    if (metric && metric.type === 'gauge') {
      metric.value = value;
      metric.labels = labels;
    }
  }

  // Observe histogram value
  observeHistogram(name: string, value: number): void {
    const series = this.buckets.get(name);
    if (series) {
      series.count++;
      series.sum += value;
      series.bounds.forEach((bound, index) => {
        if (value <= bound) {
          series.counts[index] = (series.counts[index] ?? 0) + 1;
        }
      });
    }

    // Windowed samples feed the quantiles in getAllMetrics
    const values = this.histograms.get(name);
    if (values) {
      values.push(value);

      // Prevent memory leak by limiting histogram size
      // Keep a sliding window of recent samples
      if (values.length > MAX_HISTOGRAM_SAMPLES) {
        // Remove oldest samples when threshold is exceeded
        values.splice(0, values.length - HISTOGRAM_CLEANUP_THRESHOLD);
        log.debug(`Histogram ${name} trimmed to ${HISTOGRAM_CLEANUP_THRESHOLD} samples`);
      }
    }
  }

  // Current value of a counter or gauge
  getValue(name: string): number | undefined {
    const metric = this.metrics.get(name);
    return metric && typeof metric.value === 'number' ? metric.value : undefined;
  }

  // Update system metrics
  updateSystemMetrics(): void {
    const uptime = (Date.now() - this.startTime) / 1000;
    this.setGauge('process_uptime_seconds', uptime);

    const memUsage = process.memoryUsage();
    this.setGauge('process_memory_heap_used_bytes', memUsage.heapUsed);
    this.setGauge('process_memory_heap_total_bytes', memUsage.heapTotal);
    this.setGauge('process_memory_external_bytes', memUsage.external);
    this.setGauge('process_memory_rss_bytes', memUsage.rss);

    const cpuUsage = process.cpuUsage();
    const cpuPercent = (cpuUsage.user + cpuUsage.system) / 1000000 / uptime * 100;
    this.setGauge('process_cpu_usage_percent', cpuPercent);
  }

  // Calculate histogram statistics
  private calculateHistogramStats(values: number[]): Record<string, number> {
    if (values.length === 0) {
      return { count: 0, sum: 0, min: 0, max: 0, avg: 0, p50: 0, p95: 0, p99: 0 };
    }

    const sorted = [...values].sort((a, b) => a - b);
    const sum = sorted.reduce((a, b) => a + b, 0);

    const getPercentile = (p: number) => {
      const index = Math.ceil(sorted.length * p) - 1;
      return sorted[Math.max(0, index)] ?? 0;
    };

    return {
      count: sorted.length,
      sum,
      min: sorted[0] ?? 0,
      max: sorted[sorted.length - 1] ?? 0,
      avg: sum / sorted.length,
      p50: getPercentile(0.5),
      p95: getPercentile(0.95),
      p99: getPercentile(0.99),
    };
  }

  // Get all metrics
  getAllMetrics(): Metric[] {
    this.updateSystemMetrics();

    const metricsArray: Metric[] = [];

    for (const [name, metric] of this.metrics.entries()) {
      if (metric.type === 'histogram') {
        const values = this.histograms.get(name) || [];
        const stats = this.calculateHistogramStats(values);
        metricsArray.push({
          ...metric,
          value: stats,
        });
      } else {
        metricsArray.push(metric);
      }
    }

    return metricsArray;
  }

  // Export metrics in Prometheus format
  exportPrometheus(): string {
    this.updateSystemMetrics();

    let output = '';

    for (const [name, metric] of this.metrics.entries()) {
      output += `# HELP ${name} ${metric.help}\n`;
      output += `# TYPE ${name} ${metric.type}\n`;

      const series = this.buckets.get(name);
      if (metric.type === 'histogram' && series) {
        // Bucket counts are cumulative and never trimmed
        series.bounds.forEach((bound, index) => {
          output += `${name}_bucket{le="${bound}"} ${series.counts[index] ?? 0}\n`;
        });
        output += `${name}_bucket{le="+Inf"} ${series.count}\n`;
        output += `${name}_sum ${series.sum}\n`;
        output += `${name}_count ${series.count}\n`;
      } else {
        const labels = metric.labels
          ? '{' + Object.entries(metric.labels).map(([k, v]) => `${k}="${v}"`).join(',') + '}'
          : '';
        output += `${name}${labels} ${metric.value}\n`;
      }

      output += '\n';
    }

    return output;
  }

  // Reset all metrics
  reset(): void {
    for (const metric of this.metrics.values()) {
      if (metric.type === 'counter' || metric.type === 'gauge') {
        metric.value = 0;
      } else if (metric.type === 'histogram') {
        metric.value = {};
      }
    }
    for (const values of this.histograms.values()) {
      values.length = 0;
    }
    for (const series of this.buckets.values()) {
      series.counts.fill(0);
      series.count = 0;
      series.sum = 0;
    }
    this.startTime = Date.now();
  }
}

// Singleton instance
let instance: MetricsCollector | null = null;

export function getMetricsCollector(): MetricsCollector {
  if (!instance) {
    instance = new MetricsCollector();
  }
  return instance;
}

export function resetMetricsCollector(): void {
  instance = null;
}
