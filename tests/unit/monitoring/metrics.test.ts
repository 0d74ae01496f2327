import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  MetricsCollector,
  getMetricsCollector,
  resetMetricsCollector,
} from '../../../src/monitoring/metrics.js';

describe('MetricsCollector', () => {
  let collector: MetricsCollector;

  beforeEach(() => {
    collector = new MetricsCollector();
  });

  afterEach(() => {
    resetMetricsCollector();
  });

  it('should register the agent metrics up front', () => {
    const names = collector.getAllMetrics().map((m) => m.name);

    expect(names).toEqual(expect.arrayContaining([
      'process_uptime_seconds',
      'http_requests_total',
      'tasks_created_total',
      'tasks_inflight_current',
      'upstream_requests_total',
      'upstream_request_duration_seconds',
      'callbacks_blocked_total',
    ]));
  });

  it('should increment counters', () => {
    collector.incrementCounter('tasks_created_total');
    collector.incrementCounter('tasks_created_total', 2);

    expect(collector.getValue('tasks_created_total')).toBe(3);
  });

  it('should ignore unknown metrics and type mismatches', () => {
    collector.incrementCounter('no_such_metric');
    collector.setGauge('tasks_created_total', 99);
    collector.incrementCounter('tasks_inflight_current');

    expect(collector.getValue('no_such_metric')).toBeUndefined();
    expect(collector.getValue('tasks_created_total')).toBe(0);
    expect(collector.getValue('tasks_inflight_current')).toBe(0);
  });

  it('should set gauges', () => {
    collector.setGauge('tasks_retained_current', 12);
    collector.setGauge('tasks_retained_current', 7);

    expect(collector.getValue('tasks_retained_current')).toBe(7);
  });

  it('should summarize histograms', () => {
    for (const value of [0.1, 0.2, 0.3, 0.4]) {
      collector.observeHistogram('upstream_request_duration_seconds', value);
    }

    const histogram = collector.getAllMetrics().find((m) => m.name === 'upstream_request_duration_seconds');

    expect(histogram?.value).toMatchObject({ count: 4, min: 0.1, max: 0.4, p50: 0.2, p99: 0.4 });
  });

  it('should report empty histograms as zeros', () => {
    const histogram = collector.getAllMetrics().find((m) => m.name === 'http_request_duration_seconds');

    expect(histogram?.value).toEqual({ count: 0, sum: 0, min: 0, max: 0, avg: 0, p50: 0, p95: 0, p99: 0 });
  });

  it('should export Prometheus text', () => {
    collector.incrementCounter('tasks_completed_total', 5);
    collector.observeHistogram('http_request_duration_seconds', 0.5);

    const output = collector.exportPrometheus();

    expect(output).toContain(
      '# HELP tasks_completed_total Total number of forecast tasks completed\n' +
      '# TYPE tasks_completed_total counter\n' +
      'tasks_completed_total 5\n'
    );
    expect(output).toContain('http_request_duration_seconds_count 1\n');
    expect(output).toContain('http_request_duration_seconds_sum 0.5\n');
  });

  it('should export histograms as cumulative le buckets', () => {
    collector.observeHistogram('upstream_request_duration_seconds', 0.3);
    collector.observeHistogram('upstream_request_duration_seconds', 2);

    const output = collector.exportPrometheus();

    expect(output).toContain('# TYPE upstream_request_duration_seconds histogram\n');
    expect(output).toContain('upstream_request_duration_seconds_bucket{le="0.25"} 0\n');
    expect(output).toContain('upstream_request_duration_seconds_bucket{le="0.5"} 1\n');
    expect(output).toContain('upstream_request_duration_seconds_bucket{le="2.5"} 2\n');
    expect(output).toContain('upstream_request_duration_seconds_bucket{le="+Inf"} 2\n');
    expect(output).toContain('upstream_request_duration_seconds_count 2\n');
    expect(output).not.toContain('upstream_request_duration_seconds_avg');
    expect(output).not.toContain('quantile=');
  });

  it('should take custom bucket bounds', () => {
    collector.registerHistogram('test_duration_seconds', 'Test durations', [2, 1]);
    collector.observeHistogram('test_duration_seconds', 1.5);

    const output = collector.exportPrometheus();

    expect(output).toContain(
      'test_duration_seconds_bucket{le="1"} 0\n' +
      'test_duration_seconds_bucket{le="2"} 1\n' +
      'test_duration_seconds_bucket{le="+Inf"} 1\n' +
      'test_duration_seconds_sum 1.5\n' +
      'test_duration_seconds_count 1\n'
    );
  });

  it('should zero everything on reset', () => {
    collector.incrementCounter('http_requests_total', 4);
    collector.observeHistogram('http_request_duration_seconds', 1);

    collector.reset();

    expect(collector.getValue('http_requests_total')).toBe(0);
    expect(collector.exportPrometheus()).toContain('http_request_duration_seconds_count 0\n');
  });

  it('should share one collector until reset', () => {
    const first = getMetricsCollector();
    expect(getMetricsCollector()).toBe(first);

    resetMetricsCollector();
    expect(getMetricsCollector()).not.toBe(first);
  });
});
