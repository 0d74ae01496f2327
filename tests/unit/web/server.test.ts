/**
 * Server tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AgentServer, startAgentServer, stopAgentServer, getAgentServer } from '../../../src/web/server.js';
import { OpenMeteoClient, type FetchFn } from '../../../src/openmeteo/client.js';
import { buildAgentCard } from '../../../src/agent/card.js';
import { getDefaultConfig } from '../../../src/utils/config.js';
import { EXAMPLE_TASK } from '../../../src/utils/validation.js';
import { resetMetricsCollector } from '../../../src/monitoring/metrics.js';
import type { AgentConfig } from '../../../src/types.js';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    child: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }),
  },
}));

const FORECAST = { latitude: 35.7, longitude: 139.69, hourly: { time: [], temperature_2m: [] } };
const AUTH = { Authorization: 'Bearer test-secret', 'Content-Type': 'application/json' };

const TASK = {
  task_id: 'tokyo-1',
  type: 'weather.forecast',
  inputs: { latitude: 35.6762, longitude: 139.6503, hourly: ['temperature_2m'], timezone: 'Asia/Tokyo' },
};

function testConfig(): AgentConfig {
  const config = getDefaultConfig();
  config.server.port = 0;
  config.server.host = '127.0.0.1';
  config.server.maxBodyBytes = 1024;
  config.server.cors.origins = ['http://dash.test'];
  config.auth.apiKey = 'test-secret';
  return config;
}

describe('AgentServer', () => {
  let server: AgentServer;
  let upstream: ReturnType<typeof vi.fn<FetchFn>>;
  let baseUrl: string;
  let config: AgentConfig;

  beforeEach(async () => {
    resetMetricsCollector();
    config = testConfig();
    upstream = vi.fn<FetchFn>().mockImplementation(async () =>
      new Response(JSON.stringify(FORECAST), { status: 200 })
    );
    server = new AgentServer(config, {
      client: new OpenMeteoClient({ initialBackoffMs: 1 }, { fetch: upstream }),
    });
    await server.start();
    baseUrl = `http://127.0.0.1:${server.getStatus().port}`;
  });

  afterEach(async () => {
    await server.stop();
    await server.service.drain();
  });

  const post = (body: string, headers: Record<string, string> = AUTH) =>
    fetch(`${baseUrl}/a2a/task`, { method: 'POST', headers, body });

  describe('GET /a2a/agent-card', () => {
    it('should serve the card without auth', async () => {
      const response = await fetch(`${baseUrl}/a2a/agent-card`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual(buildAgentCard(config.agent));
    });
  });

  describe('POST /a2a/task', () => {
    it('should accept a task and let it be polled to completion', async () => {
      const response = await post(JSON.stringify(TASK));

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ task_id: 'tokyo-1', status: 'accepted' });

      await server.service.drain();

      const poll = await fetch(`${baseUrl}/a2a/task/tokyo-1`);
      expect(poll.status).toBe(200);
      const view: unknown = await poll.json();
      expect(view).toMatchObject({
        task_id: 'tokyo-1',
        status: 'completed',
        outputs: {
          summary: {
            latitude: 35.7,
            longitude: 139.69,
            hourly_fields: ['time', 'temperature_2m'],
            daily_fields: [],
          },
          open_meteo: FORECAST,
        },
      });
      expect(String(upstream.mock.calls[0]?.[0])).toBe(
        'https://api.open-meteo.com/v1/forecast?latitude=35.6762&longitude=139.6503&timezone=Asia%2FTokyo' +
        '&forecast_days=1&past_days=0&hourly=temperature_2m'
      );
    });

    it('should accept the key in X-API-Key', async () => {
      const response = await post(JSON.stringify(TASK), { 'X-API-Key': 'test-secret' });

      expect(response.status).toBe(200);
    });

    it('should require credentials', async () => {
      const response = await post(JSON.stringify(TASK), {});

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({ detail: 'missing api-key' });
      expect(upstream).not.toHaveBeenCalled();
    });

    it('should reject a wrong key', async () => {
      const response = await post(JSON.stringify(TASK), { Authorization: 'Bearer nope' });

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({ detail: 'invalid api-key' });
    });

    it('should answer malformed JSON with input_required', async () => {
      const response = await post('{"type": ');

      expect(response.status).toBe(200);
      const body: unknown = await response.json();
      expect(body).toMatchObject({ status: 'input_required', outputs: { example: EXAMPLE_TASK } });
    });

    it('should answer invalid inputs with input_required', async () => {
      const response = await post(JSON.stringify({ type: 'weather.forecast', inputs: { latitude: 0, longitude: 200 } }));

      expect(await response.json()).toEqual({
        status: 'input_required',
        outputs: { error: 'inputs.longitude: longitude out of range [-180,180]', example: EXAMPLE_TASK },
      });
    });

    it('should answer 409 for a reused task_id', async () => {
      await post(JSON.stringify(TASK));
      const response = await post(JSON.stringify(TASK));

      expect(response.status).toBe(409);
      expect(await response.json()).toEqual({ detail: 'task already exists' });
    });

    it('should answer 413 for oversized bodies', async () => {
      const response = await post(JSON.stringify({ ...TASK, pad: 'x'.repeat(4096) }));

      expect(response.status).toBe(413);
      expect(await response.json()).toEqual({ detail: 'request body too large' });
    });

    it('should check credentials before the body size', async () => {
      const response = await post(JSON.stringify({ ...TASK, pad: 'x'.repeat(4096) }), {});

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({ detail: 'missing api-key' });
    });

    it('should replay a task submitted again with the same idempotency_key', async () => {
      const body = JSON.stringify({ type: 'weather.forecast', inputs: TASK.inputs, idempotency_key: 'once' });

      const first = await post(body);
      const accepted: unknown = await first.json();
      await server.service.drain();
      const taskId = server.service.store.findByIdempotencyKey('once')?.taskId;

      const second = await post(body);
      const replayed: unknown = await second.json();

      expect(typeof taskId).toBe('string');
      expect(accepted).toEqual({ task_id: taskId, status: 'accepted' });
      expect(second.status).toBe(200);
      expect(replayed).toEqual({ task_id: taskId, status: 'completed' });
      expect(upstream).toHaveBeenCalledTimes(1);
    });

    it('should take coordinates sent as numeric strings', async () => {
      const response = await post(JSON.stringify({
        task_id: 'strings-1',
        type: 'weather.forecast',
        inputs: { latitude: '35.6', longitude: '139.6' },
      }));

      expect(await response.json()).toEqual({ task_id: 'strings-1', status: 'accepted' });
    });

    it('should answer other methods with 405', async () => {
      const response = await fetch(`${baseUrl}/a2a/task`);

      expect(response.status).toBe(405);
      expect(response.headers.get('allow')).toBe('POST');
      expect(await response.json()).toEqual({ detail: 'Method Not Allowed' });
    });
  });

  describe('GET /a2a/task/:id', () => {
    it('should answer 404 for unknown tasks', async () => {
      const response = await fetch(`${baseUrl}/a2a/task/nope`);

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ detail: 'no such task' });
    });
  });

  describe('system routes', () => {
    it('should answer liveness', async () => {
      const response = await fetch(`${baseUrl}/healthz`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ ok: true });
    });

    it('should answer readiness', async () => {
      const response = await fetch(`${baseUrl}/healthz/ready`);

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ status: 'ready', circuit: 'CLOSED' });
    });

    it('should report component health', async () => {
      const response = await fetch(`${baseUrl}/healthz/detailed`);

      expect(response.status).toBe(200);
      const report: unknown = await response.json();
      expect(report).toMatchObject({
        checks: {
          upstream: { status: 'pass', details: { circuit: 'CLOSED' } },
          tasks: { status: 'pass', details: { retained: 0, workers: { busy: 0, limit: 8, queued: 0 } } },
          auth: { status: 'pass', message: 'API key enforced' },
        },
      });
    });

    it('should export metrics as text', async () => {
      await fetch(`${baseUrl}/healthz`);
      const response = await fetch(`${baseUrl}/metrics`);

      expect(response.headers.get('content-type')).toBe('text/plain; version=0.0.4');
      expect(await response.text()).toContain('# TYPE http_requests_total counter\n');
    });

    it('should answer unknown paths with 404', async () => {
      const response = await fetch(`${baseUrl}/nowhere`);

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ detail: 'Not Found' });
    });
  });

  describe('CORS', () => {
    it('should answer preflight for allowed origins', async () => {
      const response = await fetch(`${baseUrl}/a2a/task`, {
        method: 'OPTIONS',
        headers: { Origin: 'http://dash.test' },
      });

      expect(response.status).toBe(204);
      expect(response.headers.get('access-control-allow-origin')).toBe('http://dash.test');
      expect(response.headers.get('access-control-allow-methods')).toBe('GET, POST, OPTIONS');
    });
  });

  describe('lifecycle', () => {
    it('should report status with the bound port', () => {
      const status = server.getStatus();

      expect(status.running).toBe(true);
      expect(status.host).toBe('127.0.0.1');
      expect(status.port).toBeGreaterThan(0);
    });

    it('should report stopped after stop', async () => {
      await server.stop();

      expect(server.getStatus().running).toBe(false);
    });
  });
});

describe('AgentServer with a failing upstream', () => {
  let server: AgentServer;
  let baseUrl: string;

  beforeEach(async () => {
    resetMetricsCollector();
    const config = testConfig();
    const failing = vi.fn<FetchFn>().mockImplementation(async () => new Response('down', { status: 503 }));
    server = new AgentServer(config, {
      client: new OpenMeteoClient(
        { ...config.openMeteo, maxAttempts: 1, initialBackoffMs: 1, circuitFailureThreshold: 1 },
        { fetch: failing }
      ),
    });
    await server.start();
    baseUrl = `http://127.0.0.1:${server.getStatus().port}`;
  });

  afterEach(async () => {
    await server.stop();
    await server.service.drain();
  });

  it('should report not ready while the circuit is open', async () => {
    await fetch(`${baseUrl}/a2a/task`, { method: 'POST', headers: AUTH, body: JSON.stringify(TASK) });
    await server.service.drain();

    const response = await fetch(`${baseUrl}/healthz/ready`);

    expect(response.status).toBe(503);
    expect(await response.json()).toMatchObject({ status: 'not_ready', circuit: 'OPEN' });

    const task = await fetch(`${baseUrl}/a2a/task/tokyo-1`);
    expect(await task.json()).toMatchObject({
      status: 'error',
      outputs: { message: 'upstream_failed', detail: 'status=503, body=down' },
    });
  });

  it('should fail the upstream check in the detailed report', async () => {
    await fetch(`${baseUrl}/a2a/task`, { method: 'POST', headers: AUTH, body: JSON.stringify(TASK) });
    await server.service.drain();

    const response = await fetch(`${baseUrl}/healthz/detailed`);
    const report: unknown = await response.json();

    expect(report).toMatchObject({
      status: 'unhealthy',
      checks: { upstream: { status: 'fail', message: 'Open-Meteo circuit is open' } },
    });
  });
});

describe('startAgentServer', () => {
  afterEach(async () => {
    await stopAgentServer();
  });

  it('should keep a single running instance', async () => {
    const first = await startAgentServer(testConfig());
    const second = await startAgentServer(testConfig());

    expect(second).toBe(first);
    expect(getAgentServer()).toBe(first);

    await stopAgentServer();
    expect(getAgentServer()).toBeNull();
  });
});
