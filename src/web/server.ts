/**
 * Web server - HTTP server for the A2A agent
 */

import * as http from 'node:http';
import type { AgentConfig } from '../types.js';
import { logger } from '../utils/logger.js';
import { Router, sendError } from './router.js';
import { createCorsMiddleware, createAuthMiddleware, handleError } from './middleware/index.js';
import { registerA2ARoutes, registerSystemRoutes } from './routes/index.js';
import { ApiKeyAuth } from '../auth/service.js';
import { buildAgentCard } from '../agent/card.js';
import { TaskService, type TaskServiceDeps } from '../tasks/service.js';
import { HealthMonitor } from '../monitoring/health.js';
import { getMetricsCollector } from '../monitoring/metrics.js';

const log = logger.child('web:server');

export interface AgentServerStatus {
  running: boolean;
  host: string;
  port: number;
}

export class AgentServer {
  private server: http.Server | null = null;
  private router: Router;
  private config: AgentConfig;
  private corsMiddleware: ReturnType<typeof createCorsMiddleware>;
  readonly service: TaskService;
  readonly monitor: HealthMonitor;

  constructor(config: AgentConfig, deps: TaskServiceDeps = {}) {
    this.config = config;
    this.router = new Router({ maxBodyBytes: config.server.maxBodyBytes });
    this.service = new TaskService(config, deps);
    this.monitor = new HealthMonitor(config, this.service);

    this.setupRoutes();
    this.corsMiddleware = createCorsMiddleware(config.server, this.router.methods());
  }

  private setupRoutes(): void {
    registerA2ARoutes(this.router, {
      card: buildAgentCard(this.config.agent),
      service: this.service,
      authenticate: createAuthMiddleware(new ApiKeyAuth(this.config.auth.apiKey)),
    });
    registerSystemRoutes(this.router, this.monitor);
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    return new Promise((resolve, reject) => {
      const server = http.createServer((req, res) => {
        this.handleRequest(req, res).catch((error: unknown) => handleError(res, error));
      });

      server.on('error', (error) => {
        log.error('Server error', { error });
        reject(error);
      });

      server.listen(this.config.server.port, this.config.server.host, () => {
        this.server = server;
        this.service.startPruning();
        const { host, port } = this.getStatus();
        log.info('Agent server started', {
          host,
          port,
          url: `http://${host}:${port}`,
        });
        resolve();
      });
    });
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const metrics = getMetricsCollector();
    const started = Date.now();

    res.on('finish', () => {
      metrics.incrementCounter('http_requests_total');
      if (res.statusCode >= 400) {
        metrics.incrementCounter('http_requests_errors_total');
      }
      metrics.observeHistogram('http_request_duration_seconds', (Date.now() - started) / 1000);
      log.debug('Request handled', {
        method: req.method,
        path: (req.url || '/').split('?')[0],
        status: res.statusCode,
      });
    });

    // CORS handling
    if (this.corsMiddleware(req, res)) {
      return; // Preflight handled
    }

    const handled = await this.router.handle(req, res);
    if (!handled) {
      sendError(res, 404, 'Not Found');
    }
  }

  /**
   * Stop the server. In-flight tasks keep running; use `service.drain()` to wait for them.
   */
  async stop(): Promise<void> {
    this.service.stopPruning();

    const server = this.server;
    if (!server) {
      return;
    }

    return new Promise((resolve) => {
      server.close(() => {
        log.info('Agent server stopped');
        this.server = null;
        resolve();
      });
      server.closeAllConnections();
    });
  }

  /**
   * Get server status. Reports the bound port once listening, so port 0 resolves.
   */
  getStatus(): AgentServerStatus {
    const address = this.server?.address();

    return {
      running: this.server !== null,
      host: this.config.server.host,
      port: address && typeof address === 'object' ? address.port : this.config.server.port,
    };
  }
}

// Singleton instance
let serverInstance: AgentServer | null = null;

/**
 * Start the agent server
 */
export async function startAgentServer(config: AgentConfig, deps?: TaskServiceDeps): Promise<AgentServer> {
  if (serverInstance) {
    log.warn('Agent server already running');
    return serverInstance;
  }

  const instance = new AgentServer(config, deps);
  await instance.start();
  serverInstance = instance;
  return instance;
}

/**
 * Stop the agent server
 */
export async function stopAgentServer(): Promise<void> {
  if (serverInstance) {
    await serverInstance.stop();
    serverInstance = null;
  }
}

export function getAgentServer(): AgentServer | null {
  return serverInstance;
}
