/**
 * openmeteo-agent - A2A agent serving Open-Meteo weather forecasts
 *
 * @packageDocumentation
 */

// Types
export * from './types.js';

// Utils
export {
  logger,
  createLogger,
  initErrorTracking,
  loadConfig,
  getConfig,
  getDefaultConfig,
  saveConfig,
  validateConfig,
  resetConfig,
  CircuitBreaker,
  retryWithBackoff,
  FORECAST_TASK_TYPE,
  ForecastInputsSchema,
  A2ATaskSchema,
  EXAMPLE_TASK,
} from './utils/index.js';

// Open-Meteo
export { OpenMeteoClient, UpstreamError, type ForecastResult } from './openmeteo/client.js';
export { buildQuery, queryHash, canonicalJson } from './openmeteo/query.js';

// Tasks
export { TaskStore, TaskService, WorkerPool, runForecastTask, computeTimeoutSeconds, summarize } from './tasks/index.js';

// Agent card
export { buildAgentCard } from './agent/card.js';

// Auth
export { ApiKeyAuth } from './auth/service.js';

// Callbacks
export { CallbackNotifier } from './integrations/callback-notifier.js';

// Monitoring
export { HealthMonitor } from './monitoring/health.js';
export { MetricsCollector, getMetricsCollector } from './monitoring/metrics.js';

// Web server
export { AgentServer, startAgentServer, stopAgentServer, getAgentServer } from './web/index.js';
