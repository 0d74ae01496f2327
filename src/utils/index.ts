/**
 * Utility exports
 */

export { logger, createLogger, initErrorTracking, Logger, type LogLevel } from './logger.js';
export {
  loadConfig,
  getConfig,
  getDefaultConfig,
  saveConfig,
  validateConfig,
  resetConfig,
  CONFIG_FILE_NAME,
} from './config.js';
export * from './validation.js';
export { CircuitBreaker, retryWithBackoff, retryWithCircuitBreaker, type RetryOptions } from './retry.js';
