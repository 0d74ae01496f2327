/**
 * CLI commands
 */

export { createServeCommand } from './serve.js';
export { createCardCommand } from './card.js';
export { createForecastCommand, buildForecastTask } from './forecast.js';
