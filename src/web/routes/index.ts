/**
 * Routes exports
 */

export { registerA2ARoutes, type A2ARouteDeps } from './a2a.js';
export { registerSystemRoutes } from './system.js';
