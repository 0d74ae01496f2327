/**
 * Web module exports
 */

export { AgentServer, startAgentServer, stopAgentServer, getAgentServer, type AgentServerStatus } from './server.js';
export { Router, sendJson, sendError } from './router.js';
export type { WebConfig, RouteHandler, RouteParams, ReadinessResult } from './types.js';
