/**
 * Web server types
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { ServerConfig } from '../types.js';

export type WebConfig = ServerConfig;

export interface RouteHandler {
  (req: IncomingMessage, res: ServerResponse, params: RouteParams): Promise<void> | void;
}

/** Runs before the body is read; throws an ApiError to refuse the request */
export type RouteGuard = (req: IncomingMessage) => void;

export interface RouteOptions {
  guard?: RouteGuard;
}

export interface RouteParams {
  path: string[];
  query: Record<string, string>;
  body?: unknown;
  /** Set when a body was sent but is not valid JSON */
  bodyError?: string;
}

export interface Route {
  method: string;
  pattern: RegExp;
  handler: RouteHandler;
  paramNames: string[];
  guard?: RouteGuard;
}

export interface ErrorResponse {
  detail: string;
}

export interface ReadinessResult {
  status: 'ready' | 'not_ready';
  circuit: 'CLOSED' | 'OPEN' | 'HALF_OPEN';
  tasks: Record<string, number>;
  uptime: number;
  version: string;
}
