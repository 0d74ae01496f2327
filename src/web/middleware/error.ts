/**
 * Error handling middleware
 */

import type { ServerResponse } from 'node:http';
import { logger } from '../../utils/logger.js';

const log = logger.child('web:error');

/**
 * HTTP error carried up from a route; the message becomes the `detail` field
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly headers: Record<string, string>;

  constructor(statusCode: number, message: string, headers: Record<string, string> = {}) {
    super(message);
    this.statusCode = statusCode;
    this.headers = headers;
    this.name = 'ApiError';
  }
}

export function handleError(res: ServerResponse, error: unknown): void {
  const statusCode = error instanceof ApiError ? error.statusCode : 500;
  const message = error instanceof Error ? error.message : 'Internal server error';
  const headers = error instanceof ApiError ? error.headers : {};

  if (statusCode >= 500) {
    log.error('Server error', { error });
  } else {
    log.warn('Client error', { statusCode, message });
  }

  if (!res.headersSent) {
    res.writeHead(statusCode, { ...headers, 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ detail: message }));
  }
}

export function unauthorized(message: string = 'Unauthorized'): ApiError {
  return new ApiError(401, message);
}

export function notFound(message: string = 'Not Found'): ApiError {
  return new ApiError(404, message);
}

export function methodNotAllowed(allowed: string[]): ApiError {
  return new ApiError(405, 'Method Not Allowed', { Allow: allowed.join(', ') });
}

export function conflict(message: string): ApiError {
  return new ApiError(409, message);
}

export function payloadTooLarge(message: string = 'request body too large'): ApiError {
  return new ApiError(413, message);
}
