/**
 * CORS middleware
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { WebConfig } from '../types.js';

const ALLOWED_HEADERS = 'Content-Type, Authorization, X-API-Key';
const PREFLIGHT_MAX_AGE_SECONDS = 86400;

/**
 * Browser access for the agent card, task polling and submissions.
 * `methods` are the ones the router serves; OPTIONS is always added.
 */
export function createCorsMiddleware(config: Pick<WebConfig, 'cors'>, methods: string[] = ['GET', 'POST']) {
  const allowedOrigins = config.cors.origins;
  const anyOrigin = allowedOrigins.includes('*');
  const allowMethods = [...new Set([...methods, 'OPTIONS'])].join(', ');

  return function corsMiddleware(req: IncomingMessage, res: ServerResponse): boolean {
    const origin = req.headers.origin;
    const originAllowed = origin !== undefined && (anyOrigin || allowedOrigins.includes(origin));

    if (originAllowed) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Vary', 'Origin');
    } else if (anyOrigin) {
      res.setHeader('Access-Control-Allow-Origin', '*');
    }

    if (req.method !== 'OPTIONS') {
      return false;
    }

    // Preflight: only an allowed origin learns the methods and headers
    if (originAllowed || anyOrigin) {
      res.setHeader('Access-Control-Allow-Methods', allowMethods);
      res.setHeader('Access-Control-Allow-Headers', ALLOWED_HEADERS);
      res.setHeader('Access-Control-Max-Age', String(PREFLIGHT_MAX_AGE_SECONDS));
    }
    res.writeHead(204);
    res.end();
    return true;
  };
}
