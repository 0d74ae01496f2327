/**
 * HTTP Router for the web server
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Route, RouteGuard, RouteHandler, RouteOptions, RouteParams, ErrorResponse } from './types.js';
import { handleError, methodNotAllowed, payloadTooLarge } from './middleware/error.js';

const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

export class Router {
  private routes: Route[] = [];
  private readonly maxBodyBytes: number;

  constructor(options: { maxBodyBytes?: number } = {}) {
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  }

  /**
   * Register a route
   */
  private addRoute(method: string, path: string, handler: RouteHandler, options: RouteOptions): void {
    // Convert path to regex pattern
    // e.g., '/a2a/task/:id' -> /^\/a2a\/task\/([^\/]+)$/
    const paramNames: string[] = [];
    const pattern = path
      .replace(/\//g, '\\/')
      .replace(/:([^/]+)/g, (_, paramName: string) => {
        paramNames.push(paramName);
        return '([^\\/]+)';
      });

    this.routes.push({
      method: method.toUpperCase(),
      pattern: new RegExp(`^${pattern}$`),
      handler,
      paramNames,
      guard: options.guard,
    });
  }

  // HTTP method shortcuts
  get(path: string, handler: RouteHandler, options: RouteOptions = {}): void {
    this.addRoute('GET', path, handler, options);
  }

  post(path: string, handler: RouteHandler, options: RouteOptions = {}): void {
    this.addRoute('POST', path, handler, options);
  }

  /**
   * Match a request to a route
   */
  match(
    method: string,
    url: string
  ): { handler: RouteHandler; params: RouteParams; guard?: RouteGuard } | null {
    const [pathname, queryString] = url.split('?');

    for (const route of this.routes) {
      if (route.method !== method.toUpperCase()) continue;

      const match = pathname?.match(route.pattern);
      if (!match) continue;

      // Extract path parameters
      const path: string[] = [];
      route.paramNames.forEach((_name, index) => {
        path.push(safeDecode(match[index + 1] || ''));
      });

      // Parse query parameters
      const query: Record<string, string> = {};
      if (queryString) {
        const searchParams = new URLSearchParams(queryString);
        for (const [key, value] of searchParams) {
          query[key] = value;
        }
      }

      return {
        handler: route.handler,
        params: { path, query },
        guard: route.guard,
      };
    }

    return null;
  }

  /**
   * Every method some route answers to
   */
  methods(): string[] {
    return [...new Set(this.routes.map((route) => route.method))];
  }

  /**
   * Methods registered for a path, whatever the request method
   */
  allowedMethods(url: string): string[] {
    const [pathname = '/'] = url.split('?');
    const methods = this.routes
      .filter((route) => route.pattern.test(pathname))
      .map((route) => route.method);
    return [...new Set(methods)];
  }

  /**
   * Handle an incoming request
   */
  async handle(req: IncomingMessage, res: ServerResponse): Promise<boolean> {
    const method = req.method || 'GET';
    const url = req.url || '/';

    const matched = this.match(method, url);
    if (!matched) {
      const allowed = this.allowedMethods(url);
      if (allowed.length === 0) return false;
      handleError(res, methodNotAllowed(allowed));
      return true;
    }

    try {
      // Guards see headers only; the body stays unread until they pass
      matched.guard?.(req);

      if (method === 'POST') {
        const raw = await this.readBody(req);
        if (raw.length > 0) {
          try {
            matched.params.body = JSON.parse(raw);
          } catch (error) {
            matched.params.bodyError = error instanceof Error ? error.message : 'Invalid JSON body';
          }
        }
      }

      await matched.handler(req, res, matched.params);
    } catch (error) {
      handleError(res, error);
    }

    return true;
  }

  /**
   * Read the request body as UTF-8, bounded by maxBodyBytes
   */
  private readBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let received = 0;
      let tooLarge = false;

      req.on('data', (chunk: Buffer) => {
        if (tooLarge) return;
        received += chunk.length;
        if (received > this.maxBodyBytes) {
          tooLarge = true;
          reject(payloadTooLarge());
          return;
        }
        chunks.push(chunk);
      });

      req.on('end', () => {
        if (!tooLarge) {
          resolve(Buffer.concat(chunks).toString('utf-8'));
        }
      });

      req.on('error', reject);
    });
  }
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

// Response helpers
export function sendJson<T>(res: ServerResponse, data: T, statusCode: number = 200): void {
  res.writeHead(statusCode, {
    'Content-Type': 'application/json',
  });
  res.end(JSON.stringify(data));
}

export function sendError(res: ServerResponse, statusCode: number, message: string): void {
  const response: ErrorResponse = { detail: message };
  sendJson(res, response, statusCode);
}
