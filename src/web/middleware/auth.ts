/**
 * Authentication middleware
 */

import type { IncomingMessage } from 'node:http';
import type { ApiKeyAuth } from '../../auth/service.js';
import type { AuthContext, CredentialSource } from '../../auth/types.js';
import { logger } from '../../utils/logger.js';
import { unauthorized } from './error.js';

const log = logger.child('auth:middleware');

export type { AuthContext };

/**
 * Extract the credential from request headers
 */
export function getCredential(req: IncomingMessage): { token: string; source: CredentialSource } | null {
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    return { token: authHeader.slice(7), source: 'bearer' };
  }

  const apiKeyHeader = req.headers['x-api-key'];
  if (typeof apiKeyHeader === 'string' && apiKeyHeader.length > 0) {
    return { token: apiKeyHeader, source: 'x-api-key' };
  }

  return null;
}

/**
 * Create authentication middleware. The returned function throws a 401 ApiError
 * when the request carries no credential or a credential that does not match.
 */
export function createAuthMiddleware(auth: ApiKeyAuth) {
  return function authMiddleware(req: IncomingMessage): AuthContext {
    const credential = getCredential(req);
    if (!credential) {
      throw unauthorized('missing api-key');
    }

    if (!auth.verify(credential.token)) {
      log.warn('Rejected request with invalid api-key', { source: credential.source });
      throw unauthorized('invalid api-key');
    }

    return {
      authenticated: true,
      source: credential.source,
      keyEnforced: auth.isEnforced(),
    };
  };
}
