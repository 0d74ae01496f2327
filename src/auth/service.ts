/**
 * API key authentication service
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import { logger } from '../utils/logger.js';

const log = logger.child('auth');

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf-8').digest();
}

export class ApiKeyAuth {
  private readonly expected: Buffer | null;

  constructor(apiKey?: string) {
    this.expected = apiKey ? digest(apiKey) : null;

    if (!this.expected) {
      log.warn('No AGENT_API_KEY set, any bearer token will be accepted (not suitable for production)');
    }
  }

  isEnforced(): boolean {
    return this.expected !== null;
  }

  /**
   * Constant-time comparison against the configured key.
   * Without a configured key every token verifies.
   */
  verify(token: string): boolean {
    if (!this.expected) {
      return true;
    }
    return timingSafeEqual(digest(token), this.expected);
  }
}
