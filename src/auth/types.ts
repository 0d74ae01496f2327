/**
 * Authentication types
 */

export type CredentialSource = 'bearer' | 'x-api-key';

export interface AuthContext {
  authenticated: boolean;
  source?: CredentialSource;
  /** False when the server runs without AGENT_API_KEY and accepts any token */
  keyEnforced: boolean;
}
