/**
 * Agent card - static A2A descriptor of this agent
 */

import type { AgentCard, AgentIdentityConfig } from '../types.js';

export const A2A_SCHEMA_URL = 'https://a2a-protocol.org/schema/v1';

export function buildAgentCard(identity: AgentIdentityConfig): AgentCard {
  return {
    id: identity.id,
    name: identity.name,
    version: identity.version,
    owner: identity.owner,
    capabilities: ['data.fetch', 'geo.monitor'],
    modalities: ['json'],
    auth: { type: 'api-key' },
    endpoints: {
      task: 'POST /a2a/task',
      status: 'GET /a2a/task/{id}',
    },
    policies: {
      network: 'egress-allowlist',
      pii: 'no-store',
      logs: 'hash-only',
    },
    schema: A2A_SCHEMA_URL,
  };
}
