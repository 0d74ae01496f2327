/**
 * Core types for openmeteo-agent
 */

// Task lifecycle
export type TaskStatus = 'accepted' | 'working' | 'completed' | 'error';

export const TERMINAL_STATUSES: readonly TaskStatus[] = ['completed', 'error'];

export interface EvidenceItem {
  type: string;
  value: Record<string, unknown>;
}

export interface TaskRecord {
  status: TaskStatus;
  outputs: Record<string, unknown>;
  evidence: EvidenceItem[];
  idem?: string;
  /** Explicit idempotency key supplied by the caller, if any */
  idempotencyKey?: string;
  callback?: string;
  createdAt: Date;
  updatedAt: Date;
}

/** Wire view of a task, as returned by GET /a2a/task/:id */
export interface TaskView {
  task_id: string;
  status: TaskStatus;
  outputs: Record<string, unknown>;
  evidence: EvidenceItem[];
  idem?: string;
}

export interface ForecastSummary {
  latitude: unknown;
  longitude: unknown;
  hourly_fields: string[];
  daily_fields: string[];
}

// Agent card
export interface AgentCard {
  id: string;
  name: string;
  version: string;
  owner: string;
  capabilities: string[];
  modalities: string[];
  auth: { type: string };
  endpoints: { task: string; status: string };
  policies: { network: string; pii: string; logs: string };
  schema: string;
}

// Configuration
export interface AgentConfig {
  version: string;
  server: ServerConfig;
  auth: AuthConfig;
  agent: AgentIdentityConfig;
  openMeteo: OpenMeteoConfig;
  tasks: TasksConfig;
  callbacks: CallbacksConfig;
}

export interface ServerConfig {
  port: number;
  host: string;
  maxBodyBytes: number;
  cors: {
    origins: string[];
  };
}

export interface AuthConfig {
  apiKey?: string;
}

export interface AgentIdentityConfig {
  id: string;
  name: string;
  version: string;
  owner: string;
}

export interface OpenMeteoConfig {
  baseUrl: string;
  maxAttempts: number;
  initialBackoffMs: number;
  backoffMultiplier: number;
  maxErrorBodyChars: number;
  circuitFailureThreshold: number;
  circuitResetMs: number;
}

export interface TasksConfig {
  defaultLatencyMs: number;
  minTimeoutSeconds: number;
  maxTimeoutSeconds: number;
  maxConcurrent: number;
  retentionMs: number;
  maxRetained: number;
}

export interface CallbacksConfig {
  enabled: boolean;
  allowedHosts: string[];
  timeoutMs: number;
}
