/**
 * Configuration management for openmeteo-agent
 */

import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { z } from 'zod';
import type { AgentConfig } from '../types.js';
import { logger } from './logger.js';

// Configuration schema using Zod
const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8080),
  host: z.string().default('0.0.0.0'),
  maxBodyBytes: z.number().int().min(1024).max(16 * 1024 * 1024).default(1024 * 1024),
  cors: z.object({
    origins: z.array(z.string()).default([]),
  }).default({}),
});

const AuthConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
});

const AgentIdentitySchema = z.object({
  id: z.string().default('agent:openmeteo:v1'),
  name: z.string().default('OpenMeteo Agent'),
  version: z.string().default('1.0.0'),
  owner: z.string().default('your-org'),
});

const OpenMeteoConfigSchema = z.object({
  baseUrl: z.string().url().default('https://api.open-meteo.com/v1/forecast'),
  maxAttempts: z.number().int().min(1).max(10).default(2),
  initialBackoffMs: z.number().min(0).max(60000).default(800),
  backoffMultiplier: z.number().min(1).max(10).default(2),
  maxErrorBodyChars: z.number().int().min(0).default(800),
  circuitFailureThreshold: z.number().int().min(1).default(5),
  circuitResetMs: z.number().int().min(100).default(30000),
});

const TasksConfigSchema = z.object({
  defaultLatencyMs: z.number().min(0).default(20000),
  minTimeoutSeconds: z.number().int().min(1).default(5),
  maxTimeoutSeconds: z.number().int().min(1).default(60),
  maxConcurrent: z.number().int().min(1).max(256).default(8),
  retentionMs: z.number().int().min(1000).default(3_600_000),
  maxRetained: z.number().int().min(1).default(10_000),
}).refine(
  (data) => data.minTimeoutSeconds <= data.maxTimeoutSeconds,
  {
    message: 'minTimeoutSeconds must not exceed maxTimeoutSeconds',
    path: ['minTimeoutSeconds'],
  }
);

const CallbacksConfigSchema = z.object({
  enabled: z.boolean().default(false),
  allowedHosts: z.array(z.string()).default([]),
  timeoutMs: z.number().int().min(100).max(60000).default(5000),
});

const ConfigSchema = z.object({
  version: z.string().default('1.0.0'),
  server: ServerConfigSchema.default({}),
  auth: AuthConfigSchema.default({}),
  agent: AgentIdentitySchema.default({}),
  openMeteo: OpenMeteoConfigSchema.default({}),
  tasks: TasksConfigSchema.default({}),
  callbacks: CallbacksConfigSchema.default({}),
});

export const CONFIG_FILE_NAME = 'openmeteo-agent.config.json';

type Env = Record<string, string | undefined>;

/**
 * Interpolate environment variables in config values
 */
function interpolateEnvVars(obj: unknown, env: Env): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
      return env[envVar] ?? '';
    });
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => interpolateEnvVars(item, env));
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = interpolateEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = root[key];
  if (isRecord(existing)) {
    return existing;
  }
  const created: Record<string, unknown> = {};
  root[key] = created;
  return created;
}

function splitList(value: string): string[] {
  return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}

/**
 * Overlay well-known environment variables onto a raw config document
 */
export function applyEnvOverrides(raw: unknown, env: Env = process.env): Record<string, unknown> {
  const root: Record<string, unknown> = isRecord(raw) ? { ...raw } : {};

  if (env.AGENT_API_KEY) {
    section(root, 'auth').apiKey = env.AGENT_API_KEY;
  }
  if (env.PORT) {
    section(root, 'server').port = Number(env.PORT);
  }
  if (env.HOST) {
    section(root, 'server').host = env.HOST;
  }
  if (env.CORS_ORIGINS) {
    section(section(root, 'server'), 'cors').origins = splitList(env.CORS_ORIGINS);
  }
  if (env.OPEN_METEO_BASE_URL) {
    section(root, 'openMeteo').baseUrl = env.OPEN_METEO_BASE_URL;
  }
  if (env.AGENT_OWNER) {
    section(root, 'agent').owner = env.AGENT_OWNER;
  }
  if (env.CALLBACK_ALLOWED_HOSTS) {
    const callbacks = section(root, 'callbacks');
    callbacks.allowedHosts = splitList(env.CALLBACK_ALLOWED_HOSTS);
    callbacks.enabled = true;
  }

  return root;
}

/**
 * Find config file by walking up directories
 */
function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = startDir;

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

/**
 * Load and validate configuration
 */
export function loadConfig(configPath?: string, env: Env = process.env): AgentConfig {
  const path = configPath ?? findConfigFile();

  let rawConfig: unknown = {};

  if (path && existsSync(path)) {
    try {
      const content = readFileSync(path, 'utf-8');
      rawConfig = JSON.parse(content);
      logger.debug('Loaded config from file', { path });
    } catch (error) {
      logger.warn('Failed to parse config file, using defaults', {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  } else {
    logger.debug('No config file found, using defaults');
  }

  const interpolated = interpolateEnvVars(rawConfig, env);
  const withEnv = applyEnvOverrides(interpolated, env);

  const result = ConfigSchema.safeParse(withEnv);

  if (!result.success) {
    logger.warn('Config validation errors, using defaults', {
      errors: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
    });
    return fallbackConfig(withEnv);
  }

  return result.data;
}

/**
 * Defaults for everything except auth, so a bad unrelated setting never disables key enforcement
 */
function fallbackConfig(raw: Record<string, unknown>): AgentConfig {
  const withAuth = ConfigSchema.safeParse({ auth: raw.auth });
  if (withAuth.success) {
    return withAuth.data;
  }
  return ConfigSchema.parse({});
}

/**
 * Get default config
 */
export function getDefaultConfig(): AgentConfig {
  return ConfigSchema.parse({});
}

/**
 * Save configuration to file
 */
export function saveConfig(config: AgentConfig, configPath?: string): void {
  const path = configPath ?? join(process.cwd(), CONFIG_FILE_NAME);

  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  // API key is never written to disk
  const { apiKey: _omitted, ...auth } = config.auth;
  writeFileSync(path, JSON.stringify({ ...config, auth }, null, 2));
  logger.info('Configuration saved', { path });
}

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): { valid: boolean; errors?: string[] } {
  const result = ConfigSchema.safeParse(config);

  if (result.success) {
    return { valid: true };
  }

  return {
    valid: false,
    errors: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
  };
}

// Singleton config instance
let cachedConfig: AgentConfig | null = null;

/**
 * Get the current configuration (cached)
 */
export function getConfig(): AgentConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Reset the cached configuration
 */
export function resetConfig(): void {
  cachedConfig = null;
}
