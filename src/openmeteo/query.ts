/**
 * Open-Meteo query construction and hashing
 */

import { createHash } from 'node:crypto';
import type { ForecastInputs } from '../utils/validation.js';

export type ForecastQuery = Record<string, string | number>;

/**
 * Build the upstream query for a set of forecast inputs.
 * Null settings are left out; list fields are comma-joined and only sent when non-empty.
 */
export function buildQuery(inputs: ForecastInputs): ForecastQuery {
  const query: ForecastQuery = {
    latitude: inputs.latitude,
    longitude: inputs.longitude,
  };

  if (inputs.timezone !== null) query.timezone = inputs.timezone;
  if (inputs.forecast_days !== null) query.forecast_days = inputs.forecast_days;
  if (inputs.past_days !== null) query.past_days = inputs.past_days;
  if (inputs.hourly && inputs.hourly.length > 0) query.hourly = inputs.hourly.join(',');
  if (inputs.daily && inputs.daily.length > 0) query.daily = inputs.daily.join(',');
  if (inputs.model) query.models = inputs.model;

  return query;
}

export function toSearchParams(query: ForecastQuery): URLSearchParams {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    params.set(key, String(value));
  }
  return params;
}

/**
 * JSON with object keys sorted, so equal queries hash equally
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function sha256Hex(data: string): string {
  return createHash('sha256').update(data, 'utf-8').digest('hex');
}

export function queryHash(query: ForecastQuery): string {
  return sha256Hex(canonicalJson(query));
}
