/**
 * Input validation utilities using Zod
 */

import { z } from 'zod';

export const FORECAST_TASK_TYPE = 'weather.forecast';

const NUMERIC_STRING = /^\s*[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?\s*$/;

/** Numeric strings such as "35.6" or "2" become numbers; anything else is left for the schema to reject */
function numericString(value: unknown): unknown {
  return typeof value === 'string' && NUMERIC_STRING.test(value) ? Number(value) : value;
}

const LatitudeSchema = z.preprocess(
  numericString,
  z
    .number({ required_error: 'latitude is required', invalid_type_error: 'latitude must be a number' })
    .refine((v) => v >= -90 && v <= 90, { message: 'latitude out of range [-90,90]' })
);

const LongitudeSchema = z.preprocess(
  numericString,
  z
    .number({ required_error: 'longitude is required', invalid_type_error: 'longitude must be a number' })
    .refine((v) => v >= -180 && v <= 180, { message: 'longitude out of range [-180,180]' })
);

const dayCount = (min: number, max: number) =>
  z.preprocess(numericString, z.number().int().min(min).max(max));

const FieldListSchema = z.array(z.string()).nullish();

// Forecast inputs; null is accepted wherever the field is optional
export const ForecastInputsSchema = z.object({
  latitude: LatitudeSchema,
  longitude: LongitudeSchema,
  hourly: FieldListSchema,
  daily: FieldListSchema,
  timezone: z.string().nullable().default('UTC'),
  forecast_days: dayCount(1, 16).nullable().default(1),
  past_days: dayCount(0, 14).nullable().default(0),
  model: z.string().nullish(),
});

export type ForecastInputs = z.infer<typeof ForecastInputsSchema>;

const LatencySchema = z.preprocess(
  numericString,
  z.number({ invalid_type_error: 'latency_ms must be a number' }).nonnegative()
);

export const TaskConstraintsSchema = z
  .object({
    latency_ms: LatencySchema.optional(),
  })
  .passthrough();

export type TaskConstraints = z.infer<typeof TaskConstraintsSchema>;

export const A2ATaskSchema = z.object({
  task_id: z.string().max(200).nullish(),
  type: z.string({ required_error: 'type is required' }),
  inputs: ForecastInputsSchema,
  constraints: TaskConstraintsSchema.nullish(),
  evidence: z.unknown().optional(),
  // Checked against the egress allowlist at delivery
  callback: z.string().nullish(),
  idempotency_key: z.string().max(200).nullish(),
});

export type A2ATask = z.infer<typeof A2ATaskSchema>;

/** Sample request shown to callers whose task could not be understood */
export const EXAMPLE_TASK = {
  type: FORECAST_TASK_TYPE,
  inputs: {
    latitude: 35.6762,
    longitude: 139.6503,
    hourly: ['temperature_2m'],
    timezone: 'Asia/Tokyo',
    forecast_days: 1,
  },
} as const;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`);
}

// Validation helper
export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): { success: true; data: T } | { success: false; errors: string[] } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: formatIssues(result.error),
  };
}
