/**
 * Trace Query Criteria
 *
 * Validation and normalisation of TraceQueryCriteria, plus the duration and
 * lookback parsers used by the CLI.
 */

import { z } from 'zod';

import { DEFAULT_NUM_TRACES } from '../constants.js';
import type { TraceQueryCriteria } from './types.js';

/**
 * Criteria after validation. `numTraces` is always set.
 */
export type NormalizedCriteria = TraceQueryCriteria & { numTraces: number };

// Empty strings and zero durations mean "no constraint"
const optionalName = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const optionalDuration = z
  .number()
  .int('must be an integer number of microseconds')
  .nonnegative()
  .optional()
  .transform((value) => (value ? value : undefined));

const criteriaSchema = z
  .object({
    serviceName: optionalName,
    operationName: optionalName,
    startTimeMin: z.date().optional(),
    startTimeMax: z.date().optional(),
    durationMin: optionalDuration,
    durationMax: optionalDuration,
    tags: z.record(z.string()).optional(),
    numTraces: z.number().int().optional(),
  })
  .refine(
    (c) =>
      c.durationMin === undefined || c.durationMax === undefined || c.durationMin <= c.durationMax,
    { message: 'must not be less than durationMin', path: ['durationMax'] },
  )
  .refine(
    (c) =>
      c.startTimeMin === undefined ||
      c.startTimeMax === undefined ||
      c.startTimeMin.getTime() <= c.startTimeMax.getTime(),
    { message: 'must not be before startTimeMin', path: ['startTimeMax'] },
  );

/**
 * Resolve the requested trace count, falling back to the default when
 * absent or not positive.
 */
export function resolveNumTraces(numTraces: number | undefined): number {
  return numTraces !== undefined && numTraces > 0 ? numTraces : DEFAULT_NUM_TRACES;
}

/**
 * Validate criteria and apply defaults.
 *
 * @throws Error listing every invalid field
 */
export function normalizeCriteria(criteria: TraceQueryCriteria): NormalizedCriteria {
  const result = criteriaSchema.safeParse(criteria);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'criteria'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid trace query: ${issues}`);
  }

  const normalized: NormalizedCriteria = { numTraces: resolveNumTraces(result.data.numTraces) };
  const { serviceName, operationName, startTimeMin, startTimeMax, durationMin, durationMax, tags } =
    result.data;

  if (serviceName !== undefined) normalized.serviceName = serviceName;
  if (operationName !== undefined) normalized.operationName = operationName;
  if (startTimeMin !== undefined) normalized.startTimeMin = startTimeMin;
  if (startTimeMax !== undefined) normalized.startTimeMax = startTimeMax;
  if (durationMin !== undefined) normalized.durationMin = durationMin;
  if (durationMax !== undefined) normalized.durationMax = durationMax;
  if (tags !== undefined && Object.keys(tags).length > 0) normalized.tags = tags;

  return normalized;
}

/**
 * Parse a duration string to microseconds.
 * Supports: 250us, 10ms, 1.5s, 2m, 1h
 */
export function parseDuration(duration: string): number {
  const match = duration.trim().match(/^(\d+(?:\.\d+)?)(us|µs|ms|s|m|h)$/);
  if (!match) {
    throw new Error(`Invalid duration: ${duration}. Use format like 250us, 10ms, 1.5s, 2m`);
  }

  const value = parseFloat(match[1]);
  const unit = match[2];

  switch (unit) {
    case 'us':
    case 'µs':
      return Math.round(value);
    case 'ms':
      return Math.round(value * 1000);
    case 's':
      return Math.round(value * 1_000_000);
    case 'm':
      return Math.round(value * 60 * 1_000_000);
    case 'h':
      return Math.round(value * 60 * 60 * 1_000_000);
    default:
      throw new Error(`Unknown duration unit: ${unit}`);
  }
}

/**
 * Parse a lookback window to milliseconds.
 * Supports: 15m, 1h, 24h, 7d
 */
export function parseLookback(lookback: string): number {
  const match = lookback.match(/^(\d+)(m|h|d)$/);
  if (!match) {
    throw new Error(`Invalid lookback: ${lookback}. Use format like 15m, 1h, 24h, 7d`);
  }

  const value = parseInt(match[1], 10);
  const unit = match[2];

  switch (unit) {
    case 'm':
      return value * 60 * 1000;
    case 'h':
      return value * 60 * 60 * 1000;
    case 'd':
      return value * 24 * 60 * 60 * 1000;
    default:
      throw new Error(`Unknown time unit: ${unit}`);
  }
}
