/**
 * Validation schemas for raw source records.
 * @module normalize/schemas
 */

import { z } from 'zod';
import type { Timestamp } from '../types/records.js';

/**
 * ISO-8601 date-time carrying `Z` or an explicit offset. Strings without
 * one would be read in the host's local time zone.
 */
const isoDateTimeSchema = z.string().trim().datetime({ offset: true });

/**
 * Converts a raw timestamp to epoch milliseconds.
 * Accepts `Date`, finite epoch milliseconds and ISO-8601 strings with a zone.
 */
export function toEpochMillis(value: unknown): Timestamp | undefined {
  let ms = NaN;
  if (value instanceof Date) {
    ms = value.getTime();
  } else if (typeof value === 'number') {
    ms = value;
  } else {
    const parsed = isoDateTimeSchema.safeParse(value);
    if (parsed.success) {
      ms = Date.parse(parsed.data);
    }
  }
  return Number.isFinite(ms) ? ms : undefined;
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim().length === 0);
}

export const timestampSchema = z.unknown().transform((value, ctx): Timestamp => {
  const ms = toEpochMillis(value);
  if (ms === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: isAbsent(value) ? 'missing' : 'unparsable' });
    return z.NEVER;
  }
  return ms;
});

export const instanceIdSchema = z.unknown().transform((value, ctx): string => {
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim();
  }
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: isAbsent(value) ? 'missing' : 'unparsable' });
  return z.NEVER;
});

/**
 * Instance types are informational: a missing or non-string value does not
 * reject the record.
 */
export const instanceTypeSchema = z
  .unknown()
  .transform((value): string | undefined =>
    typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined
  );

export const launchRecordSchema = z.object({
  instanceId: instanceIdSchema,
  instanceType: instanceTypeSchema,
  eventTime: timestampSchema,
});

export const terminationRecordSchema = z.object({
  instanceId: instanceIdSchema,
  eventTime: timestampSchema,
});

export const runningRecordSchema = z.object({
  instanceId: instanceIdSchema,
  instanceType: instanceTypeSchema,
  launchTime: timestampSchema,
});

/**
 * Joins schema issues into one line, e.g. `instanceId: missing; eventTime: unparsable`.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
