/**
 * Coordinate Validation Schemas
 *
 * Zod schemas for every external shape a point can be built from: raw
 * numbers, decimal strings and plain `{ longitude, latitude, system }`
 * records. Failures are reported as InvalidCoordinateError naming the field.
 */

import { z } from 'zod';

import { COORDINATE_BOUNDS } from '../core/constants.js';
import { InvalidCoordinateError, type CoordinateField } from '../core/errors.js';
import { parseCoordinateSystem, type CoordinateSystem } from '../core/types/coordinate-system.js';

// ============================================================================
// Numeric Schemas
// ============================================================================

/**
 * Longitude: finite, -180 to +180 inclusive
 */
export const LongitudeSchema = z
  .number({ invalid_type_error: 'must be a finite number' })
  .finite('must be a finite number')
  .min(COORDINATE_BOUNDS.MIN_LONGITUDE, 'must be within [-180, 180]')
  .max(COORDINATE_BOUNDS.MAX_LONGITUDE, 'must be within [-180, 180]');

/**
 * Latitude: finite, -90 to +90 inclusive
 */
export const LatitudeSchema = z
  .number({ invalid_type_error: 'must be a finite number' })
  .finite('must be a finite number')
  .min(COORDINATE_BOUNDS.MIN_LATITUDE, 'must be within [-90, 90]')
  .max(COORDINATE_BOUNDS.MAX_LATITUDE, 'must be within [-90, 90]');

// ============================================================================
// Decimal String Schemas
// ============================================================================

/**
 * Plain decimal notation with optional sign and exponent.
 * Hex, binary, "Infinity" and empty strings are rejected.
 */
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const DecimalStringSchema = z
  .string({ invalid_type_error: 'must be a decimal string' })
  .trim()
  .regex(DECIMAL_PATTERN, 'must be a decimal number')
  .transform((text) => Number(text));

export const LongitudeStringSchema = DecimalStringSchema.pipe(LongitudeSchema);
export const LatitudeStringSchema = DecimalStringSchema.pipe(LatitudeSchema);

// ============================================================================
// Record Schema
// ============================================================================

const CoordinateSystemSchema = z
  .string({ invalid_type_error: 'must be one of WGS84, GCJ02, BD09' })
  .transform((value, ctx): CoordinateSystem => {
    const system = parseCoordinateSystem(value);
    if (!system) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be one of WGS84, GCJ02, BD09' });
      return z.NEVER;
    }
    return system;
  });

/**
 * Serialized point, as exchanged across process boundaries
 */
export const PointRecordSchema = z.object({
  longitude: LongitudeSchema,
  latitude: LatitudeSchema,
  system: CoordinateSystemSchema,
});

export type PointRecord = z.infer<typeof PointRecordSchema>;

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Run a schema and convert the first issue into an InvalidCoordinateError
 */
export function validateField<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, field: CoordinateField, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const reason = result.error.errors[0]?.message ?? 'is invalid';
    throw new InvalidCoordinateError(field, value, reason);
  }
  return result.data;
}

/**
 * Validate an unknown value as a point record.
 *
 * The first failing field is reported; a missing or non-object input is
 * reported against `longitude`.
 */
export function validatePointRecord(value: unknown): PointRecord {
  const result = PointRecordSchema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.errors[0];
  const head = issue?.path[0];
  const field: CoordinateField = head === 'latitude' || head === 'system' ? head : 'longitude';
  throw new InvalidCoordinateError(field, readField(value, field), issue?.message ?? 'is invalid');
}

function readField(value: unknown, field: CoordinateField): unknown {
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (key === field) return entry;
  }
  return undefined;
}
