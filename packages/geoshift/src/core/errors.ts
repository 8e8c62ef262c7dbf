/**
 * geoshift Error Types
 *
 * Construction-time validation is the only failure path of the engine:
 * transforms, distance and containment are total over valid points.
 */

/**
 * Fields a coordinate validation can fail on
 */
export type CoordinateField = 'longitude' | 'latitude' | 'system';

/**
 * Error thrown when a point cannot be constructed.
 *
 * Raised for out-of-range or non-finite longitude/latitude, unparseable
 * decimal strings, and unknown coordinate-system tags in records. Values are
 * never clamped at construction; clamping only applies to transform outputs.
 *
 * @example
 * ```typescript
 * try {
 *   CoordinatePoint.of(200, 30);
 * } catch (error) {
 *   if (isInvalidCoordinateError(error)) {
 *     console.log(error.field); // 'longitude'
 *   }
 * }
 * ```
 */
export class InvalidCoordinateError extends Error {
  public readonly name = 'InvalidCoordinateError' as const;

  constructor(
    public readonly field: CoordinateField,
    public readonly value: unknown,
    public readonly reason: string
  ) {
    super(`Invalid ${field} ${formatValue(value)}: ${reason}`);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, InvalidCoordinateError.prototype);
  }
}

/**
 * Type guard to check if an error is an InvalidCoordinateError
 */
export function isInvalidCoordinateError(error: unknown): error is InvalidCoordinateError {
  return (
    error instanceof Error &&
    error.name === 'InvalidCoordinateError' &&
    'field' in error &&
    'reason' in error
  );
}

/**
 * Error thrown for invalid engine or CLI configuration
 */
export class ConfigurationError extends Error {
  public readonly name = 'ConfigurationError' as const;

  constructor(
    message: string,
    public readonly source?: string
  ) {
    super(message);
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value) ?? String(value);
  }
  return String(value);
}
