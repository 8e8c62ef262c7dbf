/**
 * GeoEngine Configuration
 *
 * The engine has no process-wide state: callers pass a config object, or
 * build one from the environment. All configuration is immutable.
 */

import { z } from 'zod';

import { DEFAULT_SEGMENT_TOLERANCE, type EarthRadiusName } from './constants.js';
import { ConfigurationError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export interface GeoEngineConfig {
  /**
   * Sphere radius used by haversine distance.
   * 'equatorial' = 6378137 m (default), 'mean' = 6371008.8 m.
   */
  readonly earthRadius: EarthRadiusName;

  /**
   * Degrees within which a point counts as lying on a polygon edge
   */
  readonly segmentTolerance: number;
}

export const DEFAULT_ENGINE_CONFIG: GeoEngineConfig = {
  earthRadius: 'equatorial',
  segmentTolerance: DEFAULT_SEGMENT_TOLERANCE,
};

// ============================================================================
// Validation
// ============================================================================

export const EarthRadiusNameSchema = z.enum(['equatorial', 'mean'], {
  errorMap: () => ({ message: "earthRadius must be 'equatorial' or 'mean'" }),
});

export const SegmentToleranceSchema = z
  .number({ invalid_type_error: 'segmentTolerance must be a number' })
  .finite('segmentTolerance must be finite')
  .positive('segmentTolerance must be positive');

const EngineConfigOverridesSchema = z
  .object({
    earthRadius: EarthRadiusNameSchema.optional(),
    segmentTolerance: SegmentToleranceSchema.optional(),
  })
  .strict();

/**
 * Merge overrides onto the defaults and validate the result
 *
 * @throws ConfigurationError for unknown keys or invalid values
 */
export function resolveEngineConfig(overrides: Partial<GeoEngineConfig> = {}): GeoEngineConfig {
  const result = EngineConfigOverridesSchema.safeParse(overrides);
  if (!result.success) {
    const message = result.error.errors[0]?.message ?? 'Invalid engine configuration';
    throw new ConfigurationError(message, 'engine');
  }

  return {
    earthRadius: result.data.earthRadius ?? DEFAULT_ENGINE_CONFIG.earthRadius,
    segmentTolerance: result.data.segmentTolerance ?? DEFAULT_ENGINE_CONFIG.segmentTolerance,
  };
}

// ============================================================================
// Environment
// ============================================================================

/**
 * Read engine overrides from the environment
 *
 * Environment variables:
 * - GEOSHIFT_EARTH_RADIUS: 'equatorial' | 'mean'
 * - GEOSHIFT_SEGMENT_TOLERANCE: positive number of degrees
 *
 * Unset variables are omitted so they fall through to other layers.
 */
export function getEngineConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Partial<GeoEngineConfig> {
  const overrides: { earthRadius?: EarthRadiusName; segmentTolerance?: number } = {};

  const radius = env.GEOSHIFT_EARTH_RADIUS;
  if (radius !== undefined && radius !== '') {
    const parsed = EarthRadiusNameSchema.safeParse(radius.trim().toLowerCase());
    if (!parsed.success) {
      throw new ConfigurationError(
        `GEOSHIFT_EARTH_RADIUS must be 'equatorial' or 'mean', got "${radius}"`,
        'env'
      );
    }
    overrides.earthRadius = parsed.data;
  }

  const tolerance = env.GEOSHIFT_SEGMENT_TOLERANCE;
  if (tolerance !== undefined && tolerance !== '') {
    const parsed = SegmentToleranceSchema.safeParse(Number(tolerance));
    if (!parsed.success) {
      throw new ConfigurationError(
        `GEOSHIFT_SEGMENT_TOLERANCE must be a positive number, got "${tolerance}"`,
        'env'
      );
    }
    overrides.segmentTolerance = parsed.data;
  }

  return overrides;
}
