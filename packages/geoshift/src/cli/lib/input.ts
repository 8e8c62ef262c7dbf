/**
 * CLI argument and file parsing
 *
 * Positional coordinates go through CoordinatePoint.parse so the CLI and the
 * library reject the same inputs. Problems that are not about a single
 * coordinate field (radius, center syntax, polygon files) raise InputError.
 *
 * @module cli/lib/input
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { CoordinatePoint } from '../../core/coordinate-point.js';
import { InvalidCoordinateError } from '../../core/errors.js';
import { CoordinateSystem, parseCoordinateSystem } from '../../core/types/coordinate-system.js';
import { boundaryFromPolygon, pointFromPosition } from '../../geojson/adapter.js';

/**
 * Malformed command-line input
 */
export class InputError extends Error {
  public readonly name = 'InputError' as const;

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, InputError.prototype);
  }
}

/**
 * Resolve a --system/--from/--to value, falling back when omitted
 *
 * @throws InvalidCoordinateError for unknown names
 */
export function parseSystemOption(
  value: string | undefined,
  fallback: CoordinateSystem
): CoordinateSystem {
  if (value === undefined) {
    return fallback;
  }
  const system = parseCoordinateSystem(value);
  if (!system) {
    throw new InvalidCoordinateError('system', value, 'must be one of WGS84, GCJ02, BD09');
  }
  return system;
}

export function parsePoint(
  longitude: string,
  latitude: string,
  system: CoordinateSystem
): CoordinatePoint {
  return CoordinatePoint.parse(longitude, latitude, system);
}

/**
 * Parse `"<lon>,<lat>"`
 */
export function parseLngLatPair(text: string, system: CoordinateSystem): CoordinatePoint {
  const parts = text.split(',');
  if (parts.length !== 2) {
    throw new InputError(`Expected "<lon>,<lat>", got "${text}"`);
  }
  return CoordinatePoint.parse(parts[0], parts[1], system);
}

/**
 * Parse a radius in meters
 */
export function parseRadius(text: string): number {
  const trimmed = text.trim();
  const value = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(value) || value < 0) {
    throw new InputError(`Radius must be a non-negative number of meters, got "${text}"`);
  }
  return value;
}

// ============================================================================
// Polygon files
// ============================================================================

const PositionSchema = z.array(z.number()).min(2, 'position must have at least two elements');
const RingSchema = z.array(PositionSchema);
const PolygonGeometrySchema = z.object({
  type: z.literal('Polygon'),
  coordinates: z.array(RingSchema).min(1, 'polygon has no rings'),
});

/**
 * A bare ring of [lon, lat] pairs, a GeoJSON Polygon, or a Feature wrapping one
 */
const BoundaryFileSchema = z.union([
  RingSchema,
  PolygonGeometrySchema,
  z.object({ type: z.literal('Feature'), geometry: PolygonGeometrySchema }),
]);

/**
 * Parse polygon file content into a boundary ring tagged with `system`
 */
export function parseBoundary(content: string, system: CoordinateSystem): CoordinatePoint[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new InputError(
      `Polygon file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = BoundaryFileSchema.safeParse(raw);
  if (!result.success) {
    throw new InputError(
      'Polygon file must be an array of [lon, lat] pairs, a GeoJSON Polygon or a Feature<Polygon>'
    );
  }

  const data = result.data;
  if (Array.isArray(data)) {
    return data.map((position) => pointFromPosition(position, system));
  }
  return boundaryFromPolygon(data.type === 'Feature' ? data.geometry : data, system);
}

export function loadBoundary(filePath: string, system: CoordinateSystem): CoordinatePoint[] {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new InputError(
      `Cannot read polygon file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseBoundary(content, system);
}
