/**
 * Coordinate System Tags
 *
 * The three datums the engine understands:
 * - WGS84: global geodetic reference (GPS)
 * - GCJ02: obfuscated national datum derived from WGS84
 * - BD09: second obfuscation layer applied on top of GCJ02
 *
 * The set is closed. Adding a datum means adding formulas, so dispatch
 * sites switch exhaustively over these values.
 */

export const CoordinateSystem = {
  WGS84: 'WGS84',
  GCJ02: 'GCJ02',
  BD09: 'BD09',
} as const;

export type CoordinateSystem = (typeof CoordinateSystem)[keyof typeof CoordinateSystem];

/**
 * All coordinate systems in declaration order
 */
export const COORDINATE_SYSTEMS: readonly CoordinateSystem[] = [
  CoordinateSystem.WGS84,
  CoordinateSystem.GCJ02,
  CoordinateSystem.BD09,
];

/**
 * Type guard for coordinate system tags (exact, case-sensitive)
 */
export function isCoordinateSystem(value: unknown): value is CoordinateSystem {
  return typeof value === 'string' && COORDINATE_SYSTEMS.some((system) => system === value);
}

/**
 * Resolve a user-supplied tag, ignoring case and surrounding whitespace.
 *
 * @returns The matching tag, or undefined when nothing matches
 */
export function parseCoordinateSystem(value: string): CoordinateSystem | undefined {
  const normalized = value.trim().toUpperCase();
  return COORDINATE_SYSTEMS.find((system) => system === normalized);
}

/**
 * Compile-time exhaustiveness check for switches over CoordinateSystem
 */
export function assertNeverSystem(system: never): never {
  throw new Error(`Unhandled coordinate system: ${String(system)}`);
}
