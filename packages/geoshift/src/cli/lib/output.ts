/**
 * Output Formatting for CLI Commands
 *
 * Every command produces a plain result object; this module renders it as a
 * single JSON document (--json) or as terse human-readable text.
 *
 * @module cli/lib/output
 */

import type { CoordinatePoint } from '../../core/coordinate-point.js';

export type OutputFormat = 'text' | 'json';

/**
 * Fixed-point rendering with trailing zeros trimmed
 */
export function formatNumber(value: number, precision: number): string {
  const fixed = value.toFixed(precision);
  if (!fixed.includes('.')) {
    return fixed;
  }
  const trimmed = fixed.replace(/0+$/, '').replace(/\.$/, '');
  return trimmed === '-0' ? '0' : trimmed;
}

/**
 * `SYSTEM lon lat`, e.g. `GCJ02 116.41024449 39.91640428`
 */
export function formatPoint(point: CoordinatePoint, precision: number): string {
  return `${point.system} ${formatNumber(point.longitude, precision)} ${formatNumber(point.latitude, precision)}`;
}

/**
 * Render a result for stdout
 */
export function formatOutput(format: OutputFormat, data: unknown, text: string): string {
  return format === 'json' ? JSON.stringify(data, null, 2) : text;
}
