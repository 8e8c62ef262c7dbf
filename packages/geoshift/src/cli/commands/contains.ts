/**
 * contains - boundary-inclusive polygon containment
 *
 * Usage:
 *   geoshift contains <lon> <lat> --polygon <file> [--system <system>]
 *
 * The polygon file holds a JSON array of [lon, lat] pairs, a GeoJSON
 * Polygon or a Feature<Polygon>, in the same datum as the point.
 *
 * @module cli/commands/contains
 */

import type { CommandContext, CommandResult } from '../lib/context.js';
import { loadBoundary, parsePoint, parseSystemOption } from '../lib/input.js';

export interface ContainsOptions {
  readonly polygon: string;
  readonly system?: string;
}

export function runContainsCommand(
  longitude: string,
  latitude: string,
  options: ContainsOptions,
  ctx: CommandContext
): CommandResult {
  const system = parseSystemOption(options.system, ctx.config.defaultSystem);
  const point = parsePoint(longitude, latitude, system);
  const boundary = loadBoundary(options.polygon, system);

  const result = ctx.engine.evaluateContainment(point, boundary);
  ctx.logger.debug('Containment decided', { path: result.path, vertices: result.ring.length });

  return {
    data: { contained: result.contained, path: result.path },
    text: `${result.contained ? 'inside' : 'outside'} (${result.path})`,
  };
}
