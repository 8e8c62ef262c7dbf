/**
 * circle - test whether a point lies within a radius of a center
 *
 * Usage:
 *   geoshift circle <lon> <lat> --center <lon,lat> --radius <meters> [--system <system>]
 *
 * @module cli/commands/circle
 */

import type { CommandContext, CommandResult } from '../lib/context.js';
import { parseLngLatPair, parsePoint, parseRadius, parseSystemOption } from '../lib/input.js';
import { formatNumber } from '../lib/output.js';

export interface CircleOptions {
  readonly center: string;
  readonly radius: string;
  readonly system?: string;
}

export function runCircleCommand(
  longitude: string,
  latitude: string,
  options: CircleOptions,
  ctx: CommandContext
): CommandResult {
  const system = parseSystemOption(options.system, ctx.config.defaultSystem);
  const point = parsePoint(longitude, latitude, system);
  const center = parseLngLatPair(options.center, system);
  const radiusMeters = parseRadius(options.radius);

  const distanceMeters = ctx.engine.distanceMeters(point, center);
  const inside = ctx.engine.isInCircle(point, center, radiusMeters);

  return {
    data: { inside, distanceMeters, radiusMeters },
    text: `${inside ? 'inside' : 'outside'} (${formatNumber(distanceMeters, 3)} m from center)`,
  };
}
