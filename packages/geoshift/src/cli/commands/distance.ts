/**
 * distance - great-circle distance between two points
 *
 * Usage:
 *   geoshift distance <lon1> <lat1> <lon2> <lat2> [--system <system>] [--unit m|km]
 *
 * @module cli/commands/distance
 */

import type { CommandContext, CommandResult } from '../lib/context.js';
import { InputError, parsePoint, parseSystemOption } from '../lib/input.js';
import { formatNumber } from '../lib/output.js';

export type DistanceUnit = 'm' | 'km';

export interface DistanceOptions {
  readonly system?: string;
  readonly unit?: string;
}

function parseUnit(value: string | undefined): DistanceUnit {
  switch (value?.trim().toLowerCase()) {
    case undefined:
    case 'm':
      return 'm';
    case 'km':
      return 'km';
    default:
      throw new InputError(`Unit must be "m" or "km", got "${value}"`);
  }
}

export function runDistanceCommand(
  coordinates: readonly [string, string, string, string],
  options: DistanceOptions,
  ctx: CommandContext
): CommandResult {
  const system = parseSystemOption(options.system, ctx.config.defaultSystem);
  const unit = parseUnit(options.unit);
  const from = parsePoint(coordinates[0], coordinates[1], system);
  const to = parsePoint(coordinates[2], coordinates[3], system);

  const distance =
    unit === 'km' ? ctx.engine.distanceKilometers(from, to) : ctx.engine.distanceMeters(from, to);

  return {
    data: { from: from.toRecord(), to: to.toRecord(), distance, unit },
    text: `${formatNumber(distance, unit === 'km' ? 6 : 3)} ${unit}`,
  };
}
