/**
 * convert - move a point between datums
 *
 * Usage:
 *   geoshift convert <lon> <lat> --to <system> [--from <system>]
 *
 * @module cli/commands/convert
 */

import type { CommandContext, CommandResult } from '../lib/context.js';
import { parsePoint, parseSystemOption } from '../lib/input.js';
import { formatPoint } from '../lib/output.js';

export interface ConvertOptions {
  /** Source datum (default: configured default system) */
  readonly from?: string;
  /** Target datum */
  readonly to: string;
}

export function runConvertCommand(
  longitude: string,
  latitude: string,
  options: ConvertOptions,
  ctx: CommandContext
): CommandResult {
  const from = parseSystemOption(options.from, ctx.config.defaultSystem);
  const to = parseSystemOption(options.to, from);
  const point = parsePoint(longitude, latitude, from);

  ctx.logger.debug('Converting point', { from, to });
  const converted = ctx.engine.convert(point, to);

  return {
    data: { input: point.toRecord(), output: converted.toRecord() },
    text: formatPoint(converted, ctx.config.precision),
  };
}
