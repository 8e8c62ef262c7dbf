/**
 * Per-invocation command context
 *
 * @module cli/lib/context
 */

import { GeoEngine } from '../../services/geo-engine.js';
import type { CLIConfig } from './config.js';
import { createCLILogger, type CLILogger } from './logger.js';

export interface CommandContext {
  readonly config: CLIConfig;
  readonly engine: GeoEngine;
  readonly logger: CLILogger;
}

/**
 * Result of a command: `data` is printed under --json, `text` otherwise
 */
export interface CommandResult {
  readonly data: unknown;
  readonly text: string;
}

export function createCommandContext(
  config: CLIConfig,
  write?: (line: string) => void
): CommandContext {
  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
    write,
  });
  return {
    config,
    logger,
    engine: new GeoEngine(config.engine, { logger }),
  };
}
