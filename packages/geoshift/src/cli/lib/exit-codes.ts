/**
 * Process exit codes
 *
 * @module cli/lib/exit-codes
 */

import { ConfigurationError, isInvalidCoordinateError } from '../../core/errors.js';
import { InputError } from './input.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 1,
  INVALID_INPUT: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  if (isInvalidCoordinateError(error) || error instanceof InputError) {
    return EXIT_CODES.INVALID_INPUT;
  }
  if (error instanceof ConfigurationError) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  return EXIT_CODES.ERRORS;
}
