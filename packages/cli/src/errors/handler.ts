/**
 * Error handling utilities
 */

import { ConfigurationError } from '@tactica/core';

import { ConfigValidationError } from '../config/validation.js';
import { createColorFns } from '../progress/colors.js';
import type { ColorFunctions } from '../progress/types.js';

import { CliError, EXIT_CODES } from './cli-errors.js';

export interface HandleErrorOptions {
  /** Colored output (default: true); false for --no-color */
  color?: boolean;
}

/**
 * Format an error for CLI output
 *
 * @param c - Color functions (default: colored)
 */
export function formatError(error: unknown, c: ColorFunctions = createColorFns(true)): string {
  if (error instanceof ConfigValidationError || error instanceof CliError) {
    return c.red(error.format());
  }

  if (error instanceof ConfigurationError) {
    const field = error.field ? ` (${error.field})` : '';
    return c.red(`Invalid selection settings${field}: ${error.message}`);
  }

  const message = error instanceof Error ? error.message : String(error);
  return c.red(`tactica: ${message}`);
}

/**
 * Exit code for an error
 *
 * Settings problems are usage errors; a CliError carries its own code.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }
  if (error instanceof ConfigValidationError || error instanceof ConfigurationError) {
    return EXIT_CODES.usage;
  }
  return EXIT_CODES.failure;
}

/**
 * Print an error and exit with its code
 */
export function handleError(error: unknown, options: HandleErrorOptions = {}): never {
  console.error(formatError(error, createColorFns(options.color ?? true)));
  process.exit(exitCodeFor(error));
}
