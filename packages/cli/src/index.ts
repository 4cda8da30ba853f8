#!/usr/bin/env node

/**
 * tactica CLI - themed puzzle pack generator
 *
 * Main entry point for the tactica command-line interface.
 */

import { createProgram } from './cli.js';
import { handleError } from './errors/index.js';

export { VERSION } from './cli.js';

/**
 * Main entry point
 */
export async function main(): Promise<void> {
  try {
    const program = createProgram();
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, { color: !process.argv.includes('--no-color') });
  }
}

// Run if executed directly
main().catch((error: unknown) => handleError(error));
