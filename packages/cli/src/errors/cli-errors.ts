/**
 * Errors that end a tactica run
 */

import type { SourceStage } from '@tactica/source';

/**
 * Process exit codes, following BSD sysexits where one fits
 */
export const EXIT_CODES = {
  failure: 1,
  /** Missing or unusable settings */
  usage: 64,
  /** Puzzle source missing or unreadable */
  noInput: 66,
  /** A PGN file or the output directory cannot be written */
  cantCreate: 73,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * A run-ending error with an optional hint for the user
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly hint?: string,
    public readonly exitCode: ExitCode = EXIT_CODES.failure,
  ) {
    super(message);
    this.name = 'CliError';
  }

  /**
   * First line of the formatted error, before the message
   */
  protected headline(): string {
    return 'tactica';
  }

  format(): string {
    const lines = [`${this.headline()}: ${this.message}`];
    if (this.hint) {
      lines.push(`  hint: ${this.hint}`);
    }
    return lines.join('\n');
  }
}

/**
 * The run cannot start with the settings it was given (no source, nothing to select)
 */
export class InputError extends CliError {
  constructor(message: string, hint?: string) {
    super(message, hint, EXIT_CODES.usage);
    this.name = 'InputError';
  }

  protected override headline(): string {
    return 'cannot start';
  }
}

/**
 * A theme file, the combined PGN or the output directory could not be written
 */
export class OutputError extends CliError {
  constructor(
    message: string,
    public readonly target: string,
    hint?: string,
  ) {
    super(message, hint, EXIT_CODES.cantCreate);
    this.name = 'OutputError';
  }

  protected override headline(): string {
    return `cannot write ${this.target}`;
  }
}

/**
 * The puzzle source could not be read to the end; no PGN was written
 */
export class SourceError extends CliError {
  constructor(
    message: string,
    public readonly stage: SourceStage,
    hint?: string,
  ) {
    super(message, hint, EXIT_CODES.noInput);
    this.name = 'SourceError';
  }

  protected override headline(): string {
    return `puzzle source (${this.stage})`;
  }
}
