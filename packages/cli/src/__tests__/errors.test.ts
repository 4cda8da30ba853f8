import { ConfigurationError } from '@tactica/core';
import chalk from 'chalk';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { ConfigValidationError } from '../config/validation.js';
import {
  CliError,
  EXIT_CODES,
  InputError,
  OutputError,
  SourceError,
  exitCodeFor,
  formatError,
} from '../errors/index.js';
import { createColorFns } from '../progress/colors.js';

const plain = createColorFns(false);

describe('CLI Errors', () => {
  it('should format a message with its hint', () => {
    const error = new InputError('No puzzle source given', 'Pass --source <file>');
    expect(error.format()).toBe(
      'cannot start: No puzzle source given\n  hint: Pass --source <file>',
    );
    expect(error.exitCode).toBe(EXIT_CODES.usage);
  });

  it('should format without a hint', () => {
    expect(new CliError('boom').format()).toBe('tactica: boom');
    expect(new CliError('boom').exitCode).toBe(1);
  });

  it('should name the stage of a source failure', () => {
    const error = new SourceError('unexpected end of file', 'decompress', 'Re-download it');
    expect(error.format()).toBe(
      'puzzle source (decompress): unexpected end of file\n  hint: Re-download it',
    );
    expect(exitCodeFor(error)).toBe(66);
  });

  it('should name the file that could not be written', () => {
    const error = new OutputError('EACCES: permission denied', 'packs/Fork.pgn');
    expect(error.format()).toBe('cannot write packs/Fork.pgn: EACCES: permission denied');
    expect(error.target).toBe('packs/Fork.pgn');
    expect(exitCodeFor(error)).toBe(73);
  });
});

describe('formatError', () => {
  it('should show selection setting errors with their field', () => {
    const error = new ConfigurationError('perTheme must be a positive integer', 'perTheme');
    expect(formatError(error, plain)).toBe(
      'Invalid selection settings (perTheme): perTheme must be a positive integer',
    );
    expect(exitCodeFor(error)).toBe(EXIT_CODES.usage);
  });

  it('should use the formatted output of config errors', () => {
    const error = new ConfigValidationError([{ path: 'output.site', message: 'Required' }]);
    expect(formatError(error, plain)).toBe(error.format());
    expect(exitCodeFor(error)).toBe(64);
  });

  it('should fall back to the message of other errors', () => {
    expect(formatError(new Error('disk full'), plain)).toBe('tactica: disk full');
    expect(formatError('odd', plain)).toBe('tactica: odd');
    expect(exitCodeFor(new Error('disk full'))).toBe(1);
  });

  describe('color setting', () => {
    let level: typeof chalk.level;

    beforeEach(() => {
      level = chalk.level;
      chalk.level = 1;
    });

    afterEach(() => {
      chalk.level = level;
    });

    it('should leave the text plain when color is off', () => {
      expect(formatError(new Error('disk full'), plain)).toBe('tactica: disk full');
    });

    it('should color the text by default', () => {
      expect(formatError(new Error('disk full'))).toBe(chalk.red('tactica: disk full'));
      expect(formatError(new Error('disk full'))).not.toBe('tactica: disk full');
    });
  });
});
