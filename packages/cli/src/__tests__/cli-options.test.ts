/**
 * CLI options parsing tests
 */

import { InvalidArgumentError, type Command } from 'commander';
import { describe, it, expect } from 'vitest';

import {
  createProgram,
  parseCliOptions,
  parseInteger,
  parseIntegerOrNone,
  parseNumber,
} from '../cli.js';

function generateCommand(): Command {
  const command = createProgram().commands.find((c) => c.name() === 'generate');
  if (command === undefined) {
    throw new Error('generate command missing');
  }
  return command;
}

function parseArgs(args: string[]): Record<string, unknown> {
  const command = generateCommand();
  command.parseOptions(args);
  return command.opts();
}

describe('parseCliOptions', () => {
  describe('basic options', () => {
    it('should parse paths', () => {
      const result = parseCliOptions({
        source: 'puzzles.csv.zst',
        outDir: 'packs',
        combined: 'all.pgn',
        config: './my-config.json',
      });
      expect(result.source).toBe('puzzles.csv.zst');
      expect(result.outDir).toBe('packs');
      expect(result.combined).toBe('all.pgn');
      expect(result.config).toBe('./my-config.json');
    });

    it('should ignore values of the wrong type', () => {
      const result = parseCliOptions({ source: 42, minRating: '700', theme: 'fork' });
      expect(result.source).toBeUndefined();
      expect(result.minRating).toBeUndefined();
      expect(result.themes).toBeUndefined();
    });
  });

  describe('negated options', () => {
    it('should set noColor only when color is disabled', () => {
      expect(parseCliOptions({ color: false }).noColor).toBe(true);
      expect(parseCliOptions({ color: true }).noColor).toBeUndefined();
    });

    it('should override the first-move setting only when disabled', () => {
      expect(parseCliOptions({ startAfterFirstMove: false }).startAfterFirstMove).toBe(false);
      expect(parseCliOptions({ startAfterFirstMove: true }).startAfterFirstMove).toBeUndefined();
    });
  });
});

describe('option parsers', () => {
  it('should parse integers', () => {
    expect(parseInteger(' 700 ')).toBe(700);
    expect(parseInteger('-5')).toBe(-5);
    expect(() => parseInteger('7.5')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('abc')).toThrow('Not an integer.');
  });

  it('should read none as switched off', () => {
    expect(parseIntegerOrNone('none')).toBeNull();
    expect(parseIntegerOrNone(' NONE ')).toBeNull();
    expect(parseIntegerOrNone('0')).toBe(0);
    expect(() => parseIntegerOrNone('all')).toThrow('Not an integer.');
  });

  it('should parse numbers', () => {
    expect(parseNumber('12.5')).toBe(12.5);
    expect(() => parseNumber('')).toThrow('Not a number.');
    expect(() => parseNumber('ten')).toThrow(InvalidArgumentError);
  });
});

describe('generate command', () => {
  it('should read the command line into options', () => {
    const options = parseCliOptions(
      parseArgs([
        '-s',
        'puzzles.csv',
        '--min-rating',
        '700',
        '-n',
        '25',
        '-t',
        'fork',
        '-t',
        'pin',
        '--solver-color',
        'white',
        '--no-start-after-first-move',
        '--dry-run',
      ]),
    );

    expect(options).toEqual({
      source: 'puzzles.csv',
      minRating: 700,
      perTheme: 25,
      themes: ['fork', 'pin'],
      solverColor: 'white',
      startAfterFirstMove: false,
      dryRun: true,
    });
  });

  it('should turn limits and bounds off with none', () => {
    const options = parseCliOptions(
      parseArgs(['--per-theme', 'none', '--max-rating', 'none', '--limit-total', '40']),
    );

    expect(options.perTheme).toBeNull();
    expect(options.maxRating).toBeNull();
    expect(options.minRating).toBeUndefined();
    expect(options.limitTotal).toBe(40);
  });

  it('should leave unset options undefined', () => {
    const options = parseCliOptions(parseArgs([]));
    expect(options.themes).toEqual([]);
    expect(options.startAfterFirstMove).toBeUndefined();
    expect(options.noColor).toBeUndefined();
  });
});
