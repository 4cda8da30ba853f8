/**
 * Configuration system tests
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { formatConfig, loadConfig, loadEnvConfig, mapCliToConfig } from '../config/loader.js';
import {
  validateConfig,
  validatePartialConfig,
  ConfigValidationError,
} from '../config/validation.js';

function validationPaths(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return error.errors.map((e) => e.path);
    }
    throw error;
  }
  return [];
}

describe('Config Defaults', () => {
  it('should select 50 beginner puzzles per theme', () => {
    expect(DEFAULT_CONFIG.selection).toEqual({
      minRating: 600,
      maxRating: 800,
      minPopularityPercentile: 0,
      themes: 'all',
      perTheme: 50,
      startAfterFirstMove: true,
    });
  });

  it('should write to themes_pgn', () => {
    expect(DEFAULT_CONFIG.output).toEqual({
      directory: 'themes_pgn',
      site: '?',
      maxLineLength: 80,
    });
    expect(DEFAULT_CONFIG.quality).toEqual({ popularityWeight: 1, playCountWeight: 10 });
  });

  it('should pass validation', () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG);
  });
});

describe('Config Validation', () => {
  it('should reject an inverted rating range', () => {
    const config = {
      ...DEFAULT_CONFIG,
      selection: { ...DEFAULT_CONFIG.selection, minRating: 900 },
    };
    expect(validationPaths(() => validateConfig(config))).toEqual(['selection.minRating']);
  });

  it('should reject out-of-range values', () => {
    const config = {
      ...DEFAULT_CONFIG,
      selection: { ...DEFAULT_CONFIG.selection, perTheme: -1, minPopularityPercentile: 101 },
    };
    expect(validationPaths(() => validateConfig(config))).toEqual([
      'selection.minPopularityPercentile',
      'selection.perTheme',
    ]);
  });

  it('should reject an empty theme list', () => {
    expect(validationPaths(() => validatePartialConfig({ selection: { themes: [] } }))).toEqual([
      'selection.themes',
    ]);
  });

  it('should switch limits and bounds off with none or a zero limit', () => {
    expect(
      validatePartialConfig({
        selection: { perTheme: 0, minRating: 'none', maxRating: null },
        output: { limitTotal: 'none' },
      }),
    ).toEqual({
      selection: { perTheme: null, minRating: null, maxRating: null },
      output: { limitTotal: null },
    });
  });

  it('should keep a zero rating as a bound', () => {
    expect(validatePartialConfig({ selection: { minRating: 0 } })).toEqual({
      selection: { minRating: 0 },
    });
  });

  it('should accept a partial layer', () => {
    expect(validatePartialConfig({ output: { eventPrefix: 'Club' } })).toEqual({
      output: { eventPrefix: 'Club' },
    });
  });

  it('should format errors for display', () => {
    const error = new ConfigValidationError([{ path: 'selection.perTheme', message: 'Too small' }]);
    expect(error.format()).toBe(
      [
        'Configuration validation failed:',
        '',
        '  selection.perTheme: Too small',
        '',
        'Use --help to see available options',
        'Use --show-config to see current configuration',
      ].join('\n'),
    );
  });
});

describe('Environment Config', () => {
  it('should map variables to their sections', () => {
    const config = loadEnvConfig({
      TACTICA_SOURCE: 'puzzles.csv.zst',
      TACTICA_MAX_RATING: '1200',
      TACTICA_EVENT_PREFIX: 'Club',
    });
    expect(config).toEqual({
      source: { path: 'puzzles.csv.zst' },
      selection: { maxRating: 1200 },
      output: { eventPrefix: 'Club' },
    });
  });

  it('should read limits and none from variables', () => {
    expect(loadEnvConfig({ TACTICA_PER_THEME: 'none', TACTICA_LIMIT_TOTAL: '25' })).toEqual({
      selection: { perTheme: null },
      output: { limitTotal: 25 },
    });
  });

  it('should ignore empty variables', () => {
    expect(loadEnvConfig({ TACTICA_PER_THEME: '' })).toEqual({});
  });

  it('should reject a non-numeric value', () => {
    expect(validationPaths(() => loadEnvConfig({ TACTICA_MIN_RATING: 'abc' }))).toEqual([
      'selection.minRating',
    ]);
  });
});

describe('CLI Config', () => {
  it('should map flags to configuration keys', () => {
    expect(
      mapCliToConfig({
        source: 'p.csv',
        minPlays: 100,
        themes: ['fork'],
        solverColor: 'white',
        startAfterFirstMove: false,
        combined: 'all.pgn',
        openingColor: 'both',
      }),
    ).toEqual({
      source: { path: 'p.csv' },
      selection: {
        minPlayCount: 100,
        themes: ['fork'],
        solverColor: 'white',
        startAfterFirstMove: false,
      },
      output: { combinedFile: 'all.pgn', openingColor: 'both' },
    });
  });

  it('should reject an unknown color', () => {
    expect(validationPaths(() => mapCliToConfig({ solverColor: 'green' }))).toEqual([
      'selection.solverColor',
    ]);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tactica-config-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeRc(content: object, name = '.tacticarc.json'): Promise<string> {
    const file = path.join(dir, name);
    await fs.writeFile(file, JSON.stringify(content));
    return file;
  }

  it('should return the defaults without any layer', async () => {
    const config = await loadConfig({}, { env: {}, searchFrom: dir });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('should apply file, environment and flags in order', async () => {
    await writeRc({
      selection: { perTheme: 10, minRating: 1000, maxRating: 1400 },
      output: { directory: 'packs' },
    });
    const env = { TACTICA_PER_THEME: '20' };

    const fromEnv = await loadConfig({}, { env, searchFrom: dir });
    expect(fromEnv.selection.perTheme).toBe(20);
    expect(fromEnv.selection.minRating).toBe(1000);
    expect(fromEnv.output.directory).toBe('packs');

    const fromFlags = await loadConfig({ perTheme: 30 }, { env, searchFrom: dir });
    expect(fromFlags.selection.perTheme).toBe(30);
  });

  it('should let a flag switch off a limit set in the file', async () => {
    await writeRc({ selection: { perTheme: 10 }, output: { limitTotal: 100 } });

    const config = await loadConfig(
      { perTheme: null, maxRating: null, limitTotal: 0 },
      { env: {}, searchFrom: dir },
    );
    expect(config.selection.perTheme).toBeNull();
    expect(config.selection.maxRating).toBeNull();
    expect(config.selection.minRating).toBe(600);
    expect(config.output.limitTotal).toBeNull();
  });

  it('should load an explicit config file', async () => {
    const file = await writeRc({ quality: { playCountWeight: 0 } }, 'custom.json');
    const config = await loadConfig({ config: file }, { env: {} });
    expect(config.quality).toEqual({ popularityWeight: 1, playCountWeight: 0 });
  });

  it('should validate the merged result', async () => {
    await expect(loadConfig({ minRating: 900 }, { env: {}, searchFrom: dir })).rejects.toThrow(
      'minRating must be <= maxRating',
    );
  });

  it('should reject invalid values in the file', async () => {
    await writeRc({ output: { openingColor: 'purple' } });
    await expect(loadConfig({}, { env: {}, searchFrom: dir })).rejects.toBeInstanceOf(
      ConfigValidationError,
    );
  });

  it('should format the configuration as JSON', () => {
    expect(JSON.parse(formatConfig(DEFAULT_CONFIG))).toEqual(DEFAULT_CONFIG);
  });
});
