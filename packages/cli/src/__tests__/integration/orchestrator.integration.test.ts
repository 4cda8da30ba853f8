/**
 * Integration tests for the generation pipeline
 * Reads the sample puzzle source and writes real files to a temporary directory
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { getFixturePath } from '@tactica/test-utils';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { DEFAULT_CONFIG } from '../../config/defaults.js';
import type { TacticaConfig } from '../../config/schema.js';
import { InputError, SourceError } from '../../errors/index.js';
import {
  orchestrateGeneration,
  toRenderOptions,
  toSelectionOptions,
} from '../../orchestrator/orchestrator.js';
import { ProgressReporter } from '../../progress/reporter.js';
import type { RunPhase } from '../../progress/types.js';

/**
 * Silent reporter that records phase starts and completions
 */
class PhaseRecorder extends ProgressReporter {
  readonly events: string[] = [];

  constructor() {
    super({ silent: true });
  }

  override startPhase(phase: RunPhase): void {
    this.events.push(`start ${phase}`);
    super.startPhase(phase);
  }

  override completePhase(phase: RunPhase, detail?: string): void {
    this.events.push(`done ${phase}: ${detail ?? ''}`);
    super.completePhase(phase, detail);
  }
}

const FORK_GAME = [
  '[Event "Fork (Medium)"]',
  '[Site "?"]',
  '[Date "????.??.??"]',
  '[Round "1"]',
  '[White "You"]',
  '[Black "Opponent"]',
  '[Result "*"]',
  '[SetUp "1"]',
  '[FEN "r3k3/8/7p/1N6/8/8/8/4K3 w - - 0 2"]',
  '[PuzzleId "t0002"]',
  '[Rating "720"]',
  '[Difficulty "Medium"]',
  '[Themes "fork crushing endgame short"]',
  '[GameUrl "https://example.org/g/bbbb2222#60"]',
  '',
  '2. Nc7+ Kd8 3. Nxa8 *',
].join('\n');

function countGames(text: string): number {
  return text.split('\n').filter((line) => line.startsWith('[Event ')).length;
}

describe('Orchestrator Integration', () => {
  let dir: string;
  let reporter: ProgressReporter;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tactica-run-'));
    reporter = new ProgressReporter({ silent: true });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function createConfig(overrides: Partial<TacticaConfig['output']> = {}): TacticaConfig {
    return {
      ...DEFAULT_CONFIG,
      source: { path: getFixturePath('sample-puzzles.csv') },
      selection: { ...DEFAULT_CONFIG.selection, perTheme: 2 },
      output: { ...DEFAULT_CONFIG.output, directory: path.join(dir, 'out'), ...overrides },
    };
  }

  it('should write one PGN file per theme', async () => {
    const result = await orchestrateGeneration(createConfig(), reporter);

    expect(result.files.map((file) => path.basename(file.path))).toEqual([
      'Back Rank Mate.pgn',
      'Crushing.pgn',
      'Endgame.pgn',
      'Fork.pgn',
      'Mate.pgn',
      'Mate In 1.pgn',
      'One Move.pgn',
      'Short.pgn',
    ]);
    expect(fs.readFileSync(path.join(dir, 'out', 'Fork.pgn'), 'utf-8')).toBe(`${FORK_GAME}\n`);
  });

  it('should separate games with a blank line', async () => {
    await orchestrateGeneration(createConfig(), reporter);
    const mate = fs.readFileSync(path.join(dir, 'out', 'Mate.pgn'), 'utf-8');

    expect(countGames(mate)).toBe(2);
    expect(mate.startsWith('[Event "Mate (Medium)"]\n')).toBe(true);
    expect(mate).toContain('\n2. Rd8# *\n\n[Event "Mate (Medium)"]\n');
    expect(mate.endsWith('\n1... Rd1# *\n')).toBe(true);
  });

  it('should report statistics and a summary', async () => {
    const result = await orchestrateGeneration(createConfig(), reporter);

    expect(result.stats.rowsRead).toBe(8);
    expect(result.stats.rowsSkipped).toBe(2);
    expect(result.stats.selected).toBe(13);
    expect(result.stats.rendered).toBe(13);
    expect(result.stats.renderFailures).toBe(0);
    expect(result.summary.uniquePuzzles).toBe(3);
    expect(result.summary.topPuzzles[0]?.id).toBe('t0001');
  });

  it('should also write a combined file', async () => {
    const combined = path.join(dir, 'all', 'puzzles.pgn');
    const result = await orchestrateGeneration(
      createConfig({ combinedFile: combined, eventPrefix: 'Club' }),
      reporter,
    );
    const text = fs.readFileSync(combined, 'utf-8');

    expect(result.combinedFile).toBe(combined);
    expect(countGames(text)).toBe(13);
    expect(text.startsWith('[Event "Club Back Rank Mate (Medium)"]\n')).toBe(true);
    expect(text).toContain(`\n\n${FORK_GAME.replace('"Fork', '"Club Fork')}\n\n`);
  });

  it('should stop at the total limit in theme order', async () => {
    const combined = path.join(dir, 'all.pgn');
    const result = await orchestrateGeneration(
      createConfig({ combinedFile: combined, limitTotal: 4 }),
      reporter,
    );
    const text = fs.readFileSync(combined, 'utf-8');

    expect(result.files.map((file) => [path.basename(file.path), file.games])).toEqual([
      ['Back Rank Mate.pgn', 2],
      ['Crushing.pgn', 1],
      ['Endgame.pgn', 1],
    ]);
    expect(fs.existsSync(path.join(dir, 'out', 'Fork.pgn'))).toBe(false);
    expect(countGames(text)).toBe(4);
    expect(text).toContain('\n\n[Event "Endgame (Medium)"]\n');
    expect(text.endsWith('\n2. Rd8# *\n')).toBe(true);
    expect(result.stats.selected).toBe(4);
    expect(result.stats.limitDropped).toBe(9);
    expect(result.summary.totalPuzzles).toBe(4);
  });

  it('should keep every match without a per-theme limit', async () => {
    const config = createConfig();
    const result = await orchestrateGeneration(
      { ...config, selection: { ...config.selection, perTheme: null } },
      reporter,
    );

    expect(result.stats.selected).toBe(17);
    expect(result.stats.rejected).toBe(0);
  });

  it('should write nothing on a dry run', async () => {
    const result = await orchestrateGeneration(createConfig(), reporter, { dryRun: true });

    expect(result.files).toEqual([]);
    expect(result.stats.rendered).toBe(13);
    expect(fs.existsSync(path.join(dir, 'out'))).toBe(false);
  });

  it('should write theme files within the finalizing phase', async () => {
    const recorder = new PhaseRecorder();
    await orchestrateGeneration(createConfig(), recorder);

    expect(recorder.events).toEqual([
      'start reading',
      'done reading: 8 rows, 8 themes',
      'start finalizing',
      'done finalizing: 13 puzzles rendered, 8 files written',
    ]);
  });

  it('should report a dry run when finalizing', async () => {
    const recorder = new PhaseRecorder();
    await orchestrateGeneration(createConfig(), recorder, { dryRun: true });

    expect(recorder.events.at(-1)).toBe('done finalizing: 13 puzzles rendered, dry run');
  });

  it('should fail without a source', async () => {
    const config = { ...createConfig(), source: {} };
    await expect(orchestrateGeneration(config, reporter)).rejects.toBeInstanceOf(InputError);
  });

  it('should fail on a missing source before writing', async () => {
    const config = { ...createConfig(), source: { path: path.join(dir, 'missing.csv') } };
    const error = await orchestrateGeneration(config, reporter).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceError);
    expect(error instanceof SourceError && error.stage).toBe('open');
    expect(error instanceof SourceError && error.exitCode).toBe(66);
    expect(fs.existsSync(path.join(dir, 'out'))).toBe(false);
  });

  it('should fail on a source without the puzzle columns', async () => {
    const config = { ...createConfig(), source: { path: getFixturePath('bad-header.csv') } };
    const error = await orchestrateGeneration(config, reporter).catch((e: unknown) => e);
    expect(error instanceof SourceError && error.stage).toBe('header');
  });
});

describe('Configuration mapping', () => {
  it('should carry selection settings over', () => {
    const options = toSelectionOptions(DEFAULT_CONFIG);
    expect(options.criteria.minRating).toBe(600);
    expect(options.criteria.themes).toBe('all');
    expect(options.perTheme).toBe(50);
    expect(options.weights).toEqual({ popularity: 1, playCount: 10 });
  });

  it('should turn null bounds and limits into no limit', () => {
    const options = toSelectionOptions({
      ...DEFAULT_CONFIG,
      selection: { ...DEFAULT_CONFIG.selection, minRating: null, perTheme: null },
      output: { ...DEFAULT_CONFIG.output, limitTotal: 100 },
    });

    expect(options.criteria.minRating).toBeUndefined();
    expect(options.criteria.maxRating).toBe(800);
    expect(options.perTheme).toBeUndefined();
    expect(options.limitTotal).toBe(100);
  });

  it('should carry render settings over', () => {
    expect(toRenderOptions(DEFAULT_CONFIG)).toEqual({
      startAfterFirstMove: true,
      site: '?',
      maxLineLength: 80,
    });
  });
});
