/**
 * Main orchestrator that coordinates a generation run
 *
 * Source → decoder → selection run → (per theme) banding → rendering →
 * output sink, with a summary folded in along the way.
 */

import { SelectionRun, SummaryAccumulator, type RunSummary } from '@tactica/core';
import { renderPuzzle, type PuzzleRenderOptions } from '@tactica/pgn';
import { decodePuzzleLines, openPuzzleLines, SourceReadError } from '@tactica/source';
import type { RunStats, SelectionOptions } from '@tactica/types';

import type { TacticaConfig } from '../config/schema.js';
import { InputError, SourceError } from '../errors/index.js';
import type { ProgressReporter } from '../progress/reporter.js';

import { PgnOutputSink, type WrittenThemeFile } from './output-sink.js';

/**
 * Rows between progress updates while reading
 */
const READ_PROGRESS_INTERVAL = 25_000;

export interface GenerateOptions {
  /** Run everything but write no files */
  dryRun?: boolean;
  /** Rows between progress updates (default: 25000) */
  progressInterval?: number;
}

export interface GenerateResult {
  stats: RunStats;
  summary: RunSummary;
  /** Theme files written, empty on a dry run */
  files: WrittenThemeFile[];
  combinedFile?: string;
}

/**
 * Selection options for a configuration
 */
export function toSelectionOptions(config: TacticaConfig): SelectionOptions {
  const { selection, quality } = config;
  // null switches a bound or limit off
  return {
    criteria: {
      minRating: selection.minRating ?? undefined,
      maxRating: selection.maxRating ?? undefined,
      minPlayCount: selection.minPlayCount,
      minPopularity: selection.minPopularity,
      minPopularityPercentile: selection.minPopularityPercentile,
      themes: selection.themes,
      solverColor: selection.solverColor,
      startAfterFirstMove: selection.startAfterFirstMove,
    },
    perTheme: selection.perTheme ?? undefined,
    limitTotal: config.output.limitTotal ?? undefined,
    weights: {
      popularity: quality.popularityWeight,
      playCount: quality.playCountWeight,
    },
  };
}

/**
 * Render options for a configuration
 */
export function toRenderOptions(config: TacticaConfig): PuzzleRenderOptions {
  return {
    startAfterFirstMove: config.selection.startAfterFirstMove,
    eventPrefix: config.output.eventPrefix,
    site: config.output.site,
    openingColor: config.output.openingColor,
    maxLineLength: config.output.maxLineLength,
  };
}

/**
 * Run a full generation
 *
 * @throws InputError if no source is configured
 * @throws SourceError if the source cannot be read to the end; nothing is written then
 * @throws OutputError if output cannot be written
 */
export async function orchestrateGeneration(
  config: TacticaConfig,
  reporter: ProgressReporter,
  options: GenerateOptions = {},
): Promise<GenerateResult> {
  const sourcePath = config.source.path;
  if (sourcePath === undefined) {
    throw new InputError('No puzzle source given', 'Pass --source <file> or set TACTICA_SOURCE');
  }

  const run = new SelectionRun({
    ...toSelectionOptions(config),
    progressInterval: options.progressInterval ?? READ_PROGRESS_INTERVAL,
    onProgress: (stats) => reporter.updateReading(stats),
  });

  // Read and select
  reporter.startPhase('reading');
  try {
    await run.consume(decodePuzzleLines(openPuzzleLines(sourcePath), sourcePath));
  } catch (error) {
    reporter.failPhase('reading', error instanceof Error ? error.message : String(error));
    if (error instanceof SourceReadError) {
      throw new SourceError(
        error.message,
        error.stage,
        error.stage === 'header'
          ? 'The source must be a puzzle CSV with a header row'
          : 'Check the source path and that the file is complete',
      );
    }
    throw error;
  }
  const readStats = run.getStats();
  reporter.completePhase('reading', `${readStats.rowsRead} rows, ${readStats.themes} themes`);

  // Band, render and write theme by theme; each theme's file is complete before the next
  const { directory, combinedFile } = config.output;
  const sink = options.dryRun ? null : new PgnOutputSink(directory, combinedFile);
  const summary = new SummaryAccumulator(config.selection.startAfterFirstMove);
  const renderOptions = toRenderOptions(config);
  let rendered = 0;
  let renderFailures = 0;

  await sink?.open();
  try {
    reporter.startPhase('finalizing');
    const themes = run.finalize();
    const themeTotal = run.getStats().themes;
    let themeIndex = 0;

    for (const finalized of themes) {
      themeIndex++;
      reporter.updateProgress(themeIndex, themeTotal, finalized.theme);

      const games: string[] = [];
      for (const puzzle of finalized.puzzles) {
        const result = renderPuzzle(puzzle, renderOptions);
        if (result.ok) {
          games.push(result.artifact.pgn);
          rendered++;
        } else {
          renderFailures++;
          reporter.warnSafe(result.error.message);
        }
      }

      summary.add(finalized);
      await sink?.writeTheme(finalized.theme, games);
    }
    const files = sink?.writtenFiles().length ?? 0;
    reporter.completePhase(
      'finalizing',
      `${rendered} puzzles rendered, ` + (sink ? `${files} files written` : 'dry run'),
    );
  } finally {
    await sink?.close();
  }

  return {
    stats: { ...run.getStats(), rendered, renderFailures },
    summary: summary.summarize(),
    files: sink?.writtenFiles() ?? [],
    combinedFile: sink ? combinedFile : undefined,
  };
}
