/**
 * Progress reporter with ora spinners
 */

import type { RunSummary } from '@tactica/core';
import type { RunStats } from '@tactica/types';
import ora, { type Ora, type Color } from 'ora';

import { createColorFns } from './colors.js';
import { formatBandCounts, formatCount, formatDecimal, formatDuration } from './formatters.js';
import {
  type ColorFunctions,
  type ProgressReporterOptions,
  type RunPhase,
  PHASE_NAMES,
} from './types.js';

export type { RunPhase, ProgressReporterOptions } from './types.js';

/**
 * Files written by a run
 */
export interface OutputReport {
  directory: string;
  /** Games written per theme file */
  files: Array<{ theme: string; path: string; games: number }>;
  combinedFile?: string;
}

/**
 * Progress reporter for CLI output
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private startTime: number = 0;
  private phaseStartTime: number = 0;
  private silent: boolean;
  private useColor: boolean;
  private currentPhaseName: string = '';

  // Color functions
  private c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.c = createColorFns(this.useColor);
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    if (this.silent) return;
    console.log(this.c.bold(`tactica v${version}`));
    console.log('');
  }

  /**
   * Start the overall run
   */
  startRun(): void {
    this.startTime = Date.now();
  }

  /**
   * Start a new phase
   */
  startPhase(phase: RunPhase): void {
    if (this.silent) return;

    this.phaseStartTime = Date.now();
    this.currentPhaseName = PHASE_NAMES[phase];

    // Stop any existing spinner
    if (this.spinner) {
      this.spinner.stop();
    }

    // Build ora options - only include color if colors are enabled
    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text: this.currentPhaseName,
      prefixText: '  ',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }

    this.spinner = ora(oraOptions).start();
  }

  /**
   * Show reading progress: rows read and themes seen
   */
  updateReading(stats: Readonly<RunStats>): void {
    if (this.silent || !this.spinner) return;

    const skipped =
      stats.rowsSkipped > 0 ? this.c.dim(`, ${formatCount(stats.rowsSkipped)} skipped`) : '';
    this.spinner.text = `${this.currentPhaseName}... ${formatCount(stats.rowsRead)} rows${skipped}`;
  }

  /**
   * Show progress through a counted phase
   */
  updateProgress(current: number, total: number, detail?: string): void {
    if (this.silent || !this.spinner) return;

    const detailStr = detail ? ` ${this.c.cyan(detail)}` : '';
    this.spinner.text = `${this.currentPhaseName}... ${current}/${total}${detailStr}`;
  }

  /**
   * Complete a phase successfully
   */
  completePhase(phase: RunPhase, detail?: string): void {
    if (this.silent) return;

    const duration = Date.now() - this.phaseStartTime;
    const phaseName = PHASE_NAMES[phase];
    const durationStr = duration > 1000 ? this.c.dim(` (${formatDuration(duration)})`) : '';
    const detailStr = detail ? this.c.dim(`: ${detail}`) : '';

    if (this.spinner) {
      this.spinner.succeed(`${phaseName}${detailStr}${durationStr}`);
      this.spinner = null;
    } else {
      console.log(`  ${this.c.green('✓')} ${phaseName}${detailStr}${durationStr}`);
    }
  }

  /**
   * Fail a phase
   */
  failPhase(phase: RunPhase, error: string): void {
    if (this.silent) return;

    const phaseName = PHASE_NAMES[phase];

    if (this.spinner) {
      this.spinner.fail(`${phaseName}: ${error}`);
      this.spinner = null;
    } else {
      console.log(`  ${this.c.red('✗')} ${phaseName}: ${error}`);
    }
  }

  /**
   * Print the final summary
   */
  printSummary(stats: RunStats, summary: RunSummary): void {
    if (this.silent) return;

    const totalTime = Date.now() - this.startTime;

    console.log('');
    console.log(this.c.bold('Summary:'));
    console.log(`  Rows read: ${formatCount(stats.rowsRead)}`);
    if (stats.rowsSkipped > 0) {
      const reasons = Object.entries(stats.decodeFailures)
        .filter(([, count]) => count > 0)
        .map(([reason, count]) => `${reason} ${count}`)
        .join(', ');
      console.log(
        `  Rows skipped: ${formatCount(stats.rowsSkipped)} ${this.c.dim(`(${reasons})`)}`,
      );
    }
    console.log(`  Filtered out: ${formatCount(stats.filteredOut)}`);
    if (stats.limitDropped > 0) {
      console.log(`  Cut by total limit: ${formatCount(stats.limitDropped)}`);
    }
    console.log(
      `  Total: ${summary.totalPuzzles} puzzles (${summary.uniquePuzzles} distinct) ` +
        `across ${summary.themeCount} themes`,
    );
    if (summary.rating) {
      const { min, max, average, median } = summary.rating;
      console.log(
        `  Ratings: min ${min}, max ${max}, avg ${formatDecimal(average)}, ` +
          `median ${formatDecimal(median)}`,
      );
    }
    console.log(`  Bands: ${formatBandCounts(summary.bands)}`);
    console.log(
      `  Solver to move: White ${summary.solverColors.white}, Black ${summary.solverColors.black}`,
    );
    if (stats.renderFailures > 0) {
      console.log(`  Render failures: ${this.c.yellow(String(stats.renderFailures))}`);
    }
    if (summary.themes.length > 0) {
      console.log('  Themes (count, avg rating, avg popularity):');
      for (const theme of summary.themes) {
        console.log(
          `    - ${theme.theme}: ${theme.count}, ${formatDecimal(theme.averageRating)}, ` +
            `${formatDecimal(theme.averagePopularity)}`,
        );
      }
    }
    if (summary.topPuzzles.length > 0) {
      console.log('  Most popular:');
      for (const puzzle of summary.topPuzzles) {
        console.log(
          `    - ${puzzle.id}: popularity ${puzzle.popularity}, ` +
            `${formatCount(puzzle.playCount)} plays, rating ${puzzle.rating}`,
        );
      }
    }
    console.log(`  Total time: ${formatDuration(totalTime)}`);
  }

  /**
   * Print where output was written
   */
  printOutputLocation(report: OutputReport): void {
    if (this.silent) return;
    console.log('');
    console.log(`Wrote ${report.files.length} theme files to: ${this.c.cyan(report.directory)}`);
    if (report.combinedFile) {
      console.log(`Combined PGN written to: ${this.c.cyan(report.combinedFile)}`);
    }
  }

  /**
   * Print a message (respects color and silent settings)
   */
  printMessage(message: string): void {
    if (this.silent) return;
    console.log(message);
  }

  /**
   * Print a success message
   */
  printSuccess(message: string): void {
    if (this.silent) return;
    console.log(this.c.green(`✓ ${message}`));
  }

  /**
   * Print a warning message
   */
  printWarning(message: string): void {
    if (this.silent) return;
    console.log(this.c.yellow(`⚠ ${message}`));
  }

  /**
   * Print a warning message safely while spinner is active.
   * Temporarily stops the spinner, prints the warning, then restarts it.
   */
  warnSafe(message: string): void {
    if (this.silent) return;

    if (this.spinner) {
      const currentText = this.spinner.text;
      this.spinner.stop();
      console.log(this.c.yellow(`  ⚠ ${message}`));
      this.spinner.start(currentText);
    } else {
      console.log(this.c.yellow(`  ⚠ ${message}`));
    }
  }

  /**
   * Print an error message
   */
  printError(message: string): void {
    if (this.silent) return;
    console.log(this.c.red(`✗ ${message}`));
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  /**
   * Color functions matching this reporter's color setting
   */
  get colors(): ColorFunctions {
    return this.c;
  }
}
