/**
 * PGN output sink
 *
 * One file per theme under the output directory, plus an optional combined
 * file. Files are only ever appended to within a run.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { themeFileName } from '@tactica/pgn';

import { OutputError } from '../errors/index.js';

/**
 * A theme file written by the sink
 */
export interface WrittenThemeFile {
  theme: string;
  path: string;
  games: number;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Join games as PGN: one blank line between games, newline at the end
 */
export function joinGames(games: readonly string[]): string {
  return games.map((game) => `${game}\n`).join('\n');
}

export class PgnOutputSink {
  private readonly written = new Set<string>();
  private combined: fs.FileHandle | null = null;
  private combinedGames = 0;
  private readonly files: WrittenThemeFile[] = [];

  constructor(
    readonly directory: string,
    readonly combinedFile?: string,
  ) {}

  /**
   * Create the output directory and truncate the combined file
   * @throws OutputError if either cannot be created
   */
  async open(): Promise<void> {
    let target = this.directory;
    try {
      await fs.mkdir(this.directory, { recursive: true });
      if (this.combinedFile) {
        target = this.combinedFile;
        await fs.mkdir(path.dirname(this.combinedFile), { recursive: true });
        this.combined = await fs.open(this.combinedFile, 'w');
      }
    } catch (error) {
      throw new OutputError(describe(error), target, 'Check that the output location is writable');
    }
  }

  /**
   * Write the games of one theme
   *
   * Two themes whose names sanitize to the same file share it. A theme
   * without games creates no file.
   * @throws OutputError if a write fails
   */
  async writeTheme(theme: string, games: readonly string[]): Promise<WrittenThemeFile> {
    const filePath = path.join(this.directory, themeFileName(theme));
    const text = joinGames(games);

    try {
      if (games.length > 0) {
        const separator = this.written.has(filePath) ? '\n' : '';
        await fs.writeFile(filePath, separator + text, {
          encoding: 'utf-8',
          flag: this.written.has(filePath) ? 'a' : 'w',
        });
        this.written.add(filePath);

        if (this.combined !== null) {
          await this.combined.write((this.combinedGames > 0 ? '\n' : '') + text);
          this.combinedGames += games.length;
        }
      }
    } catch (error) {
      throw new OutputError(describe(error), filePath);
    }

    const file = { theme, path: filePath, games: games.length };
    if (games.length > 0) {
      this.files.push(file);
    }
    return file;
  }

  /**
   * Theme files written so far, in write order
   */
  writtenFiles(): WrittenThemeFile[] {
    return [...this.files];
  }

  async close(): Promise<void> {
    const handle = this.combined;
    this.combined = null;
    if (handle !== null) {
      await handle.close();
    }
  }
}
