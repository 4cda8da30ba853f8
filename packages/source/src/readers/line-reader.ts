/**
 * Line reader for puzzle sources
 *
 * Streams a (possibly compressed) CSV file line by line without holding it
 * in memory. Gzip goes through node:zlib; zstandard through the `zstd`
 * command-line tool, which must be on PATH.
 */

import { spawn } from 'node:child_process';
import * as fs from 'node:fs';
import * as readline from 'node:readline';
import { pipeline, type Readable } from 'node:stream';
import { createGunzip } from 'node:zlib';

import { SourceNotFoundError, SourceReadError, type SourceStage } from '../errors.js';

/**
 * Compression formats recognized from the file extension
 */
export type SourceCompression = 'none' | 'gzip' | 'zstd';

/**
 * Detect the compression of a source from its file name
 */
export function detectCompression(sourcePath: string): SourceCompression {
  const lower = sourcePath.toLowerCase();
  if (lower.endsWith('.gz')) return 'gzip';
  if (lower.endsWith('.zst')) return 'zstd';
  return 'none';
}

/**
 * An opened input stream with its failure hooks
 */
interface OpenedInput {
  input: Readable;
  /** Resolves once any external decompressor has exited */
  settled: Promise<void>;
  dispose: () => void;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Open the raw byte stream for a source
 *
 * @param onFailure - Called at most once per failing stream
 */
function openInput(
  sourcePath: string,
  compression: SourceCompression,
  onFailure: (error: Error, stage: SourceStage) => void,
): OpenedInput {
  if (compression === 'zstd') {
    const proc = spawn('zstd', ['-dc', sourcePath], { stdio: ['ignore', 'pipe', 'pipe'] });
    const stderr: string[] = [];
    proc.stderr.setEncoding('utf-8');
    proc.stderr.on('data', (chunk: string) => stderr.push(chunk));

    const settled = new Promise<void>((resolve) => {
      proc.on('error', (error) => {
        onFailure(error, 'decompress');
        resolve();
      });
      proc.on('close', (code, signal) => {
        // A signal after dispose() is an early stop, not a failure
        if (code !== 0 && signal === null) {
          const detail = stderr.join('').trim() || `zstd exited with code ${code}`;
          onFailure(new Error(detail), 'decompress');
        }
        resolve();
      });
    });

    return {
      input: proc.stdout,
      settled,
      dispose: () => {
        if (proc.exitCode === null) {
          proc.kill();
        }
      },
    };
  }

  const file = fs.createReadStream(sourcePath);

  if (compression === 'gzip') {
    const gunzip = pipeline(file, createGunzip(), (error) => {
      if (error) {
        onFailure(error, 'decompress');
      }
    });
    return { input: gunzip, settled: Promise.resolve(), dispose: () => gunzip.destroy() };
  }

  file.on('error', (error) => onFailure(error, 'read'));
  return { input: file, settled: Promise.resolve(), dispose: () => file.destroy() };
}

/**
 * Stream the lines of a puzzle source
 *
 * Stopping the iteration early releases the file and any decompressor.
 *
 * @throws SourceNotFoundError if the file does not exist
 * @throws SourceReadError if reading or decompression fails midway
 */
export async function* openPuzzleLines(sourcePath: string): AsyncGenerator<string> {
  if (!fs.existsSync(sourcePath)) {
    throw new SourceNotFoundError(sourcePath);
  }

  const failure: { error?: Error; stage?: SourceStage } = {};
  let rl: readline.Interface | null = null;

  const { input, settled, dispose } = openInput(
    sourcePath,
    detectCompression(sourcePath),
    (error, stage) => {
      if (failure.error === undefined) {
        failure.error = error;
        failure.stage = stage;
      }
      rl?.close();
    },
  );

  rl = readline.createInterface({ input, crlfDelay: Infinity });

  try {
    try {
      for await (const line of rl) {
        yield line;
      }
    } catch (error) {
      throw new SourceReadError(
        `Failed to read ${sourcePath}: ${toError(error).message}`,
        sourcePath,
        'read',
        error,
      );
    }

    await settled;
    if (failure.error !== undefined) {
      throw new SourceReadError(
        `Failed to read ${sourcePath}: ${failure.error.message}`,
        sourcePath,
        failure.stage ?? 'read',
        failure.error,
      );
    }
  } finally {
    rl.close();
    dispose();
  }
}
