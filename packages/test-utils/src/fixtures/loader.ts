/**
 * Fixture loading utilities for tests
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Get the absolute path to the source fixtures directory
 * Works whether running from src or dist
 */
function getFixturesRoot(): string {
  // Fixtures are not copied by tsc; from dist, point back into src
  if (__dirname.includes(`${path.sep}dist${path.sep}`)) {
    const packageRoot = path.resolve(__dirname, '..', '..');
    return path.join(packageRoot, 'src', 'fixtures', 'sources');
  }

  return path.join(__dirname, 'sources');
}

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(relativePath: string): string {
  return path.join(getFixturesRoot(), relativePath);
}

/**
 * Check if a fixture exists
 */
export function fixtureExists(relativePath: string): boolean {
  return fs.existsSync(getFixturePath(relativePath));
}

/**
 * Load a CSV fixture as a list of lines (trailing empty line dropped)
 */
export function loadCsvLinesSync(relativePath: string): string[] {
  const content = fs.readFileSync(getFixturePath(relativePath), 'utf-8');
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Turn a list of lines into an async line stream, like a source reader
 */
export async function* toLineStream(lines: Iterable<string>): AsyncGenerator<string> {
  for (const line of lines) {
    yield line;
  }
}
