/**
 * @tactica/test-utils
 *
 * Shared test utilities for Tactica
 */

// Fixture loading
export {
  getFixturePath,
  fixtureExists,
  loadCsvLinesSync,
  toLineStream,
} from './fixtures/loader.js';

// Builders
export {
  PuzzleRecordBuilder,
  aPuzzle,
  toCsvRow,
  PUZZLE_CSV_HEADER,
  DEFAULT_PUZZLE_FEN,
} from './builders/puzzle-builder.js';

// Seeded random data
export {
  type RandomSource,
  type RandomPuzzleOptions,
  createSeededRandom,
  randomInt,
  pickOne,
  shuffled,
  randomPuzzles,
} from './random/seeded-random.js';
