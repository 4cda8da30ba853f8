/**
 * @tactica/types - Shared type definitions for Tactica
 *
 * Usage:
 *   import type { PuzzleRecord, BandedPuzzle, SelectionCriteria } from '@tactica/types';
 */

export * from './puzzle/index.js';

export * from './selection/index.js';
