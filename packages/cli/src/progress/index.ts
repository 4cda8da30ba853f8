/**
 * Progress module exports
 */

export type { RunPhase, ProgressReporterOptions, OutputReport } from './reporter.js';
export { ProgressReporter } from './reporter.js';
export {
  formatConfigDisplay,
  formatBandCounts,
  formatDuration,
  formatCount,
  formatDecimal,
} from './formatters.js';
export { createColorFns } from './colors.js';
export type { ColorFunctions } from './types.js';
