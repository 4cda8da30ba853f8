/**
 * Conditional colorization shared by the reporter, formatters and error handler
 */

import chalk from 'chalk';

import type { ColorFunctions } from './types.js';

const identity = (text: string): string => text;

const PLAIN: ColorFunctions = {
  bold: identity,
  dim: identity,
  green: identity,
  red: identity,
  yellow: identity,
  cyan: identity,
};

/**
 * Color functions for a color setting; without color the text is returned as-is
 */
export function createColorFns(useColor: boolean): ColorFunctions {
  if (!useColor) {
    return PLAIN;
  }
  return {
    bold: (text: string) => chalk.bold(text),
    dim: (text: string) => chalk.dim(text),
    green: (text: string) => chalk.green(text),
    red: (text: string) => chalk.red(text),
    yellow: (text: string) => chalk.yellow(text),
    cyan: (text: string) => chalk.cyan(text),
  };
}
