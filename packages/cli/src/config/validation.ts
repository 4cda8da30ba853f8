/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { PartialTacticaConfig, TacticaConfig } from './schema.js';

/**
 * Puzzle rating schema (non-negative integer)
 */
const ratingSchema = z.number().int().min(0);

/**
 * Keyword that turns a bound or limit off
 */
export const NONE_KEYWORD = 'none';

/**
 * A value that may be switched off with "none" (or 0, for limits)
 */
function orNone<T extends z.ZodTypeAny>(schema: T, zeroIsNone: boolean) {
  return z.preprocess(
    (value) => (value === NONE_KEYWORD || (zeroIsNone && value === 0) ? null : value),
    schema.nullable(),
  );
}

/**
 * Puzzle count limit: positive integer, or 0 / "none" for no limit
 */
const limitSchema = orNone(z.number().int().min(1), true);

/**
 * Percentage schema (0-100)
 */
const percentSchema = z.number().min(0).max(100);

/**
 * Side color schema
 */
export const sideColorSchema = z.enum(['white', 'black']);

/**
 * OpeningColor tag schema
 */
export const openingColorSchema = z.enum(['white', 'black', 'both']);

/**
 * Theme selection schema: "all" or a non-empty list of tags
 */
export const themesSchema = z.union([z.literal('all'), z.array(z.string().min(1)).min(1)]);

export const sourceConfigSchema = z.object({
  path: z.string().min(1).optional(),
});

/**
 * Base selection configuration schema (without refinement)
 */
const baseSelectionConfigSchema = z.object({
  minRating: orNone(ratingSchema, false).optional(),
  maxRating: orNone(ratingSchema, false).optional(),
  minPlayCount: z.number().int().min(0).optional(),
  minPopularity: z.number().int().min(-100).max(100).optional(),
  minPopularityPercentile: percentSchema,
  themes: themesSchema,
  solverColor: sideColorSchema.optional(),
  perTheme: limitSchema.optional(),
  startAfterFirstMove: z.boolean(),
});

/**
 * Selection configuration schema with validation
 */
export const selectionConfigSchema = baseSelectionConfigSchema.refine(
  ({ minRating, maxRating }) =>
    minRating === undefined ||
    minRating === null ||
    maxRating === undefined ||
    maxRating === null ||
    minRating <= maxRating,
  {
    message: 'minRating must be <= maxRating',
    path: ['minRating'],
  },
);

export const qualityConfigSchema = z.object({
  popularityWeight: z.number().min(0),
  playCountWeight: z.number().min(0),
});

export const outputConfigSchema = z.object({
  directory: z.string().min(1),
  combinedFile: z.string().min(1).optional(),
  limitTotal: limitSchema.optional(),
  eventPrefix: z.string().optional(),
  openingColor: openingColorSchema.optional(),
  site: z.string().min(1),
  maxLineLength: z.number().int().min(0),
});

/**
 * Complete configuration schema
 */
export const configSchema: z.ZodType<TacticaConfig, z.ZodTypeDef, unknown> = z.object({
  source: sourceConfigSchema,
  selection: selectionConfigSchema,
  quality: qualityConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (for config files, environment and flags)
 */
export const partialConfigSchema: z.ZodType<PartialTacticaConfig, z.ZodTypeDef, unknown> =
  z.object({
    source: sourceConfigSchema.partial().optional(),
    selection: baseSelectionConfigSchema.partial().optional(),
    quality: qualityConfigSchema.partial().optional(),
    output: outputConfigSchema.partial().optional(),
  });

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): TacticaConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a configuration layer
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialTacticaConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
