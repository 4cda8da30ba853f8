/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig } from 'cosmiconfig';

import { DEFAULT_CONFIG } from './defaults.js';
import type { CliOptions, PartialTacticaConfig, TacticaConfig } from './schema.js';
import { validateConfig, validatePartialConfig } from './validation.js';

type ConfigSection = keyof TacticaConfig;

/**
 * Environment variable mapping
 * Maps env var names to [section, key, kind]
 */
const ENV_VAR_MAP: Record<string, [ConfigSection, string, 'number' | 'string']> = {
  // Source
  TACTICA_SOURCE: ['source', 'path', 'string'],

  // Selection
  TACTICA_MIN_RATING: ['selection', 'minRating', 'number'],
  TACTICA_MAX_RATING: ['selection', 'maxRating', 'number'],
  TACTICA_PER_THEME: ['selection', 'perTheme', 'number'],
  TACTICA_MIN_PLAYS: ['selection', 'minPlayCount', 'number'],
  TACTICA_MIN_POPULARITY: ['selection', 'minPopularity', 'number'],
  TACTICA_MIN_POPULARITY_PERCENTILE: ['selection', 'minPopularityPercentile', 'number'],

  // Output
  TACTICA_OUT_DIR: ['output', 'directory', 'string'],
  TACTICA_EVENT_PREFIX: ['output', 'eventPrefix', 'string'],
  TACTICA_LIMIT_TOTAL: ['output', 'limitTotal', 'number'],
};

/**
 * Options for loadConfig
 */
export interface LoadConfigOptions {
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory to search for a config file (default: cwd) */
  searchFrom?: string;
}

/**
 * Merge a configuration layer over a complete configuration
 * Layer values override target values, section by section
 */
function mergeConfig(target: TacticaConfig, layer: PartialTacticaConfig): TacticaConfig {
  return {
    source: { ...target.source, ...layer.source },
    selection: { ...target.selection, ...layer.selection },
    quality: { ...target.quality, ...layer.quality },
    output: { ...target.output, ...layer.output },
  };
}

/**
 * Parse an environment variable value
 * A value that is not a number is kept as text so validation can report it
 * (or, for "none", turn the setting off)
 */
function parseEnvValue(value: string, kind: 'number' | 'string'): unknown {
  if (kind === 'number') {
    const num = Number(value.trim());
    return value.trim() === '' || Number.isNaN(num) ? value : num;
  }
  return value;
}

/**
 * Load configuration from environment variables
 * @throws ConfigValidationError if a variable holds an invalid value
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialTacticaConfig {
  const config: Record<string, Record<string, unknown>> = {};

  for (const [envVar, [section, key, kind]] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      config[section] = { ...config[section], [key]: parseEnvValue(value, kind) };
    }
  }

  return validatePartialConfig(config);
}

/**
 * Load configuration from config file using cosmiconfig
 * @returns null when no config file was found
 */
async function loadConfigFile(
  configPath?: string,
  searchFrom?: string,
): Promise<PartialTacticaConfig | null> {
  const explorer = cosmiconfig('tactica', {
    searchPlaces: [
      'package.json',
      '.tacticarc',
      '.tacticarc.json',
      '.tacticarc.yaml',
      '.tacticarc.yml',
      '.tacticarc.js',
      '.tacticarc.cjs',
      'tactica.config.js',
      'tactica.config.cjs',
    ],
  });

  const result = configPath ? await explorer.load(configPath) : await explorer.search(searchFrom);
  if (!result || result.isEmpty) {
    return null;
  }
  return validatePartialConfig(result.config);
}

/**
 * Map CLI options to a configuration layer
 * @throws ConfigValidationError if an option holds an invalid value
 */
export function mapCliToConfig(options: CliOptions): PartialTacticaConfig {
  const source: Record<string, unknown> = {};
  const selection: Record<string, unknown> = {};
  const output: Record<string, unknown> = {};

  if (options.source !== undefined) source['path'] = options.source;

  if (options.minRating !== undefined) selection['minRating'] = options.minRating;
  if (options.maxRating !== undefined) selection['maxRating'] = options.maxRating;
  if (options.perTheme !== undefined) selection['perTheme'] = options.perTheme;
  if (options.minPlays !== undefined) selection['minPlayCount'] = options.minPlays;
  if (options.minPopularity !== undefined) selection['minPopularity'] = options.minPopularity;
  if (options.minPopularityPercentile !== undefined) {
    selection['minPopularityPercentile'] = options.minPopularityPercentile;
  }
  if (options.themes !== undefined && options.themes.length > 0) {
    selection['themes'] = options.themes;
  }
  if (options.solverColor !== undefined) selection['solverColor'] = options.solverColor;
  if (options.startAfterFirstMove !== undefined) {
    selection['startAfterFirstMove'] = options.startAfterFirstMove;
  }

  if (options.outDir !== undefined) output['directory'] = options.outDir;
  if (options.combined !== undefined) output['combinedFile'] = options.combined;
  if (options.limitTotal !== undefined) output['limitTotal'] = options.limitTotal;
  if (options.eventPrefix !== undefined) output['eventPrefix'] = options.eventPrefix;
  if (options.openingColor !== undefined) output['openingColor'] = options.openingColor;

  return validatePartialConfig({ source, selection, output });
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  options: LoadConfigOptions = {},
): Promise<TacticaConfig> {
  // 1. Start with defaults
  let config = mergeConfig(DEFAULT_CONFIG, {});

  // 2. Load and merge config file (if exists)
  const fileConfig = await loadConfigFile(cliOptions.config, options.searchFrom);
  if (fileConfig) {
    config = mergeConfig(config, fileConfig);
  }

  // 3. Apply environment variables
  config = mergeConfig(config, loadEnvConfig(options.env));

  // 4. Apply CLI arguments (highest priority)
  config = mergeConfig(config, mapCliToConfig(cliOptions));

  // 5. Validate final config
  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: TacticaConfig): string {
  return JSON.stringify(config, null, 2);
}
