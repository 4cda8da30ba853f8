/**
 * Configuration module exports
 */

// Schema types
export type {
  OpeningColorTag,
  SourceConfigSchema,
  SelectionConfigSchema,
  QualityConfigSchema,
  OutputConfigSchema,
  TacticaConfig,
  PartialTacticaConfig,
  CliOptions,
} from './schema.js';

// Defaults
export {
  DEFAULT_SOURCE_CONFIG,
  DEFAULT_SELECTION_CONFIG,
  DEFAULT_QUALITY_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_CONFIG,
} from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  sideColorSchema,
  openingColorSchema,
  themesSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
} from './validation.js';

// Loader
export type { LoadConfigOptions } from './loader.js';
export { loadConfig, loadEnvConfig, mapCliToConfig, formatConfig } from './loader.js';
