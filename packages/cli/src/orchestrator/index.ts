/**
 * Orchestrator module exports
 */

export {
  orchestrateGeneration,
  toSelectionOptions,
  toRenderOptions,
  type GenerateOptions,
  type GenerateResult,
} from './orchestrator.js';

export { PgnOutputSink, joinGames, type WrittenThemeFile } from './output-sink.js';
