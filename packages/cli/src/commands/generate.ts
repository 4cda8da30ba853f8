/**
 * Generate command implementation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import { parseCliOptions, VERSION } from '../cli.js';
import { loadConfig, formatConfig } from '../config/index.js';
import { handleError } from '../errors/index.js';
import { orchestrateGeneration } from '../orchestrator/index.js';
import { formatConfigDisplay, ProgressReporter } from '../progress/index.js';

/**
 * Resolve a path against the working directory for display
 */
function resolveAbsolutePath(filePath: string): string {
  return path.resolve(process.cwd(), filePath);
}

/**
 * Main generate command handler
 */
export async function generateCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const reporter = new ProgressReporter({
    color: !options.noColor,
    silent: options.quiet ?? false,
  });

  try {
    // Load configuration
    const config = await loadConfig(options);

    // Show config and exit if requested
    if (options.showConfig) {
      console.log(formatConfigDisplay(config, reporter.colors));
      console.log('');
      console.log('Raw configuration:');
      console.log(formatConfig(config));
      return;
    }

    reporter.printHeader(VERSION);

    if (options.dryRun) {
      reporter.printMessage('Dry-run mode: selecting and rendering without writing files');
      reporter.printMessage('');
      if (config.source.path) {
        const sourcePath = resolveAbsolutePath(config.source.path);
        if (fs.existsSync(sourcePath)) {
          reporter.printSuccess(`Source exists: ${sourcePath}`);
        } else {
          reporter.printError(`Source not found: ${sourcePath}`);
        }
      }
      const outputDir = resolveAbsolutePath(config.output.directory);
      if (fs.existsSync(outputDir)) {
        reporter.printSuccess(`Output directory exists: ${outputDir}`);
      } else {
        reporter.printWarning(`Output directory will be created: ${outputDir}`);
      }
      reporter.printMessage('');
    }

    reporter.startRun();
    const result = await orchestrateGeneration(config, reporter, { dryRun: options.dryRun });

    reporter.printSummary(result.stats, result.summary);

    if (!options.dryRun) {
      const report = {
        directory: resolveAbsolutePath(config.output.directory),
        files: result.files,
        combinedFile: result.combinedFile,
      };
      reporter.printOutputLocation(report);
    } else {
      reporter.printMessage('');
      reporter.printMessage('Dry-run complete. No files were written.');
    }
  } catch (error) {
    reporter.stop();
    handleError(error, { color: !options.noColor });
  }
}
