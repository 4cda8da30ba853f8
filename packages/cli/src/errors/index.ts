/**
 * Error module exports
 */

export {
  type ExitCode,
  EXIT_CODES,
  CliError,
  InputError,
  OutputError,
  SourceError,
} from './cli-errors.js';

export { type HandleErrorOptions, formatError, exitCodeFor, handleError } from './handler.js';
