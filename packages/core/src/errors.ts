/**
 * Error classes for the selection pipeline
 */

/**
 * Fatal, pre-run: the selection options are contradictory or out of range
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A pipeline object was used out of order (e.g. finalizing before the
 * stream was consumed, or consuming a collection twice)
 */
export class SelectionStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SelectionStateError';
  }
}
