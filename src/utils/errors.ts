/**
 * Error types for the load-testing harness
 */

/**
 * Base error class for loadbench errors
 */
export class LoadBenchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'LoadBenchError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Configuration errors (fatal, reported before any trial starts)
 */
export class ConfigurationError extends LoadBenchError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIGURATION_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Validation errors for configuration files
 */
export class ValidationError extends ConfigurationError {
  constructor(
    message: string,
    public readonly errors: Array<{ path: string; message: string }>,
    cause?: Error
  ) {
    super(message, cause);
    this.name = 'ValidationError';
  }
}

/**
 * Unexpected fault while executing a single trial
 */
export class TrialExecutionError extends LoadBenchError {
  constructor(
    message: string,
    public readonly workloadId: string,
    public readonly concurrency: number,
    cause?: Error
  ) {
    super(message, 'TRIAL_EXECUTION_ERROR', cause);
    this.name = 'TrialExecutionError';
  }
}

/**
 * Aggregator used out of order (record after reduce, double reduce)
 */
export class AggregatorStateError extends LoadBenchError {
  constructor(message: string) {
    super(message, 'AGGREGATOR_STATE_ERROR');
    this.name = 'AggregatorStateError';
  }
}

/**
 * A single request exceeded the per-request timeout
 */
export class RequestTimeoutError extends LoadBenchError {
  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, 'REQUEST_TIMEOUT');
    this.name = 'RequestTimeoutError';
  }
}

/**
 * Check if error is a loadbench error
 */
export function isLoadBenchError(error: unknown): error is LoadBenchError {
  return error instanceof LoadBenchError;
}

/**
 * Render any thrown value as a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap unknown error as LoadBenchError
 */
export function wrapError(error: unknown, message?: string): LoadBenchError {
  if (isLoadBenchError(error)) {
    return error;
  }

  const cause = error instanceof Error ? error : undefined;
  return new LoadBenchError(message || errorMessage(error), 'UNKNOWN_ERROR', cause);
}
