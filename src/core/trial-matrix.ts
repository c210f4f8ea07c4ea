/**
 * Trial matrix construction and validation
 */

import type { TrialConfig } from '../types/trial.js';
import { ConfigurationError } from '../utils/errors.js';

/**
 * Cross product of workloads and concurrency levels, workload outer and
 * concurrency inner.
 *
 * @throws {ConfigurationError} if the resulting matrix is empty or invalid
 *
 * @example
 * ```typescript
 * buildTrialMatrix(['a', 'b'], [1, 2]);
 * // => [{a,1}, {a,2}, {b,1}, {b,2}]
 * ```
 */
export function buildTrialMatrix(
  workloads: readonly string[],
  concurrencyLevels: readonly number[]
): TrialConfig[] {
  const matrix: TrialConfig[] = [];
  for (const workloadId of workloads) {
    for (const concurrency of concurrencyLevels) {
      matrix.push(Object.freeze({ workloadId, concurrency }));
    }
  }

  validateTrialMatrix(matrix);
  return matrix;
}

/**
 * Reject an empty matrix or any cell with a blank workload id or a
 * non-positive / non-integer concurrency.
 *
 * @throws {ConfigurationError}
 */
export function validateTrialMatrix(configs: readonly TrialConfig[]): void {
  if (configs.length === 0) {
    throw new ConfigurationError('Trial matrix is empty: at least one workload and one concurrency level are required');
  }

  configs.forEach((config, index) => {
    if (config.workloadId.trim().length === 0) {
      throw new ConfigurationError(`Trial ${index}: workload id must not be blank`);
    }
    if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
      throw new ConfigurationError(
        `Trial ${index} (${config.workloadId}): concurrency must be a positive integer, got ${config.concurrency}`
      );
    }
  });
}
