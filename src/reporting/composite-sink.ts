import type { ResultSink } from '../types/collaborators.js';
import type { TrialResult } from '../types/trial.js';

/**
 * Hands the results to each sink in turn; the first failure stops the chain
 */
export class CompositeSink implements ResultSink {
  private readonly sinks: readonly ResultSink[];

  constructor(sinks: readonly ResultSink[]) {
    this.sinks = [...sinks];
  }

  public async consume(results: readonly TrialResult[]): Promise<void> {
    for (const sink of this.sinks) {
      await sink.consume(results);
    }
  }
}
