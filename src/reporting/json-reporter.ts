/**
 * JSON Reporter
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { Logger } from 'pino';
import type { ResultSink } from '../types/collaborators.js';
import type { TrialResult } from '../types/trial.js';

export interface JsonReport {
  generatedAt: string;
  results: readonly TrialResult[];
}

export interface JsonReporterOptions {
  outputPath: string;
  /** Clock for `generatedAt` */
  now?: () => number;
  logger?: Logger;
}

export function buildJsonReport(results: readonly TrialResult[], generatedAt: number): JsonReport {
  return {
    generatedAt: new Date(generatedAt).toISOString(),
    results,
  };
}

/**
 * Writes `{ generatedAt, results }` as pretty-printed JSON
 */
export class JsonReporter implements ResultSink {
  private readonly outputPath: string;
  private readonly now: () => number;
  private readonly logger?: Logger;

  constructor(options: JsonReporterOptions) {
    this.outputPath = options.outputPath;
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  public async consume(results: readonly TrialResult[]): Promise<void> {
    const report = buildJsonReport(results, this.now());

    await mkdir(dirname(this.outputPath), { recursive: true });
    await writeFile(this.outputPath, JSON.stringify(report, null, 2) + '\n', 'utf-8');

    this.logger?.info({ path: this.outputPath, trials: results.length }, 'JSON report written');
  }
}
