/**
 * Table Reporter
 *
 * Fixed-width text table, one row per trial, in matrix order.
 */

import type { ResultSink } from '../types/collaborators.js';
import type { TrialResult } from '../types/trial.js';

export interface TextOutput {
  write(chunk: string): unknown;
}

const HEADERS = [
  'Model',
  'Concurrency',
  'CPU (%)',
  'GPU (%)',
  'GPU Mem (MB)',
  'Mem (%)',
  'Avg (ms)',
  'Max (ms)',
  'Min (ms)',
  'Success (%)',
  'Requests',
] as const;

const COLUMN_GAP = '  ';

function formatRow(result: TrialResult): string[] {
  const peak = result.peakResources;
  return [
    result.config.workloadId,
    String(result.config.concurrency),
    peak.cpuLoad.toFixed(1),
    peak.acceleratorLoad.toFixed(1),
    peak.acceleratorMemoryUsed.toFixed(0),
    peak.memoryUsedPct.toFixed(1),
    result.avgLatencyMs.toFixed(1),
    result.maxLatencyMs.toFixed(1),
    result.minLatencyMs.toFixed(1),
    result.successRatePct.toFixed(1),
    String(result.totalRequests),
  ];
}

/**
 * Render results as a padded text table
 *
 * Each column is as wide as its widest cell; columns are separated by two
 * spaces. Faulted trials are listed under the table.
 */
export function formatResultsTable(results: readonly TrialResult[]): string {
  const rows: string[][] = [[...HEADERS], ...results.map(formatRow)];
  const widths = HEADERS.map((_, column) => Math.max(...rows.map((row) => row[column]?.length ?? 0)));

  const lines = rows.map((row) =>
    row
      .map((cell, column) => cell.padEnd(widths[column] ?? 0))
      .join(COLUMN_GAP)
      .trimEnd()
  );

  const faulted = results.filter((result) => result.fault !== undefined);
  if (faulted.length > 0) {
    lines.push('');
    for (const result of faulted) {
      lines.push(`! ${result.config.workloadId} @ ${result.config.concurrency}: ${result.fault ?? ''}`);
    }
  }

  return lines.join('\n') + '\n';
}

export class TableReporter implements ResultSink {
  constructor(private readonly output: TextOutput = process.stdout) {}

  public async consume(results: readonly TrialResult[]): Promise<void> {
    this.output.write(formatResultsTable(results));
  }
}
