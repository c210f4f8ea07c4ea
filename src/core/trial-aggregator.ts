/**
 * Trial Aggregator
 *
 * Accumulates request outcomes and resource samples for one trial and
 * reduces them into a single TrialResult.
 *
 * Workers and the sampler all run on the same event loop and every record
 * call below is synchronous, so each call is atomic with respect to the
 * other producers. `reduce()` must only be called once the producers have
 * been joined.
 */

import type { Logger } from 'pino';
import type {
  RequestFailureKind,
  RequestOutcome,
  ResourceSample,
  TrialConfig,
  TrialResult,
} from '../types/trial.js';
import { AggregatorStateError } from '../utils/errors.js';
import { nonNegative, percentage, percentile, safeAverage, safeDivide } from '../utils/math-helpers.js';

/**
 * Producer-facing side of the aggregator
 */
export interface TrialSink {
  recordOutcome(outcome: RequestOutcome): void;
  recordSample(sample: ResourceSample): void;
}

/**
 * Wall-clock bounds of the trial, supplied by the controller at reduction
 */
export interface TrialTiming {
  startedAt: number;
  endedAt: number;
  fault?: string;
}

/**
 * Running counters, readable while the trial is in progress
 */
export interface AggregatorSnapshot {
  totalRequests: number;
  successCount: number;
  sampleCount: number;
}

type MutablePeak = { -readonly [K in keyof ResourceSample]: number };

export class TrialAggregator implements TrialSink {
  private readonly config: TrialConfig;
  private readonly logger?: Logger;

  private totalRequests = 0;
  private successCount = 0;
  private readonly latencies: number[] = [];
  private readonly failuresByKind: Partial<Record<RequestFailureKind, number>> = {};
  private readonly peak: MutablePeak = {
    cpuLoad: 0,
    memoryUsedPct: 0,
    acceleratorLoad: 0,
    acceleratorMemoryUsed: 0,
  };
  private sampleCount = 0;
  private reduced = false;

  constructor(config: TrialConfig, logger?: Logger) {
    this.config = config;
    this.logger = logger;
  }

  public recordOutcome(outcome: RequestOutcome): void {
    this.assertOpen('recordOutcome');

    this.totalRequests++;
    if (outcome.succeeded) {
      this.successCount++;
      this.latencies.push(outcome.elapsedMs);
      return;
    }

    const kind = outcome.error?.kind ?? 'unexpected';
    this.failuresByKind[kind] = (this.failuresByKind[kind] ?? 0) + 1;
  }

  public recordSample(sample: ResourceSample): void {
    this.assertOpen('recordSample');

    this.sampleCount++;
    this.peak.cpuLoad = Math.max(this.peak.cpuLoad, nonNegative(sample.cpuLoad));
    this.peak.memoryUsedPct = Math.max(this.peak.memoryUsedPct, nonNegative(sample.memoryUsedPct));
    this.peak.acceleratorLoad = Math.max(this.peak.acceleratorLoad, nonNegative(sample.acceleratorLoad));
    this.peak.acceleratorMemoryUsed = Math.max(
      this.peak.acceleratorMemoryUsed,
      nonNegative(sample.acceleratorMemoryUsed)
    );
  }

  public snapshot(): AggregatorSnapshot {
    return {
      totalRequests: this.totalRequests,
      successCount: this.successCount,
      sampleCount: this.sampleCount,
    };
  }

  /**
   * Reduce everything recorded so far into the trial's result. Callable once.
   */
  public reduce(timing: TrialTiming): TrialResult {
    if (this.reduced) {
      throw new AggregatorStateError(
        `Trial ${this.config.workloadId}@${this.config.concurrency} has already been reduced`
      );
    }
    this.reduced = true;

    const sorted = [...this.latencies].sort((a, b) => a - b);
    const durationMs = Math.max(0, timing.endedAt - timing.startedAt);
    const failureCount = this.totalRequests - this.successCount;

    const result: TrialResult = {
      config: Object.freeze({ ...this.config }),
      peakResources: Object.freeze({ ...this.peak }),
      sampleCount: this.sampleCount,
      avgLatencyMs: safeAverage(sorted),
      maxLatencyMs: sorted.length > 0 ? sorted[sorted.length - 1] ?? 0 : 0,
      minLatencyMs: sorted.length > 0 ? sorted[0] ?? 0 : 0,
      p50LatencyMs: percentile(sorted, 0.5),
      p95LatencyMs: percentile(sorted, 0.95),
      p99LatencyMs: percentile(sorted, 0.99),
      successRatePct: percentage(this.successCount, this.totalRequests),
      totalRequests: this.totalRequests,
      successCount: this.successCount,
      failureCount,
      failuresByKind: Object.freeze({ ...this.failuresByKind }),
      throughputRps: safeDivide(this.totalRequests, durationMs / 1000),
      startedAt: timing.startedAt,
      endedAt: timing.endedAt,
      durationMs,
      ...(timing.fault !== undefined && { fault: timing.fault }),
    };

    this.logger?.debug(
      {
        workloadId: this.config.workloadId,
        concurrency: this.config.concurrency,
        totalRequests: result.totalRequests,
        successCount: result.successCount,
        sampleCount: result.sampleCount,
      },
      'Trial reduced'
    );

    return Object.freeze(result);
  }

  private assertOpen(operation: string): void {
    if (this.reduced) {
      throw new AggregatorStateError(
        `${operation} called after trial ${this.config.workloadId}@${this.config.concurrency} was reduced`
      );
    }
  }
}
