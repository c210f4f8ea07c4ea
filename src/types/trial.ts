/**
 * Trial data model
 *
 * Everything the engine produces or consumes per trial. All records are
 * created once and never mutated afterwards.
 */

/**
 * One cell of the (workload × concurrency) matrix
 */
export interface TrialConfig {
  /** Workload identifier, e.g. the model name sent to the target service */
  readonly workloadId: string;
  /** Number of concurrent workers (positive integer) */
  readonly concurrency: number;
}

/**
 * Failure categories for a single request attempt
 */
export type RequestFailureKind =
  | 'network'
  | 'timeout'
  | 'status'
  | 'malformed'
  | 'aborted'
  | 'unexpected';

export interface RequestFailureInfo {
  readonly kind: RequestFailureKind;
  readonly reason: string;
  /** HTTP status code for `status` failures */
  readonly status?: number;
}

/**
 * Outcome of one request attempt, created by a worker
 */
export interface RequestOutcome {
  readonly elapsedMs: number;
  readonly succeeded: boolean;
  readonly workerIndex: number;
  readonly error?: RequestFailureInfo;
  /** Length of the response payload for successful requests */
  readonly responseLength?: number;
}

/**
 * Point-in-time host utilisation
 */
export interface ResourceSample {
  /** Whole-host CPU utilisation (%) */
  readonly cpuLoad: number;
  /** Used system memory (%) */
  readonly memoryUsedPct: number;
  /** Accelerator (GPU) utilisation (%) */
  readonly acceleratorLoad: number;
  /** Accelerator memory in use (MB) */
  readonly acceleratorMemoryUsed: number;
}

export const ZERO_RESOURCE_SAMPLE: ResourceSample = Object.freeze({
  cpuLoad: 0,
  memoryUsedPct: 0,
  acceleratorLoad: 0,
  acceleratorMemoryUsed: 0,
});

/**
 * Per-trial summary
 */
export interface TrialResult {
  readonly config: TrialConfig;
  /** Element-wise maximum over all samples (zero vector when none) */
  readonly peakResources: ResourceSample;
  /** Number of resource samples received; 0 means "not measured" */
  readonly sampleCount: number;
  readonly avgLatencyMs: number;
  readonly maxLatencyMs: number;
  readonly minLatencyMs: number;
  readonly p50LatencyMs: number;
  readonly p95LatencyMs: number;
  readonly p99LatencyMs: number;
  /** 0-100; 0 when no requests were issued */
  readonly successRatePct: number;
  readonly totalRequests: number;
  readonly successCount: number;
  readonly failureCount: number;
  readonly failuresByKind: Readonly<Partial<Record<RequestFailureKind, number>>>;
  readonly throughputRps: number;
  /** Epoch milliseconds */
  readonly startedAt: number;
  readonly endedAt: number;
  readonly durationMs: number;
  /** Set when the trial hit an unexpected internal fault; the stats are best-effort */
  readonly fault?: string;
}
