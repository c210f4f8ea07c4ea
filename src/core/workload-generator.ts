/**
 * Workload Generator
 *
 * Owns a fixed pool of concurrent workers that issue requests back to back
 * until the trial deadline passes or the trial signal aborts. There is no
 * client-side pacing: each worker is bounded only by the service's own
 * response latency.
 */

import type { Logger } from 'pino';
import type {
  IssueFailure,
  RequestIssuer,
  WorkloadUnit,
} from '../types/collaborators.js';
import type { RequestOutcome } from '../types/trial.js';
import type { TrialSink } from './trial-aggregator.js';
import { raceAbort } from '../utils/abortable.js';
import {
  ConfigurationError,
  RequestTimeoutError,
  TrialExecutionError,
  errorMessage,
} from '../utils/errors.js';
import { lazyLog } from '../utils/logger.js';

/**
 * What happens to a request still in flight when the trial ends
 *
 * - `abort`: the request is aborted and its outcome discarded
 * - `drain`: the request completes (bounded by the request timeout) and is recorded
 */
export type InFlightPolicy = 'abort' | 'drain';

export interface WorkloadGeneratorOptions {
  issuer: RequestIssuer;
  /** Prompt variants; one is picked uniformly at random per request */
  prompts: readonly string[];
  /** Per-request timeout (ms) */
  requestTimeoutMs: number;
  /** @default 'abort' */
  inFlightPolicy?: InFlightPolicy;
  /** Source of randomness in [0, 1); defaults to Math.random */
  random?: () => number;
  logger?: Logger;
}

export interface WorkloadRunOptions {
  workloadId: string;
  concurrency: number;
  /** Epoch ms after which no new request is started */
  deadline: number;
  signal: AbortSignal;
  sink: TrialSink;
}

export interface WorkloadRunSummary {
  workersStarted: number;
  workersExited: number;
  requestsIssued: number;
  /** Requests cut off by trial cancellation and not recorded */
  discardedInFlight: number;
}

interface WorkerTally {
  issued: number;
  discarded: number;
}

export class WorkloadGenerator {
  private readonly issuer: RequestIssuer;
  private readonly prompts: readonly string[];
  private readonly requestTimeoutMs: number;
  private readonly inFlightPolicy: InFlightPolicy;
  private readonly random: () => number;
  private readonly logger?: Logger;

  constructor(options: WorkloadGeneratorOptions) {
    if (options.prompts.length === 0) {
      throw new ConfigurationError('WorkloadGenerator requires at least one prompt');
    }
    if (!(options.requestTimeoutMs > 0)) {
      throw new ConfigurationError(`requestTimeoutMs must be positive, got ${options.requestTimeoutMs}`);
    }

    this.issuer = options.issuer;
    this.prompts = Object.freeze([...options.prompts]);
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.inFlightPolicy = options.inFlightPolicy ?? 'abort';
    this.random = options.random ?? Math.random;
    this.logger = options.logger;
  }

  /**
   * Run `concurrency` workers until the deadline or cancellation.
   *
   * Resolves only after every worker has exited, so no outcome reaches the
   * sink after this promise settles.
   *
   * @throws {ConfigurationError} if concurrency is not a positive integer
   * @throws {TrialExecutionError} if any worker faulted (after all workers exited)
   */
  public async run(options: WorkloadRunOptions): Promise<WorkloadRunSummary> {
    const { workloadId, concurrency } = options;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError(`concurrency must be a positive integer, got ${concurrency}`);
    }

    this.logger?.debug(
      { workloadId, concurrency, inFlightPolicy: this.inFlightPolicy },
      'Starting workers'
    );

    const workers: Array<Promise<WorkerTally>> = [];
    for (let index = 0; index < concurrency; index++) {
      workers.push(this.runWorker(index, options));
    }

    const settled = await Promise.allSettled(workers);

    const summary: WorkloadRunSummary = {
      workersStarted: workers.length,
      workersExited: settled.length,
      requestsIssued: 0,
      discardedInFlight: 0,
    };
    const faults: unknown[] = [];

    for (const outcome of settled) {
      if (outcome.status === 'fulfilled') {
        summary.requestsIssued += outcome.value.issued;
        summary.discardedInFlight += outcome.value.discarded;
      } else {
        faults.push(outcome.reason);
      }
    }

    this.logger?.debug({ workloadId, ...summary, faults: faults.length }, 'All workers exited');

    if (faults.length > 0) {
      const first = faults[0];
      throw new TrialExecutionError(
        `${faults.length} of ${concurrency} workers faulted: ${errorMessage(first)}`,
        workloadId,
        concurrency,
        first instanceof Error ? first : undefined
      );
    }

    return summary;
  }

  private async runWorker(workerIndex: number, options: WorkloadRunOptions): Promise<WorkerTally> {
    const tally: WorkerTally = { issued: 0, discarded: 0 };

    while (this.isActive(options)) {
      const unit = this.pickUnit(options.workloadId);
      const outcome = await this.issueOnce(unit, workerIndex, options.signal);

      if (outcome === undefined) {
        tally.discarded++;
        break;
      }

      options.sink.recordOutcome(outcome);
      tally.issued++;

      lazyLog(
        this.logger,
        'debug',
        () => ({
          workerIndex,
          workloadId: unit.workloadId,
          prompt: unit.prompt,
          elapsedMs: outcome.elapsedMs,
          ...(outcome.succeeded
            ? { responseLength: outcome.responseLength }
            : { failure: outcome.error?.kind, reason: outcome.error?.reason }),
        }),
        outcome.succeeded ? 'Request completed' : 'Request failed'
      );
    }

    return tally;
  }

  private isActive(options: WorkloadRunOptions): boolean {
    return !options.signal.aborted && Date.now() < options.deadline;
  }

  private pickUnit(workloadId: string): WorkloadUnit {
    const index = Math.min(this.prompts.length - 1, Math.floor(this.random() * this.prompts.length));
    return { workloadId, prompt: this.prompts[Math.max(0, index)] ?? '' };
  }

  /**
   * Issue one request. Returns `undefined` when trial cancellation cut the
   * request off and the outcome must not be recorded.
   */
  private async issueOnce(
    unit: WorkloadUnit,
    workerIndex: number,
    trialSignal: AbortSignal
  ): Promise<RequestOutcome | undefined> {
    const controller = new AbortController();
    const timeoutError = new RequestTimeoutError(this.requestTimeoutMs);
    const timer = setTimeout(() => controller.abort(timeoutError), this.requestTimeoutMs);

    const followTrial = this.inFlightPolicy === 'abort';
    const onTrialAbort = (): void => controller.abort(trialSignal.reason);
    if (followTrial) {
      trialSignal.addEventListener('abort', onTrialAbort, { once: true });
    }

    const timedOut = (): boolean => controller.signal.aborted && controller.signal.reason === timeoutError;
    const cancelled = (): boolean => followTrial && trialSignal.aborted && !timedOut();

    const startedAt = Date.now();
    try {
      const result = await raceAbort(
        this.issuer.send(unit, { signal: controller.signal, workerIndex }),
        controller.signal
      );
      const elapsedMs = Date.now() - startedAt;

      if (result.ok) {
        return {
          elapsedMs,
          succeeded: true,
          workerIndex,
          responseLength: result.val.responseLength,
        };
      }

      if (timedOut()) {
        return this.failure(workerIndex, elapsedMs, { kind: 'timeout', reason: timeoutError.message });
      }
      if (cancelled()) {
        return undefined;
      }
      return this.failure(workerIndex, elapsedMs, result.val);
    } catch (error) {
      const elapsedMs = Date.now() - startedAt;

      if (timedOut()) {
        return this.failure(workerIndex, elapsedMs, { kind: 'timeout', reason: timeoutError.message });
      }
      if (cancelled()) {
        return undefined;
      }
      return this.failure(workerIndex, elapsedMs, { kind: 'unexpected', reason: errorMessage(error) });
    } finally {
      clearTimeout(timer);
      trialSignal.removeEventListener('abort', onTrialAbort);
    }
  }

  private failure(workerIndex: number, elapsedMs: number, failure: IssueFailure): RequestOutcome {
    return {
      elapsedMs,
      succeeded: false,
      workerIndex,
      error: {
        kind: failure.kind,
        reason: failure.reason,
        ...(failure.status !== undefined && { status: failure.status }),
      },
    };
  }
}
