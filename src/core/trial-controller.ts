/**
 * Trial Controller
 *
 * Runs the trial matrix strictly one trial at a time. For every trial it
 * starts one ResourceSampler and one WorkloadGenerator against a fresh
 * TrialAggregator, stops both at the trial deadline, reduces the result and
 * waits out the cool-down before moving on. Results come back in matrix
 * order.
 *
 * Faults inside a trial never abort the matrix: the trial is reported with
 * whatever was accumulated and `fault` set.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { RequestIssuer, ResourceProbe } from '../types/collaborators.js';
import type { RequestOutcome, ResourceSample, TrialConfig, TrialResult } from '../types/trial.js';
import { TrialAggregator, type TrialSink } from './trial-aggregator.js';
import { ResourceSampler } from './resource-sampler.js';
import { WorkloadGenerator, type InFlightPolicy } from './workload-generator.js';
import { validateTrialMatrix } from './trial-matrix.js';
import { delay } from '../utils/abortable.js';
import { LoadBenchError, errorMessage, wrapError } from '../utils/errors.js';

export interface TrialControllerOptions {
  /** Wall-clock length of every trial (ms) */
  trialDurationMs: number;
  /** Idle time between consecutive trials (ms) */
  cooldownMs: number;
  /** Resource sampling interval (ms) */
  sampleIntervalMs: number;
  /** Per-request timeout (ms) */
  requestTimeoutMs: number;
  /** Prompt variants sent to the target */
  prompts: readonly string[];
  inFlightPolicy?: InFlightPolicy;
}

/**
 * Optional metrics hook fed alongside the aggregator
 */
export interface TrialTelemetry {
  recordOutcome(config: TrialConfig, outcome: RequestOutcome): void;
  recordSample(sample: ResourceSample): void;
  recordTrial(result: TrialResult): void;
}

export interface TrialControllerDependencies {
  issuer: RequestIssuer;
  probe: ResourceProbe;
  logger?: Logger;
  telemetry?: TrialTelemetry;
  /** Source of randomness for prompt selection */
  random?: () => number;
}

export interface TrialControllerEvents {
  trialStarted: (config: TrialConfig, index: number, total: number) => void;
  trialCompleted: (result: TrialResult, index: number, total: number) => void;
  trialFailed: (result: TrialResult, error: Error, index: number, total: number) => void;
  cooldownStarted: (cooldownMs: number, nextIndex: number) => void;
  matrixCompleted: (results: readonly TrialResult[]) => void;
}

export class TrialController extends EventEmitter<TrialControllerEvents> {
  private readonly options: TrialControllerOptions;
  private readonly generator: WorkloadGenerator;
  private readonly sampler: ResourceSampler;
  private readonly logger?: Logger;
  private readonly telemetry?: TrialTelemetry;
  private running = false;

  constructor(options: TrialControllerOptions, dependencies: TrialControllerDependencies) {
    super();
    this.options = options;
    this.logger = dependencies.logger;
    this.telemetry = dependencies.telemetry;

    this.generator = new WorkloadGenerator({
      issuer: dependencies.issuer,
      prompts: options.prompts,
      requestTimeoutMs: options.requestTimeoutMs,
      inFlightPolicy: options.inFlightPolicy,
      random: dependencies.random,
      logger: dependencies.logger?.child({ component: 'WorkloadGenerator' }),
    });

    this.sampler = new ResourceSampler({
      probe: dependencies.probe,
      intervalMs: options.sampleIntervalMs,
      logger: dependencies.logger?.child({ component: 'ResourceSampler' }),
    });
  }

  /**
   * Run every trial in order and return one result per config.
   *
   * @throws {ConfigurationError} before any trial starts if the matrix is empty or invalid
   */
  public async runAll(configs: readonly TrialConfig[]): Promise<TrialResult[]> {
    validateTrialMatrix(configs);

    if (this.running) {
      throw new LoadBenchError('TrialController is already running a matrix', 'CONTROLLER_BUSY');
    }
    this.running = true;

    const results: TrialResult[] = [];
    const total = configs.length;

    try {
      for (const [index, config] of configs.entries()) {
        results.push(await this.runIsolated(config, index, total));

        const isLast = index === total - 1;
        if (!isLast && this.options.cooldownMs > 0) {
          this.logger?.info({ cooldownMs: this.options.cooldownMs }, 'Cooling down before next trial');
          this.emit('cooldownStarted', this.options.cooldownMs, index + 1);
          await delay(this.options.cooldownMs);
        }
      }
    } finally {
      this.running = false;
    }

    this.logger?.info({ trials: results.length }, 'Trial matrix completed');
    this.emit('matrixCompleted', results);
    return results;
  }

  /**
   * Run a single trial bounded by the configured trial duration.
   */
  public async runTrial(config: TrialConfig, index = 0, total = 1): Promise<TrialResult> {
    const aggregator = new TrialAggregator(config, this.logger);
    const sink = this.createSink(config, aggregator);

    const trial = new AbortController();
    const startedAt = Date.now();
    const deadline = startedAt + this.options.trialDurationMs;

    this.logger?.info(
      {
        workloadId: config.workloadId,
        concurrency: config.concurrency,
        trial: index + 1,
        total,
        durationMs: this.options.trialDurationMs,
      },
      'Trial started'
    );
    this.emit('trialStarted', config, index, total);

    const deadlineTimer = setTimeout(() => trial.abort(), this.options.trialDurationMs);
    let fault: Error | undefined;

    try {
      const samplerRun = this.sampler.run(trial.signal, sink);
      // Whatever ends the generator (deadline or fault) also stops the sampler
      const generatorRun = this.generator
        .run({
          workloadId: config.workloadId,
          concurrency: config.concurrency,
          deadline,
          signal: trial.signal,
          sink,
        })
        .finally(() => trial.abort());

      const [generated, sampled] = await Promise.allSettled([generatorRun, samplerRun]);

      if (generated.status === 'rejected') {
        fault = wrapError(generated.reason);
      } else {
        this.logger?.debug({ workloadId: config.workloadId, ...generated.value }, 'Workload generator joined');
      }
      if (sampled.status === 'rejected') {
        fault ??= wrapError(sampled.reason);
      }
    } finally {
      clearTimeout(deadlineTimer);
      trial.abort();
    }

    const result = aggregator.reduce({
      startedAt,
      endedAt: Date.now(),
      ...(fault && { fault: fault.message }),
    });

    this.telemetry?.recordTrial(result);
    this.report(result, fault, index, total);
    return result;
  }

  private async runIsolated(config: TrialConfig, index: number, total: number): Promise<TrialResult> {
    const startedAt = Date.now();
    try {
      return await this.runTrial(config, index, total);
    } catch (error) {
      // Nothing was reduced; report an empty best-effort result for this cell
      const fault = wrapError(error);
      const result = new TrialAggregator(config).reduce({
        startedAt,
        endedAt: Date.now(),
        fault: fault.message,
      });
      this.report(result, fault, index, total);
      return result;
    }
  }

  private createSink(config: TrialConfig, aggregator: TrialAggregator): TrialSink {
    const telemetry = this.telemetry;
    if (!telemetry) {
      return aggregator;
    }

    return {
      recordOutcome: (outcome) => {
        aggregator.recordOutcome(outcome);
        telemetry.recordOutcome(config, outcome);
      },
      recordSample: (sample) => {
        aggregator.recordSample(sample);
        telemetry.recordSample(sample);
      },
    };
  }

  private report(result: TrialResult, fault: Error | undefined, index: number, total: number): void {
    const context = {
      workloadId: result.config.workloadId,
      concurrency: result.config.concurrency,
      totalRequests: result.totalRequests,
      successRatePct: Number(result.successRatePct.toFixed(1)),
      avgLatencyMs: Number(result.avgLatencyMs.toFixed(1)),
      sampleCount: result.sampleCount,
    };

    if (fault) {
      this.logger?.error({ ...context, error: errorMessage(fault) }, 'Trial faulted; reporting partial result');
      this.emit('trialFailed', result, fault, index, total);
      return;
    }

    this.logger?.info(context, 'Trial completed');
    this.emit('trialCompleted', result, index, total);
  }
}
