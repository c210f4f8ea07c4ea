/**
 * Resource Sampler
 *
 * Pulls one ResourceSample from the probe on every tick of a fixed-rate
 * schedule and hands it to the trial sink. Scoped to a single trial: `run`
 * returns once the trial signal aborts.
 */

import type { Logger } from 'pino';
import type { ResourceProbe } from '../types/collaborators.js';
import { ZERO_RESOURCE_SAMPLE, type ResourceSample } from '../types/trial.js';
import type { TrialSink } from './trial-aggregator.js';
import { delay } from '../utils/abortable.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';

export interface ResourceSamplerOptions {
  probe: ResourceProbe;
  /** Tick interval (ms) @default 1000 */
  intervalMs?: number;
  /** How long an in-flight probe call may outlive the trial (ms) @default 1000 */
  stopGraceMs?: number;
  logger?: Logger;
}

export const DEFAULT_SAMPLE_INTERVAL_MS = 1000;
export const DEFAULT_STOP_GRACE_MS = 1000;

export class ResourceSampler {
  private readonly probe: ResourceProbe;
  private readonly intervalMs: number;
  private readonly stopGraceMs: number;
  private readonly logger?: Logger;

  constructor(options: ResourceSamplerOptions) {
    const intervalMs = options.intervalMs ?? DEFAULT_SAMPLE_INTERVAL_MS;
    if (!(intervalMs > 0)) {
      throw new ConfigurationError(`sample interval must be positive, got ${intervalMs}`);
    }

    const stopGraceMs = options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
    if (!(stopGraceMs >= 0)) {
      throw new ConfigurationError(`sampler stop grace must be non-negative, got ${stopGraceMs}`);
    }

    this.probe = options.probe;
    this.intervalMs = intervalMs;
    this.stopGraceMs = stopGraceMs;
    this.logger = options.logger;
  }

  public getIntervalMs(): number {
    return this.intervalMs;
  }

  /**
   * Sample until `signal` aborts.
   *
   * A sample whose probe call is in flight when the signal aborts is still
   * delivered if it settles within `stopGraceMs` of the abort, and dropped
   * otherwise. No probe call starts after the abort.
   *
   * @returns number of samples delivered to `sink`
   */
  public async run(signal: AbortSignal, sink: TrialSink): Promise<number> {
    let delivered = 0;
    let nextTickAt = Date.now() + this.intervalMs;

    while (!signal.aborted) {
      const ticked = await delay(nextTickAt - Date.now(), signal);
      if (!ticked) {
        break;
      }

      // A probe slower than the interval collapses missed ticks into one
      nextTickAt = Math.max(nextTickAt + this.intervalMs, Date.now());

      const sample = await this.takeSample(signal);
      if (sample === undefined) {
        this.logger?.warn(
          { stopGraceMs: this.stopGraceMs },
          'Resource probe still pending after trial end; sample dropped'
        );
        break;
      }
      sink.recordSample(sample);
      delivered++;
    }

    this.logger?.debug({ delivered }, 'Resource sampler stopped');
    return delivered;
  }

  /** Resolves `undefined` when the probe is still pending `stopGraceMs` after `signal` aborts. */
  private async takeSample(signal: AbortSignal): Promise<ResourceSample | undefined> {
    const pending = Promise.resolve()
      .then(() => this.probe.sample())
      .catch((error: unknown) => {
        this.logger?.warn({ error: errorMessage(error) }, 'Resource probe failed; recording zero sample');
        return ZERO_RESOURCE_SAMPLE;
      });

    const settled = new AbortController();
    try {
      return await Promise.race([pending, this.graceExpired(signal, settled.signal)]);
    } finally {
      settled.abort();
    }
  }

  /** Resolves once `stopGraceMs` passed after `trial` aborted; never resolves if `cancel` aborts first. */
  private graceExpired(trial: AbortSignal, cancel: AbortSignal): Promise<undefined> {
    return new Promise<undefined>((resolve) => {
      const startGrace = (): void => {
        void delay(this.stopGraceMs, cancel).then((elapsed) => {
          if (elapsed) {
            resolve(undefined);
          }
        });
      };

      if (trial.aborted) {
        startGrace();
        return;
      }
      trial.addEventListener('abort', startGrace, { once: true });
      cancel.addEventListener('abort', () => trial.removeEventListener('abort', startGrace), { once: true });
    });
  }
}
