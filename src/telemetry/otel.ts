/**
 * OpenTelemetry infrastructure for loadbench.
 *
 * Exposes per-request counters and latency, the latest resource sample as
 * gauges, and completed trial counts through a Prometheus exporter.
 *
 * @module telemetry/otel
 */

import type { Attributes, Counter, Histogram, Meter } from '@opentelemetry/api';
import { MeterProvider, type ResourceMetrics } from '@opentelemetry/sdk-metrics';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import type { Logger } from 'pino';
import type { TrialTelemetry } from '../core/trial-controller.js';
import {
  ZERO_RESOURCE_SAMPLE,
  type RequestOutcome,
  type ResourceSample,
  type TrialConfig,
  type TrialResult,
} from '../types/trial.js';
import { LoadBenchError } from '../utils/errors.js';

/**
 * Configuration options for OpenTelemetry metrics.
 */
export interface TelemetryConfig {
  /**
   * Enable metrics collection (default: false).
   */
  enabled: boolean;
  /**
   * Service name for metrics (default: 'loadbench').
   */
  serviceName?: string;
  /**
   * Prometheus exporter port (default: 9464).
   */
  prometheusPort?: number;
  /**
   * Keep the scrape endpoint closed; metrics are still collectable in-process.
   */
  preventServerStart?: boolean;
  logger?: Logger;
}

interface NormalizedTelemetryConfig {
  enabled: boolean;
  serviceName: string;
  prometheusPort: number;
  preventServerStart: boolean;
  logger: Logger | undefined;
}

export interface LoadBenchMetrics {
  requestsTotal: Counter;
  requestFailures: Counter;
  requestDuration: Histogram;
  trialsTotal: Counter;
}

export const METRIC_NAMES = {
  REQUESTS_TOTAL: 'loadbench_requests_total',
  REQUEST_FAILURES: 'loadbench_request_failures_total',
  REQUEST_DURATION: 'loadbench_request_duration_ms',
  TRIALS_TOTAL: 'loadbench_trials_total',
  CPU_LOAD: 'loadbench_cpu_load_percent',
  MEMORY_USED: 'loadbench_memory_used_percent',
  ACCELERATOR_LOAD: 'loadbench_accelerator_load_percent',
  ACCELERATOR_MEMORY: 'loadbench_accelerator_memory_used_mb',
} as const;

/**
 * OpenTelemetry telemetry manager for loadbench.
 *
 * @example
 * ```typescript
 * const telemetry = new TelemetryManager({ enabled: true, prometheusPort: 9464 });
 * await telemetry.start();
 * const controller = new TrialController(options, { issuer, probe, telemetry });
 * await controller.runAll(matrix);
 * await telemetry.shutdown();
 * ```
 */
export class TelemetryManager implements TrialTelemetry {
  private readonly config: NormalizedTelemetryConfig;
  private meterProvider: MeterProvider | null = null;
  private prometheusExporter: PrometheusExporter | null = null;
  private _metrics: LoadBenchMetrics | null = null;
  private lastSample: ResourceSample = ZERO_RESOURCE_SAMPLE;
  private started = false;

  constructor(config: TelemetryConfig) {
    this.config = {
      enabled: config.enabled,
      serviceName: config.serviceName || 'loadbench',
      prometheusPort: config.prometheusPort ?? 9464,
      preventServerStart: config.preventServerStart ?? false,
      logger: config.logger,
    };
  }

  /**
   * Get the initialized metrics. Throws if not started.
   */
  public get metrics(): LoadBenchMetrics {
    if (!this._metrics) {
      throw new LoadBenchError('TelemetryManager not started. Call start() first.', 'TELEMETRY_NOT_STARTED');
    }
    return this._metrics;
  }

  /**
   * Create the Prometheus exporter and register all metrics.
   *
   * @throws {LoadBenchError} if telemetry is disabled
   */
  public async start(): Promise<void> {
    if (!this.config.enabled) {
      throw new LoadBenchError('Telemetry is disabled. Set telemetry.enabled: true in config.', 'TELEMETRY_DISABLED');
    }

    if (this.started) {
      this.config.logger?.warn('TelemetryManager already started');
      return;
    }

    this.prometheusExporter = new PrometheusExporter({
      port: this.config.prometheusPort,
      preventServerStart: this.config.preventServerStart,
    });
    this.meterProvider = new MeterProvider({ readers: [this.prometheusExporter] });

    const meter = this.meterProvider.getMeter(this.config.serviceName);
    this._metrics = this.createMetrics(meter);
    this.registerResourceGauges(meter);
    this.started = true;

    this.config.logger?.info(
      {
        serviceName: this.config.serviceName,
        endpoint: this.config.preventServerStart
          ? undefined
          : `http://localhost:${this.config.prometheusPort}/metrics`,
      },
      'OpenTelemetry metrics started'
    );
  }

  /**
   * Shutdown the meter provider and close the scrape endpoint.
   */
  public async shutdown(): Promise<void> {
    if (!this.started) {
      return;
    }

    await this.meterProvider?.shutdown();

    this.started = false;
    this._metrics = null;
    this.meterProvider = null;
    this.prometheusExporter = null;

    this.config.logger?.info('OpenTelemetry metrics shut down');
  }

  public isStarted(): boolean {
    return this.started;
  }

  /**
   * Collect the current metric values in-process.
   */
  public async collect(): Promise<ResourceMetrics | undefined> {
    if (!this.prometheusExporter) {
      return undefined;
    }
    const { resourceMetrics } = await this.prometheusExporter.collect();
    return resourceMetrics;
  }

  public recordOutcome(config: TrialConfig, outcome: RequestOutcome): void {
    if (!this._metrics) {
      return;
    }

    const attributes: Attributes = {
      workload: config.workloadId,
      concurrency: config.concurrency,
      outcome: outcome.succeeded ? 'success' : 'failure',
    };

    this._metrics.requestsTotal.add(1, attributes);
    this._metrics.requestDuration.record(outcome.elapsedMs, attributes);
    if (outcome.error) {
      this._metrics.requestFailures.add(1, { workload: config.workloadId, kind: outcome.error.kind });
    }
  }

  public recordSample(sample: ResourceSample): void {
    this.lastSample = sample;
  }

  public recordTrial(result: TrialResult): void {
    this._metrics?.trialsTotal.add(1, {
      workload: result.config.workloadId,
      faulted: result.fault !== undefined,
    });
  }

  private createMetrics(meter: Meter): LoadBenchMetrics {
    return {
      requestsTotal: meter.createCounter(METRIC_NAMES.REQUESTS_TOTAL, {
        description: 'Requests issued against the target service',
        unit: '1',
      }),
      requestFailures: meter.createCounter(METRIC_NAMES.REQUEST_FAILURES, {
        description: 'Failed requests by failure kind',
        unit: '1',
      }),
      requestDuration: meter.createHistogram(METRIC_NAMES.REQUEST_DURATION, {
        description: 'Request latency',
        unit: 'ms',
      }),
      trialsTotal: meter.createCounter(METRIC_NAMES.TRIALS_TOTAL, {
        description: 'Completed trials',
        unit: '1',
      }),
    };
  }

  private registerResourceGauges(meter: Meter): void {
    const gauges: Array<[string, string, keyof ResourceSample]> = [
      [METRIC_NAMES.CPU_LOAD, 'Host CPU utilisation', 'cpuLoad'],
      [METRIC_NAMES.MEMORY_USED, 'Used system memory', 'memoryUsedPct'],
      [METRIC_NAMES.ACCELERATOR_LOAD, 'Accelerator utilisation', 'acceleratorLoad'],
      [METRIC_NAMES.ACCELERATOR_MEMORY, 'Accelerator memory in use', 'acceleratorMemoryUsed'],
    ];

    for (const [name, description, dimension] of gauges) {
      meter
        .createObservableGauge(name, { description })
        .addCallback((result) => result.observe(this.lastSample[dimension]));
    }
  }
}
