/**
 * Benchmark runtime
 *
 * Wires a validated configuration into the shipped collaborators and runs
 * the whole trial matrix.
 */

import type { Logger } from 'pino';
import type { LoadBenchConfig } from './config/schema.js';
import { OllamaRequestIssuer } from './adapters/ollama-issuer.js';
import { SystemResourceProbe } from './monitoring/system-resource-probe.js';
import { TableReporter, type TextOutput } from './reporting/table-reporter.js';
import { JsonReporter } from './reporting/json-reporter.js';
import { CompositeSink } from './reporting/composite-sink.js';
import { TelemetryManager } from './telemetry/otel.js';
import { TrialController } from './core/trial-controller.js';
import { buildTrialMatrix } from './core/trial-matrix.js';
import type { RequestIssuer, ResourceProbe, ResultSink } from './types/collaborators.js';
import type { TrialResult } from './types/trial.js';
import { createLogger } from './utils/logger.js';

export interface BenchmarkDependencies {
  issuer?: RequestIssuer;
  probe?: ResourceProbe;
  sink?: ResultSink;
  logger?: Logger;
  /** Destination of the text table @default process.stdout */
  stdout?: TextOutput;
}

/**
 * Build the result sink for `report.format`
 */
export function createResultSink(config: LoadBenchConfig, stdout: TextOutput, logger?: Logger): ResultSink {
  const table = new TableReporter(stdout);
  const json = new JsonReporter({ outputPath: config.report.outputPath, logger });

  switch (config.report.format) {
    case 'table':
      return table;
    case 'json':
      return json;
    case 'both':
      return new CompositeSink([table, json]);
  }
}

/**
 * Run every trial in the configured matrix and hand the results to the sink.
 *
 * @throws {ConfigurationError} if the matrix is invalid (before any trial starts)
 */
export async function runBenchmark(
  config: LoadBenchConfig,
  dependencies: BenchmarkDependencies = {}
): Promise<TrialResult[]> {
  const logger = dependencies.logger ?? createLogger('loadbench', config.logLevel);
  const matrix = buildTrialMatrix(config.matrix.workloads, config.matrix.concurrency);

  const issuer =
    dependencies.issuer ??
    new OllamaRequestIssuer({
      endpoint: config.target.endpoint,
      logger: logger.child({ component: 'OllamaRequestIssuer' }),
    });

  const probe =
    dependencies.probe ??
    new SystemResourceProbe({
      accelerator: config.accelerator.enabled
        ? { command: config.accelerator.command, timeoutMs: config.accelerator.timeoutMs }
        : false,
      logger: logger.child({ component: 'SystemResourceProbe' }),
    });

  const sink = dependencies.sink ?? createResultSink(config, dependencies.stdout ?? process.stdout, logger);

  let telemetry: TelemetryManager | undefined;
  if (config.telemetry.enabled) {
    telemetry = new TelemetryManager({
      enabled: true,
      serviceName: config.telemetry.serviceName,
      prometheusPort: config.telemetry.prometheusPort,
      logger: logger.child({ component: 'TelemetryManager' }),
    });
    await telemetry.start();
  }

  const controller = new TrialController(
    {
      trialDurationMs: config.timing.trialDurationMs,
      cooldownMs: config.timing.cooldownMs,
      sampleIntervalMs: config.timing.sampleIntervalMs,
      requestTimeoutMs: config.target.requestTimeoutMs,
      prompts: config.prompts,
      inFlightPolicy: config.inFlightPolicy,
    },
    { issuer, probe, logger, telemetry }
  );

  logger.info(
    {
      endpoint: config.target.endpoint,
      trials: matrix.length,
      trialDurationMs: config.timing.trialDurationMs,
      inFlightPolicy: config.inFlightPolicy,
    },
    'Starting trial matrix'
  );

  try {
    const results = await controller.runAll(matrix);
    await sink.consume(results);
    return results;
  } finally {
    await telemetry?.shutdown();
  }
}
