// Core engine
export { TrialController } from './core/trial-controller.js';
export type {
  TrialControllerOptions,
  TrialControllerDependencies,
  TrialControllerEvents,
  TrialTelemetry,
} from './core/trial-controller.js';
export { WorkloadGenerator } from './core/workload-generator.js';
export type { InFlightPolicy, WorkloadGeneratorOptions, WorkloadRunOptions, WorkloadRunSummary } from './core/workload-generator.js';
export { ResourceSampler, DEFAULT_SAMPLE_INTERVAL_MS, type ResourceSamplerOptions } from './core/resource-sampler.js';
export { TrialAggregator, type TrialSink, type TrialTiming, type AggregatorSnapshot } from './core/trial-aggregator.js';
export { buildTrialMatrix, validateTrialMatrix } from './core/trial-matrix.js';

// Collaborators
export { OllamaRequestIssuer, type OllamaRequestIssuerOptions, type FetchLike } from './adapters/ollama-issuer.js';
export { SystemResourceProbe, type SystemResourceProbeOptions } from './monitoring/system-resource-probe.js';
export {
  CpuLoadReader,
  MemoryReader,
  NvidiaSmiReader,
  parseNvidiaSmiOutput,
  type CommandRunner,
  type NvidiaSmiReaderOptions,
  type ResourceReader,
} from './monitoring/resource-readers.js';
export { TableReporter, formatResultsTable, type TextOutput } from './reporting/table-reporter.js';
export { JsonReporter, buildJsonReport, type JsonReport, type JsonReporterOptions } from './reporting/json-reporter.js';
export { CompositeSink } from './reporting/composite-sink.js';

// Telemetry
export { TelemetryManager, METRIC_NAMES, type TelemetryConfig, type LoadBenchMetrics } from './telemetry/otel.js';

// Configuration
export { loadConfig, validateConfig, defaultConfigPath } from './config/loader.js';
export { LoadBenchConfigSchema, type LoadBenchConfig, type ConfigOverrides, type ReportFormat } from './config/schema.js';

// Runtime
export { runBenchmark, createResultSink, type BenchmarkDependencies } from './runtime.js';

// Utilities
export * from './utils/errors.js';
export { createLogger, type Logger, type LogLevel } from './utils/logger.js';

export * from './types/index.js';
