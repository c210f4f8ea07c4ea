/**
 * Configuration schema
 *
 * Every key has a built-in default, so an empty document is a valid config.
 */

import { z } from 'zod';
import { ACCELERATOR, MATRIX, PROMPTS, REPORT, TARGET, TELEMETRY, TIMING } from './defaults.js';

// ============================================================================
// Sections
// ============================================================================

export const TargetConfigSchema = z
  .object({
    /** Generate endpoint of the service under test */
    endpoint: z.string().url().default(TARGET.ENDPOINT),
    /** Per-request timeout (ms) */
    requestTimeoutMs: z.number().int().positive().default(TARGET.REQUEST_TIMEOUT_MS),
  })
  .strict();

export const MatrixConfigSchema = z
  .object({
    /** Workload (model) identifiers, tested in order */
    workloads: z
      .array(z.string().trim().min(1, 'workload id must not be blank'))
      .min(1, 'at least one workload is required')
      .default(() => [...MATRIX.WORKLOADS]),
    /** Concurrency levels, tested in order for every workload */
    concurrency: z
      .array(z.number().int().positive())
      .min(1, 'at least one concurrency level is required')
      .default(() => [...MATRIX.CONCURRENCY]),
  })
  .strict();

export const TimingConfigSchema = z
  .object({
    trialDurationMs: z.number().int().positive().default(TIMING.TRIAL_DURATION_MS),
    cooldownMs: z.number().int().nonnegative().default(TIMING.COOLDOWN_MS),
    sampleIntervalMs: z.number().int().positive().default(TIMING.SAMPLE_INTERVAL_MS),
  })
  .strict();

export const AcceleratorConfigSchema = z
  .object({
    /** Read GPU utilisation through nvidia-smi; when false the GPU columns stay 0 */
    enabled: z.boolean().default(true),
    command: z.string().min(1).default(ACCELERATOR.COMMAND),
    timeoutMs: z.number().int().positive().default(ACCELERATOR.TIMEOUT_MS),
  })
  .strict();

export const ReportConfigSchema = z
  .object({
    format: z.enum(['table', 'json', 'both']).default(REPORT.FORMAT),
    /** JSON report path (json / both) */
    outputPath: z.string().min(1).default(REPORT.OUTPUT_PATH),
  })
  .strict();

export const TelemetryConfigSchema = z
  .object({
    enabled: z.boolean().default(false),
    serviceName: z.string().min(1).default(TELEMETRY.SERVICE_NAME),
    prometheusPort: z.number().int().min(1).max(65535).default(TELEMETRY.PROMETHEUS_PORT),
  })
  .strict();

// ============================================================================
// Root
// ============================================================================

export const LoadBenchConfigSchema = z
  .object({
    target: TargetConfigSchema.default({}),
    matrix: MatrixConfigSchema.default({}),
    prompts: z
      .array(z.string().min(1, 'prompt must not be empty'))
      .min(1, 'at least one prompt is required')
      .default(() => [...PROMPTS]),
    timing: TimingConfigSchema.default({}),
    /** What happens to requests still in flight when a trial ends */
    inFlightPolicy: z.enum(['abort', 'drain']).default('abort'),
    accelerator: AcceleratorConfigSchema.default({}),
    report: ReportConfigSchema.default({}),
    telemetry: TelemetryConfigSchema.default({}),
    /** Falls back to LOADBENCH_LOG_LEVEL, then 'info' */
    logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  })
  .strict();

export type LoadBenchConfig = z.infer<typeof LoadBenchConfigSchema>;
export type ReportFormat = LoadBenchConfig['report']['format'];

/**
 * CLI-style overrides applied on top of the file
 */
export type ConfigOverrides = {
  [K in keyof LoadBenchConfig]?: LoadBenchConfig[K] extends readonly unknown[]
    ? LoadBenchConfig[K]
    : LoadBenchConfig[K] extends object
      ? Partial<LoadBenchConfig[K]>
      : LoadBenchConfig[K];
};
