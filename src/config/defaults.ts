/**
 * Default Configuration Constants
 *
 * Built-in values used when neither the YAML file nor the CLI sets a key.
 */

/**
 * Target service
 */
export const TARGET = {
  /** Ollama-compatible generate endpoint */
  ENDPOINT: 'http://localhost:11434/api/generate',

  /** Per-request timeout (ms) */
  REQUEST_TIMEOUT_MS: 60_000, // 60 seconds
} as const;

/**
 * Trial matrix
 */
export const MATRIX = {
  WORKLOADS: ['deepseek-r1:1.5b', 'deepseek-r1:7b', 'deepseek-r1:8b', 'deepseek-r1:14b', 'deepseek-r1:32b'],

  CONCURRENCY: [1, 2, 3, 4, 5, 6],
} as const;

/**
 * Prompt variants, picked uniformly at random per request
 */
export const PROMPTS: readonly string[] = [
  '你好',
  '三角函数是什么',
  '用HTML写一个简单的webgl 三角型 3D 程序',
];

/**
 * Trial timing
 */
export const TIMING = {
  /** Wall-clock length of every trial (ms) */
  TRIAL_DURATION_MS: 30_000, // 30 seconds

  /** Idle time between trials (ms) */
  COOLDOWN_MS: 10_000, // 10 seconds

  /** Resource sampling interval (ms) */
  SAMPLE_INTERVAL_MS: 1_000,
} as const;

/**
 * Accelerator reader
 */
export const ACCELERATOR = {
  COMMAND: 'nvidia-smi',

  /** nvidia-smi call timeout (ms) */
  TIMEOUT_MS: 5_000,
} as const;

export const REPORT = {
  FORMAT: 'table',
  OUTPUT_PATH: 'loadbench-results.json',
} as const;

export const TELEMETRY = {
  SERVICE_NAME: 'loadbench',
  PROMETHEUS_PORT: 9464,
} as const;
