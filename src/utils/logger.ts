/**
 * Structured logging for loadbench
 *
 * JSON lines via pino, written to stderr so stdout stays free for the report.
 * Log level can be controlled via the LOADBENCH_LOG_LEVEL environment variable.
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

type LogContext = Record<string, unknown>;

function isLevel(value: string | undefined): value is LevelWithSilent {
  return value !== undefined && (LEVELS as readonly string[]).includes(value);
}

/**
 * Resolve the effective log level: explicit argument, then LOADBENCH_LOG_LEVEL, then 'info'
 */
export function resolveLogLevel(level?: string): LevelWithSilent {
  if (isLevel(level)) {
    return level;
  }
  const envLevel = process.env.LOADBENCH_LOG_LEVEL?.toLowerCase();
  return isLevel(envLevel) ? envLevel : 'info';
}

/**
 * Create a component logger
 *
 * @example
 * ```typescript
 * const logger = createLogger('TrialController', 'debug');
 * logger.info({ workloadId: 'llama3:8b' }, 'Trial started');
 * const child = logger.child({ component: 'TrialController:Sampler' });
 * ```
 */
export function createLogger(component: string, level?: string): Logger {
  return pino({ name: 'loadbench', level: resolveLogLevel(level), base: { component } }, pino.destination(2));
}

/**
 * Lazy log helper that only builds the context object when the level is enabled
 *
 * Per-request logging sits on the hot path of every worker; with debug disabled
 * the context builder is never invoked.
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ workerIndex, elapsedMs }), 'Request completed');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: () => LogContext,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
