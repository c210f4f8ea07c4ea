/**
 * Command-line argument parsing for the loadbench CLI
 */

import type { ConfigOverrides, LoadBenchConfig } from '../config/schema.js';
import { ConfigurationError } from '../utils/errors.js';

export interface CliArgs {
  help: boolean;
  configPath?: string;
  overrides: ConfigOverrides;
}

const REPORT_FORMATS = ['table', 'json', 'both'] as const;
const IN_FLIGHT_POLICIES = ['abort', 'drain'] as const;
const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

function oneOf<T extends string>(flag: string, allowed: readonly T[], raw: string): T {
  const match = allowed.find((value) => value === raw);
  if (match === undefined) {
    throw new ConfigurationError(`--${flag} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return match;
}

function integer(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value)) {
    throw new ConfigurationError(`--${flag} expects an integer, got "${raw}"`);
  }
  return value;
}

function list(raw: string): string[] {
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parse CLI arguments (without the node binary and script path)
 *
 * Flags take their value from the next argument or from `--flag=value`.
 *
 * @throws {ConfigurationError} on unknown flags, missing values or malformed numbers
 *
 * @example
 * ```typescript
 * parseCliArgs(['--models', 'a,b', '--duration=5000']);
 * // => { help: false, overrides: { matrix: { workloads: ['a', 'b'] }, timing: { trialDurationMs: 5000 } } }
 * ```
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const result: CliArgs = { help: false, overrides: {} };
  const target: Partial<LoadBenchConfig['target']> = {};
  const matrix: Partial<LoadBenchConfig['matrix']> = {};
  const timing: Partial<LoadBenchConfig['timing']> = {};
  const report: Partial<LoadBenchConfig['report']> = {};
  const accelerator: Partial<LoadBenchConfig['accelerator']> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (!arg.startsWith('--')) {
      throw new ConfigurationError(`Unexpected argument "${arg}"`);
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    const value = (): string => {
      if (inline !== undefined) {
        return inline;
      }
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new ConfigurationError(`--${flag} requires a value`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case 'help':
        result.help = true;
        break;
      case 'config':
        result.configPath = value();
        break;
      case 'models':
        matrix.workloads = list(value());
        break;
      case 'concurrency':
        matrix.concurrency = list(value()).map((item) => integer(flag, item));
        break;
      case 'duration':
        timing.trialDurationMs = integer(flag, value());
        break;
      case 'cooldown':
        timing.cooldownMs = integer(flag, value());
        break;
      case 'interval':
        timing.sampleIntervalMs = integer(flag, value());
        break;
      case 'timeout':
        target.requestTimeoutMs = integer(flag, value());
        break;
      case 'endpoint':
        target.endpoint = value();
        break;
      case 'format':
        report.format = oneOf(flag, REPORT_FORMATS, value());
        break;
      case 'output':
        report.outputPath = value();
        break;
      case 'in-flight':
        result.overrides.inFlightPolicy = oneOf(flag, IN_FLIGHT_POLICIES, value());
        break;
      case 'no-accelerator':
        accelerator.enabled = false;
        break;
      case 'log-level':
        result.overrides.logLevel = oneOf(flag, LOG_LEVELS, value());
        break;
      default:
        throw new ConfigurationError(`Unknown option --${flag}`);
    }
  }

  if (Object.keys(target).length > 0) result.overrides.target = target;
  if (Object.keys(matrix).length > 0) result.overrides.matrix = matrix;
  if (Object.keys(timing).length > 0) result.overrides.timing = timing;
  if (Object.keys(report).length > 0) result.overrides.report = report;
  if (Object.keys(accelerator).length > 0) result.overrides.accelerator = accelerator;

  return result;
}

export const USAGE = `
loadbench - measure latency, success rate and host load of a generate endpoint

USAGE:
  loadbench [options]

OPTIONS:
  --config <path>              YAML configuration (default: config/loadbench.yaml)
  --models <a,b,...>           Workloads (model ids) to test
  --concurrency <1,2,...>      Concurrency levels to test
  --duration <ms>              Trial duration
  --cooldown <ms>              Pause between trials
  --interval <ms>              Resource sampling interval
  --timeout <ms>               Per-request timeout
  --endpoint <url>             Generate endpoint
  --format <table|json|both>   Report format
  --output <path>              JSON report path
  --in-flight <abort|drain>    Requests still running when a trial ends
  --no-accelerator             Skip nvidia-smi; GPU columns read 0
  --log-level <level>          trace, debug, info, warn, error, fatal, silent
  --help                       Show this help message

EXIT CODES:
  0  all trials ran
  2  configuration error
  1  any other fatal error

ENVIRONMENT VARIABLES:
  LOADBENCH_LOG_LEVEL          Log level when neither the flag nor the config sets one
`;
