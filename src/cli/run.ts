/**
 * loadbench CLI entry logic
 */

import { loadConfig } from '../config/loader.js';
import { runBenchmark, type BenchmarkDependencies } from '../runtime.js';
import type { TextOutput } from '../reporting/table-reporter.js';
import { ConfigurationError, ValidationError, errorMessage } from '../utils/errors.js';
import { parseCliArgs, USAGE } from './args.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG_ERROR = 2;

export interface CliIo {
  stdout: TextOutput;
  stderr: TextOutput;
}

/**
 * Parse arguments, load configuration and run the benchmark.
 *
 * @returns process exit code
 */
export async function runCli(
  argv: readonly string[],
  io: CliIo = { stdout: process.stdout, stderr: process.stderr },
  dependencies: Omit<BenchmarkDependencies, 'stdout'> = {}
): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      io.stdout.write(USAGE);
      return EXIT_OK;
    }

    const config = await loadConfig(
      args.configPath,
      args.overrides,
      dependencies.logger?.child({ component: 'ConfigLoader' })
    );
    await runBenchmark(config, { ...dependencies, stdout: io.stdout });
    return EXIT_OK;
  } catch (error) {
    if (error instanceof ValidationError) {
      io.stderr.write(`Configuration error: ${error.message}\n`);
      for (const issue of error.errors) {
        io.stderr.write(`  ${issue.path || '(root)'}: ${issue.message}\n`);
      }
      return EXIT_CONFIG_ERROR;
    }
    if (error instanceof ConfigurationError) {
      io.stderr.write(`Configuration error: ${error.message}\n`);
      io.stderr.write('Run with --help for usage.\n');
      return EXIT_CONFIG_ERROR;
    }

    io.stderr.write(`loadbench failed: ${errorMessage(error)}\n`);
    return EXIT_FAILURE;
  }
}
