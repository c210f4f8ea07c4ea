/**
 * Host resource readers
 *
 * Each reader covers one or more ResourceSample dimensions. CPU and memory
 * come from the `os` module; the accelerator reader shells out to
 * `nvidia-smi` through execa.
 */

import * as os from 'os';
import { execa } from 'execa';
import type { ResourceSample } from '../types/trial.js';

export type PartialSample = Partial<ResourceSample>;

export interface ResourceReader {
  /** Reader name used in logs */
  readonly name: string;
  /** Dimensions this reader fills in; zeroed when `read` fails */
  readonly dimensions: ReadonlyArray<keyof ResourceSample>;
  read(): Promise<PartialSample>;
}

interface CpuTimes {
  idle: number;
  total: number;
}

/**
 * Whole-host CPU utilisation (0-100%) from `os.cpus()` tick deltas
 *
 * The first reading covers the time since the reader was constructed.
 */
export class CpuLoadReader implements ResourceReader {
  public readonly name = 'cpu';
  public readonly dimensions = ['cpuLoad'] as const;
  private readonly cpus: () => os.CpuInfo[];
  private last: CpuTimes;

  constructor(cpus: () => os.CpuInfo[] = os.cpus) {
    this.cpus = cpus;
    this.last = this.snapshot();
  }

  public async read(): Promise<PartialSample> {
    const current = this.snapshot();
    const idleDelta = current.idle - this.last.idle;
    const totalDelta = current.total - this.last.total;
    this.last = current;

    const usage = totalDelta <= 0 ? 0 : 100 - (idleDelta / totalDelta) * 100;
    return { cpuLoad: Math.max(0, Math.min(100, usage)) };
  }

  private snapshot(): CpuTimes {
    let idle = 0;
    let total = 0;

    for (const cpu of this.cpus()) {
      const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
      total += user + nice + sys + cpuIdle + irq;
      idle += cpuIdle;
    }

    return { idle, total };
  }
}

/**
 * Used system memory (%)
 */
export class MemoryReader implements ResourceReader {
  public readonly name = 'memory';
  public readonly dimensions = ['memoryUsedPct'] as const;

  constructor(
    private readonly totalmem: () => number = os.totalmem,
    private readonly freemem: () => number = os.freemem
  ) {}

  public async read(): Promise<PartialSample> {
    const total = this.totalmem();
    if (total <= 0) {
      throw new Error('Total memory reported as 0');
    }
    const used = total - this.freemem();
    return { memoryUsedPct: (used / total) * 100 };
  }
}

/**
 * Runs a command and returns its stdout
 */
export type CommandRunner = (command: string, args: readonly string[], timeoutMs: number) => Promise<string>;

const execaRunner: CommandRunner = async (command, args, timeoutMs) => {
  const { stdout } = await execa(command, args, { timeout: timeoutMs });
  return stdout;
};

export const NVIDIA_SMI_ARGS: readonly string[] = [
  '--query-gpu=utilization.gpu,memory.used',
  '--format=csv,noheader,nounits',
];

/**
 * Parse `nvidia-smi --query-gpu=utilization.gpu,memory.used --format=csv,noheader,nounits`
 *
 * One line per GPU. Utilisation is the busiest GPU's; memory is summed.
 *
 * @throws {Error} when a line does not hold exactly two numeric fields
 *
 * @example
 * ```typescript
 * parseNvidiaSmiOutput('45, 1024\n80, 2048\n');
 * // => { acceleratorLoad: 80, acceleratorMemoryUsed: 3072 }
 * ```
 */
export function parseNvidiaSmiOutput(stdout: string): PartialSample {
  const lines = stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (lines.length === 0) {
    throw new Error('nvidia-smi returned no GPU rows');
  }

  let acceleratorLoad = 0;
  let acceleratorMemoryUsed = 0;

  for (const line of lines) {
    const fields = line.split(',').map((field) => field.trim());
    if (fields.length !== 2) {
      throw new Error(`invalid GPU data: "${line}"`);
    }
    const utilization = Number(fields[0]);
    const memoryUsed = Number(fields[1]);
    if (!Number.isFinite(utilization) || !Number.isFinite(memoryUsed)) {
      throw new Error(`invalid GPU data: "${line}"`);
    }

    acceleratorLoad = Math.max(acceleratorLoad, utilization);
    acceleratorMemoryUsed += memoryUsed;
  }

  return { acceleratorLoad, acceleratorMemoryUsed };
}

export interface NvidiaSmiReaderOptions {
  /** @default 'nvidia-smi' */
  command?: string;
  /** @default 5000 */
  timeoutMs?: number;
  runner?: CommandRunner;
}

/**
 * Accelerator utilisation (%) and memory in use (MB) via nvidia-smi
 */
export class NvidiaSmiReader implements ResourceReader {
  public readonly name = 'accelerator';
  public readonly dimensions = ['acceleratorLoad', 'acceleratorMemoryUsed'] as const;
  private readonly command: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(options: NvidiaSmiReaderOptions = {}) {
    this.command = options.command ?? 'nvidia-smi';
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.runner = options.runner ?? execaRunner;
  }

  public async read(): Promise<PartialSample> {
    const stdout = await this.runner(this.command, NVIDIA_SMI_ARGS, this.timeoutMs);
    return parseNvidiaSmiOutput(stdout);
  }
}
