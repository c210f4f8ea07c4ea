/**
 * System Resource Probe
 *
 * Combines the host readers into one ResourceSample. A reader that fails
 * contributes zeros for its dimensions; the other dimensions are unaffected.
 */

import type { Logger } from 'pino';
import type { ResourceProbe } from '../types/collaborators.js';
import type { ResourceSample } from '../types/trial.js';
import { errorMessage } from '../utils/errors.js';
import { nonNegative } from '../utils/math-helpers.js';
import {
  CpuLoadReader,
  MemoryReader,
  NvidiaSmiReader,
  type NvidiaSmiReaderOptions,
  type PartialSample,
  type ResourceReader,
} from './resource-readers.js';

export interface SystemResourceProbeOptions {
  /** Override the reader set (tests, custom hosts) */
  readers?: readonly ResourceReader[];
  /** Include the nvidia-smi reader when using the default reader set @default true */
  accelerator?: boolean | NvidiaSmiReaderOptions;
  logger?: Logger;
}

type MutableSample = { -readonly [K in keyof ResourceSample]: number };

export class SystemResourceProbe implements ResourceProbe {
  private readonly readers: readonly ResourceReader[];
  private readonly logger?: Logger;
  private readonly failing = new Set<string>();

  constructor(options: SystemResourceProbeOptions = {}) {
    this.logger = options.logger;
    this.readers = options.readers ?? SystemResourceProbe.defaultReaders(options.accelerator ?? true);
  }

  public static defaultReaders(accelerator: boolean | NvidiaSmiReaderOptions): ResourceReader[] {
    const readers: ResourceReader[] = [new CpuLoadReader(), new MemoryReader()];
    if (accelerator !== false) {
      readers.push(new NvidiaSmiReader(accelerator === true ? {} : accelerator));
    }
    return readers;
  }

  public async sample(): Promise<ResourceSample> {
    const sample: MutableSample = {
      cpuLoad: 0,
      memoryUsedPct: 0,
      acceleratorLoad: 0,
      acceleratorMemoryUsed: 0,
    };

    const readings = await Promise.allSettled(this.readers.map((reader) => reader.read()));

    readings.forEach((reading, index) => {
      const reader = this.readers[index];
      if (!reader) {
        return;
      }

      if (reading.status === 'fulfilled') {
        this.recovered(reader);
        this.merge(sample, reader, reading.value);
      } else {
        this.degraded(reader, reading.reason);
      }
    });

    return sample;
  }

  private merge(sample: MutableSample, reader: ResourceReader, reading: PartialSample): void {
    for (const dimension of reader.dimensions) {
      const value = reading[dimension];
      if (value !== undefined) {
        sample[dimension] = nonNegative(value);
      }
    }
  }

  private degraded(reader: ResourceReader, reason: unknown): void {
    const context = { reader: reader.name, dimensions: reader.dimensions, error: errorMessage(reason) };

    if (this.failing.has(reader.name)) {
      this.logger?.debug(context, 'Resource reader still failing; reporting 0');
      return;
    }

    this.failing.add(reader.name);
    this.logger?.warn(context, 'Resource reader failed; reporting 0 for its dimensions');
  }

  private recovered(reader: ResourceReader): void {
    if (this.failing.delete(reader.name)) {
      this.logger?.info({ reader: reader.name }, 'Resource reader recovered');
    }
  }
}
