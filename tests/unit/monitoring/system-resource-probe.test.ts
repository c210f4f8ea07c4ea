import { describe, it, expect } from 'vitest';
import { pino, type Logger } from 'pino';
import { SystemResourceProbe } from '../../../src/monitoring/system-resource-probe.js';
import type { PartialSample, ResourceReader } from '../../../src/monitoring/resource-readers.js';
import type { ResourceSample } from '../../../src/types/trial.js';

class StubReader implements ResourceReader {
  public failing = false;

  constructor(
    public readonly name: string,
    public readonly dimensions: ReadonlyArray<keyof ResourceSample>,
    private readonly reading: PartialSample
  ) {}

  public async read(): Promise<PartialSample> {
    if (this.failing) {
      throw new Error(`${this.name} unavailable`);
    }
    return this.reading;
  }
}

function captureLogger(): { logger: Logger; lines: Array<{ level: number; msg: string }> } {
  const lines: Array<{ level: number; msg: string }> = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(chunk: string) {
        const parsed: unknown = JSON.parse(chunk);
        if (typeof parsed === 'object' && parsed !== null && 'level' in parsed && 'msg' in parsed) {
          lines.push({ level: Number(parsed.level), msg: String(parsed.msg) });
        }
      },
    }
  );
  return { logger, lines };
}

describe('SystemResourceProbe', () => {
  it('combines every reader into one sample', async () => {
    const probe = new SystemResourceProbe({
      readers: [
        new StubReader('cpu', ['cpuLoad'], { cpuLoad: 42 }),
        new StubReader('memory', ['memoryUsedPct'], { memoryUsedPct: 61.5 }),
        new StubReader('accelerator', ['acceleratorLoad', 'acceleratorMemoryUsed'], {
          acceleratorLoad: 88,
          acceleratorMemoryUsed: 7000,
        }),
      ],
    });

    expect(await probe.sample()).toEqual({
      cpuLoad: 42,
      memoryUsedPct: 61.5,
      acceleratorLoad: 88,
      acceleratorMemoryUsed: 7000,
    });
  });

  it('reports 0 for the dimensions of a failing reader only', async () => {
    const accelerator = new StubReader('accelerator', ['acceleratorLoad', 'acceleratorMemoryUsed'], {
      acceleratorLoad: 88,
      acceleratorMemoryUsed: 7000,
    });
    accelerator.failing = true;
    const probe = new SystemResourceProbe({
      readers: [new StubReader('cpu', ['cpuLoad'], { cpuLoad: 42 }), accelerator],
    });

    expect(await probe.sample()).toEqual({
      cpuLoad: 42,
      memoryUsedPct: 0,
      acceleratorLoad: 0,
      acceleratorMemoryUsed: 0,
    });
  });

  it('ignores values outside a reader\'s own dimensions', async () => {
    const probe = new SystemResourceProbe({
      readers: [new StubReader('cpu', ['cpuLoad'], { cpuLoad: 10, memoryUsedPct: 99 })],
    });

    expect((await probe.sample()).memoryUsedPct).toBe(0);
  });

  it('warns on the first failure, logs repeats at debug and notes recovery', async () => {
    const { logger, lines } = captureLogger();
    const accelerator = new StubReader('accelerator', ['acceleratorLoad'], { acceleratorLoad: 5 });
    accelerator.failing = true;
    const probe = new SystemResourceProbe({ readers: [accelerator], logger });

    await probe.sample();
    await probe.sample();
    accelerator.failing = false;
    await probe.sample();

    expect(lines).toEqual([
      { level: 40, msg: 'Resource reader failed; reporting 0 for its dimensions' },
      { level: 20, msg: 'Resource reader still failing; reporting 0' },
      { level: 30, msg: 'Resource reader recovered' },
    ]);
  });

  it('leaves out the accelerator reader when disabled', async () => {
    const probe = new SystemResourceProbe({ accelerator: false });
    const reading = await probe.sample();

    expect(reading.acceleratorLoad).toBe(0);
    expect(reading.acceleratorMemoryUsed).toBe(0);
    expect(reading.memoryUsedPct).toBeGreaterThan(0);
  });
});
