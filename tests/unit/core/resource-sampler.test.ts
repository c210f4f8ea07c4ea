import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ResourceSampler, DEFAULT_SAMPLE_INTERVAL_MS } from '../../../src/core/resource-sampler.js';
import { ConfigurationError } from '../../../src/utils/errors.js';
import { ZERO_RESOURCE_SAMPLE, type ResourceSample } from '../../../src/types/trial.js';
import type { ResourceProbe } from '../../../src/types/collaborators.js';
import { FakeProbe, RecordingSink, sample } from '../../helpers/fakes.js';

function stopAfter(ms: number): AbortSignal {
  const trial = new AbortController();
  setTimeout(() => trial.abort(), ms);
  return trial.signal;
}

describe('ResourceSampler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('defaults to a one second interval', () => {
    const sampler = new ResourceSampler({ probe: new FakeProbe() });
    expect(sampler.getIntervalMs()).toBe(DEFAULT_SAMPLE_INTERVAL_MS);
    expect(DEFAULT_SAMPLE_INTERVAL_MS).toBe(1000);
  });

  it('should reject a non-positive interval', () => {
    expect(() => new ResourceSampler({ probe: new FakeProbe(), intervalMs: 0 })).toThrow(ConfigurationError);
  });

  it('should reject a negative stop grace', () => {
    expect(() => new ResourceSampler({ probe: new FakeProbe(), stopGraceMs: -1 })).toThrow(ConfigurationError);
  });

  it('takes no sample before the first interval elapses', async () => {
    const probe = new FakeProbe();
    const sink = new RecordingSink();
    const signal = stopAfter(999);

    const run = new ResourceSampler({ probe, intervalMs: 1000 }).run(signal, sink);
    await vi.advanceTimersByTimeAsync(999);

    expect(await run).toBe(0);
    expect(probe.calls).toBe(0);
  });

  it('samples once per interval until the trial ends', async () => {
    const probe = new FakeProbe([sample(10, 20, 0, 0), sample(30, 25, 5, 512), sample(15, 22, 1, 256)]);
    const sink = new RecordingSink();
    const signal = stopAfter(2000);

    const run = new ResourceSampler({ probe, intervalMs: 500 }).run(signal, sink);
    await vi.advanceTimersByTimeAsync(2000);

    expect(await run).toBe(3);
    expect(sink.samples).toEqual([sample(10, 20, 0, 0), sample(30, 25, 5, 512), sample(15, 22, 1, 256)]);
  });

  it('loses the tick that coincides with trial end', async () => {
    const sink = new RecordingSink();
    const signal = stopAfter(2000);

    const run = new ResourceSampler({ probe: new FakeProbe(), intervalMs: 1000 }).run(signal, sink);
    await vi.advanceTimersByTimeAsync(2000);

    expect(await run).toBe(1);
  });

  it('delivers a sample whose probe call was in flight at trial end', async () => {
    const probe = new FakeProbe([sample(40, 50, 60, 70)], 300);
    const sink = new RecordingSink();
    const signal = stopAfter(1100);

    const run = new ResourceSampler({ probe, intervalMs: 1000 }).run(signal, sink);
    await vi.advanceTimersByTimeAsync(1300);

    expect(await run).toBe(1);
    expect(sink.samples).toEqual([sample(40, 50, 60, 70)]);
  });

  it('records a zero sample when the probe rejects', async () => {
    const probe = new FakeProbe();
    vi.spyOn(probe, 'sample').mockRejectedValue(new Error('probe offline'));
    const sink = new RecordingSink();
    const signal = stopAfter(1500);

    const run = new ResourceSampler({ probe, intervalMs: 1000 }).run(signal, sink);
    await vi.advanceTimersByTimeAsync(1500);

    expect(await run).toBe(1);
    expect(sink.samples).toEqual([ZERO_RESOURCE_SAMPLE]);
  });

  it('keeps a fixed rate when the probe is slow', async () => {
    const probe = new FakeProbe([sample(1, 1, 1, 1)], 400);
    const sink = new RecordingSink();
    const signal = stopAfter(3500);

    const run = new ResourceSampler({ probe, intervalMs: 1000 }).run(signal, sink);
    await vi.advanceTimersByTimeAsync(3500);

    // Ticks at 1000, 2000 and 3000 regardless of the 400 ms probe latency
    expect(await run).toBe(3);
  });

  it('stops after the grace period when a probe call never settles', async () => {
    const probe: ResourceProbe = { sample: () => new Promise<ResourceSample>(() => undefined) };
    const sink = new RecordingSink();
    const signal = stopAfter(1500);

    const run = new ResourceSampler({ probe, intervalMs: 1000, stopGraceMs: 500 }).run(signal, sink);
    await vi.advanceTimersByTimeAsync(2000);

    expect(await run).toBe(0);
    expect(sink.samples).toEqual([]);
  });
});
