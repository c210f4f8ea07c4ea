import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { JsonReporter, buildJsonReport } from '../../../src/reporting/json-reporter.js';
import { CompositeSink } from '../../../src/reporting/composite-sink.js';
import type { ResultSink } from '../../../src/types/collaborators.js';
import type { TrialResult } from '../../../src/types/trial.js';
import { makeResult } from '../../helpers/fakes.js';

describe('buildJsonReport', () => {
  it('stamps the report with an ISO timestamp', () => {
    const results = [makeResult()];
    expect(buildJsonReport(results, 0)).toEqual({ generatedAt: '1970-01-01T00:00:00.000Z', results });
  });
});

describe('JsonReporter', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it('writes pretty JSON, creating parent directories', async () => {
    dir = await mkdtemp(join(tmpdir(), 'loadbench-json-'));
    const outputPath = join(dir, 'nested', 'results.json');
    const reporter = new JsonReporter({ outputPath, now: () => Date.UTC(2026, 0, 2, 3, 4, 5) });

    await reporter.consume([makeResult({ config: { workloadId: 'm1', concurrency: 4 }, totalRequests: 12 })]);

    const text = await readFile(outputPath, 'utf-8');
    expect(text.endsWith('}\n')).toBe(true);
    expect(text.split('\n')[1]).toBe('  "generatedAt": "2026-01-02T03:04:05.000Z",');

    const parsed: unknown = JSON.parse(text);
    expect(parsed).toMatchObject({
      results: [{ config: { workloadId: 'm1', concurrency: 4 }, totalRequests: 12 }],
    });
  });
});

describe('CompositeSink', () => {
  it('hands the results to every sink in order', async () => {
    const calls: string[] = [];
    const sink = (name: string): ResultSink => ({
      consume: async (results: readonly TrialResult[]) => {
        calls.push(`${name}:${results.length}`);
      },
    });

    await new CompositeSink([sink('table'), sink('json')]).consume([makeResult(), makeResult()]);

    expect(calls).toEqual(['table:2', 'json:2']);
  });

  it('stops at the first failing sink', async () => {
    const reached: string[] = [];
    const composite = new CompositeSink([
      {
        consume: async () => {
          throw new Error('disk full');
        },
      },
      {
        consume: async () => {
          reached.push('second');
        },
      },
    ]);

    await expect(composite.consume([])).rejects.toThrow('disk full');
    expect(reached).toEqual([]);
  });
});
