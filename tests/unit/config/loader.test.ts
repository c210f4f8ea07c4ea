import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { pino, type Logger } from 'pino';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  deepMerge,
  defaultConfigPath,
  interpolateEnvVars,
  loadConfig,
  validateConfig,
} from '../../../src/config/loader.js';
import { ConfigurationError, ValidationError } from '../../../src/utils/errors.js';

function capturingLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = pino({ level: 'debug' }, { write: (line: string) => void lines.push(line) });
  return { logger, lines };
}

describe('Config Loader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'loadbench-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
    delete process.env.LOADBENCH_TEST_ENDPOINT;
  });

  async function writeConfig(content: string): Promise<string> {
    const path = join(dir, 'loadbench.yaml');
    await writeFile(path, content, 'utf-8');
    return path;
  }

  describe('validateConfig', () => {
    it('fills every key from the built-in defaults', () => {
      const config = validateConfig({});

      expect(config.target).toEqual({ endpoint: 'http://localhost:11434/api/generate', requestTimeoutMs: 60000 });
      expect(config.matrix.workloads).toEqual([
        'deepseek-r1:1.5b',
        'deepseek-r1:7b',
        'deepseek-r1:8b',
        'deepseek-r1:14b',
        'deepseek-r1:32b',
      ]);
      expect(config.matrix.concurrency).toEqual([1, 2, 3, 4, 5, 6]);
      expect(config.prompts).toHaveLength(3);
      expect(config.timing).toEqual({ trialDurationMs: 30000, cooldownMs: 10000, sampleIntervalMs: 1000 });
      expect(config.inFlightPolicy).toBe('abort');
      expect(config.accelerator).toEqual({ enabled: true, command: 'nvidia-smi', timeoutMs: 5000 });
      expect(config.report).toEqual({ format: 'table', outputPath: 'loadbench-results.json' });
      expect(config.telemetry).toEqual({ enabled: false, serviceName: 'loadbench', prometheusPort: 9464 });
      expect(config.logLevel).toBeUndefined();
    });

    it('should list every invalid path', () => {
      try {
        validateConfig({ matrix: { concurrency: [2, 0] }, prompts: [] });
        expect.unreachable('validation should fail');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        const paths = error instanceof ValidationError ? error.errors.map((issue) => issue.path) : [];
        expect(paths).toEqual(['matrix.concurrency.1', 'prompts']);
      }
    });

    it('should reject unknown top-level keys', () => {
      expect(() => validateConfig({ modles: ['a'] })).toThrow(ValidationError);
    });

    it('should reject unknown keys inside a section', () => {
      try {
        validateConfig({ timing: { trialDuration: 5000 } });
        expect.unreachable('validation should fail');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        const issues = error instanceof ValidationError ? error.errors : [];
        expect(issues).toHaveLength(1);
        expect(issues[0]?.path).toBe('timing');
        expect(issues[0]?.message).toContain('trialDuration');
      }
    });
  });

  describe('loadConfig', () => {
    it('merges a partial file over the defaults', async () => {
      const path = await writeConfig(`
matrix:
  workloads: [model-a, model-b]
timing:
  trialDurationMs: 5000
inFlightPolicy: drain
`);

      const config = await loadConfig(path);

      expect(config.matrix.workloads).toEqual(['model-a', 'model-b']);
      expect(config.matrix.concurrency).toEqual([1, 2, 3, 4, 5, 6]);
      expect(config.timing).toEqual({ trialDurationMs: 5000, cooldownMs: 10000, sampleIntervalMs: 1000 });
      expect(config.inFlightPolicy).toBe('drain');
    });

    it('interpolates environment variables', async () => {
      process.env.LOADBENCH_TEST_ENDPOINT = 'http://gpu-box.test:11434/api/generate';
      const path = await writeConfig('target:\n  endpoint: ${LOADBENCH_TEST_ENDPOINT}\n');

      const config = await loadConfig(path);

      expect(config.target.endpoint).toBe('http://gpu-box.test:11434/api/generate');
    });

    it('applies overrides on top of the file', async () => {
      const path = await writeConfig('timing:\n  trialDurationMs: 5000\n  cooldownMs: 100\nmatrix:\n  concurrency: [1, 2]\n');

      const config = await loadConfig(path, { timing: { trialDurationMs: 1000 }, matrix: { concurrency: [8] } });

      expect(config.timing.trialDurationMs).toBe(1000);
      expect(config.timing.cooldownMs).toBe(100);
      expect(config.matrix.concurrency).toEqual([8]);
    });

    it('treats an empty file as all defaults', async () => {
      const path = await writeConfig('');
      const config = await loadConfig(path);

      expect(config.timing.trialDurationMs).toBe(30000);
    });

    it('raises ValidationError for invalid values', async () => {
      const path = await writeConfig('timing:\n  sampleIntervalMs: -1\n');

      await expect(loadConfig(path)).rejects.toBeInstanceOf(ValidationError);
    });

    it('raises ConfigurationError for a missing file', async () => {
      const missing = join(dir, 'missing.yaml');

      await expect(loadConfig(missing)).rejects.toThrow(`Failed to load configuration from ${missing}`);
    });

    it('raises ConfigurationError when the document is not a mapping', async () => {
      const path = await writeConfig('- just\n- a list\n');

      await expect(loadConfig(path)).rejects.toThrow(ConfigurationError);
      await expect(loadConfig(path)).rejects.not.toBeInstanceOf(ValidationError);
    });

    it('raises ConfigurationError for malformed YAML', async () => {
      const path = await writeConfig('timing: [unclosed\n');

      await expect(loadConfig(path)).rejects.toThrow(`Invalid YAML in ${path}`);
    });

    it('logs missing environment variables through the given logger', async () => {
      const { logger, lines } = capturingLogger();
      const path = await writeConfig('target:\n  endpoint: http://localhost:11434${LOADBENCH_TEST_MISSING}/api/generate\n');

      const config = await loadConfig(path, {}, logger);

      expect(config.target.endpoint).toBe('http://localhost:11434/api/generate');
      const warnings = lines.map((line) => JSON.parse(line)).filter((entry) => entry.level === 40);
      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toMatchObject({ varName: 'LOADBENCH_TEST_MISSING', msg: 'Environment variable not found' });
    });

    it('does not log validation failures itself', async () => {
      const { logger, lines } = capturingLogger();
      const path = await writeConfig('timing:\n  cooldownMs: -5\n');

      await expect(loadConfig(path, {}, logger)).rejects.toBeInstanceOf(ValidationError);
      expect(lines.filter((line) => JSON.parse(line).level >= 40)).toEqual([]);
    });

    it('reads the bundled config without environment warnings', async () => {
      const { logger, lines } = capturingLogger();

      await loadConfig(undefined, {}, logger);

      expect(lines.filter((line) => JSON.parse(line).level >= 40)).toEqual([]);
    });

    it('reads the bundled config when no path is given', async () => {
      const config = await loadConfig();

      expect(defaultConfigPath().endsWith(join('config', 'loadbench.yaml'))).toBe(true);
      expect(config.target.endpoint).toBe('http://localhost:11434/api/generate');
      expect(config.prompts).toEqual(['你好', '三角函数是什么', '用HTML写一个简单的webgl 三角型 3D 程序']);
    });
  });

  describe('deepMerge', () => {
    it('merges nested objects and replaces arrays', () => {
      expect(deepMerge({ a: { x: 1, y: 2 }, list: [1, 2] }, { a: { y: 3 }, list: [9] })).toEqual({
        a: { x: 1, y: 3 },
        list: [9],
      });
    });

    it('skips undefined source values', () => {
      expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
    });
  });

  describe('interpolateEnvVars', () => {
    it('replaces known variables and blanks unknown ones', () => {
      expect(interpolateEnvVars('a=${A} b=${B}', { A: 'one' })).toBe('a=one b=');
    });
  });
});
