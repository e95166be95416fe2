import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  parseInteger,
  parseIntegerList,
  parseNumber,
  runCli,
} from '../src/cli';
import { runLoadTest } from '../src/index';
import { PRESET_PROFILES } from '../src/preset';
import { startTargetServer } from '../src/target-server';

vi.mock('../src/index', () => ({
  runLoadTest: vi.fn(async () => []),
}));

const runLoadTestMock = vi.mocked(runLoadTest);

function cli(...args: string[]): Promise<void> {
  return runCli(['node', 'loopbench', ...args]);
}

describe('argument parsers', () => {
  it('should parse integers and reject everything else', () => {
    expect(parseInteger('42')).toBe(42);
    expect(() => parseInteger('4.5')).toThrow('Not an integer.');
    expect(() => parseInteger('abc')).toThrow('Not an integer.');
    expect(() => parseInteger('')).toThrow('Not an integer.');
  });

  it('should parse finite numbers', () => {
    expect(parseNumber('0.25')).toBe(0.25);
    expect(() => parseNumber('fast')).toThrow('Not a number.');
  });

  it('should parse comma-separated integer lists', () => {
    expect(parseIntegerList('1, 10,50,')).toEqual([1, 10, 50]);
    expect(() => parseIntegerList('1,x')).toThrow('Not an integer.');
  });
});

/**
 * Test suite for the main CLI functionality.
 */
describe('CLI', () => {
  let tempDir: string;

  beforeEach(async () => {
    runLoadTestMock.mockClear();
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'loopbench-cli-'));
    vi.spyOn(process, 'cwd').mockReturnValue(tempDir);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should run a closed-loop benchmark with defaults', async () => {
    await cli('closed');

    expect(runLoadTestMock).toHaveBeenCalledWith({
      mode: 'closed',
      url: 'http://127.0.0.1:8000/',
      total: 1000,
      concurrency: 100,
      timeoutSec: 5,
      warmup: 0,
      repeat: 1,
      quiet: false,
    });
  });

  it('should pass parsed closed-loop options through', async () => {
    await cli(
      'closed',
      '--url',
      'http://localhost:9000/x',
      '-n',
      '200',
      '-c',
      '8',
      '--timeout',
      '0.5',
      '--warmup',
      '20',
      '--repeat',
      '3',
      '--quiet',
    );

    expect(runLoadTestMock).toHaveBeenCalledWith({
      mode: 'closed',
      url: 'http://localhost:9000/x',
      total: 200,
      concurrency: 8,
      timeoutSec: 0.5,
      warmup: 20,
      repeat: 3,
      quiet: true,
    });
  });

  it('should run an open-loop benchmark', async () => {
    await cli('open', '--rps', '250', '--duration', '3', '--concurrency', '16', '--warmup-sec', '1');

    expect(runLoadTestMock).toHaveBeenCalledWith({
      mode: 'open',
      url: 'http://127.0.0.1:8000/',
      rps: 250,
      durationSec: 3,
      concurrency: 16,
      timeoutSec: 5,
      warmupSec: 1,
      repeat: 1,
      quiet: false,
    });
  });

  it('should run a sweep over the given concurrencies', async () => {
    await cli('sweep', '--concurrencies', '1,4,16', '-n', '50');

    expect(runLoadTestMock).toHaveBeenCalledWith(
      expect.objectContaining({
        mode: 'sweep',
        total: 50,
        concurrencies: [1, 4, 16],
      }),
    );
  });

  it('should pass an explicit config to the preset run', async () => {
    await cli('--config', 'bench.json', 'preset', '--profile', 'smoke', '--csv', 'out.csv');

    expect(runLoadTestMock).toHaveBeenCalledWith({
      mode: 'preset',
      url: 'http://127.0.0.1:8000/',
      profile: 'smoke',
      timeoutSec: 5,
      config: 'bench.json',
      csvPath: 'out.csv',
      xlsx: false,
    });
  });

  it('should pick up the default config file for a preset run', async () => {
    const configPath = path.join(tempDir, 'loopbench.config.json');
    await fs.writeFile(configPath, '{}');

    await cli('preset');

    expect(runLoadTestMock).toHaveBeenCalledWith(
      expect.objectContaining({
        mode: 'preset',
        profile: 'standard',
        config: configPath,
      }),
    );
  });

  it('should run a preset without config when none is found', async () => {
    await cli('preset', '--xlsx');

    expect(runLoadTestMock).toHaveBeenCalledWith(
      expect.objectContaining({ config: undefined, xlsx: true }),
    );
  });

  it('should reject an unknown profile', async () => {
    await expect(cli('preset', '--profile', 'turbo')).rejects.toThrow(
      /Allowed choices are smoke, standard, stress/,
    );
    expect(runLoadTestMock).not.toHaveBeenCalled();
  });

  it('should reject a non-integer request count', async () => {
    await expect(cli('closed', '-n', 'many')).rejects.toThrow(/Not an integer/);
    expect(runLoadTestMock).not.toHaveBeenCalled();
  });

  it('should propagate failures from the run', async () => {
    runLoadTestMock.mockRejectedValueOnce(new RangeError('concurrency must be a positive integer, got 0'));

    await expect(cli('closed', '-c', '0')).rejects.toThrow(RangeError);
  });

  describe('init', () => {
    it('should write a config with the built-in profiles', async () => {
      await cli('init');

      const written = await fs.readFile(
        path.join(tempDir, 'loopbench.config.json'),
        'utf-8',
      );
      expect(JSON.parse(written)).toEqual({ presets: PRESET_PROFILES });
    });

    it('should leave an existing config alone', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const configPath = path.join(tempDir, 'loopbench.config.json');
      await fs.writeFile(configPath, '{"presets":{}}');

      await cli('init');

      expect(await fs.readFile(configPath, 'utf-8')).toBe('{"presets":{}}');
      expect(String(log.mock.calls[0][0])).toContain('already exists. Skipping.');
    });

    it('should print a write failure before rethrowing', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      vi.spyOn(process, 'cwd').mockReturnValue(path.join(tempDir, 'missing'));

      await expect(cli('init')).rejects.toThrow(/ENOENT/);

      expect(error).toHaveBeenCalledTimes(1);
      expect(String(error.mock.calls[0][0])).toContain(
        'Failed to create config file: ENOENT',
      );
    });
  });

  describe('serve', () => {
    it('should print a bind failure before rethrowing', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const busy = await startTargetServer();
      try {
        await expect(cli('serve', '--port', String(busy.port))).rejects.toThrow(
          /EADDRINUSE/,
        );
      } finally {
        await busy.close();
      }

      expect(error).toHaveBeenCalledTimes(1);
      expect(String(error.mock.calls[0][0])).toContain(
        'Failed to start server: listen EADDRINUSE',
      );
    });
  });
});
