import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { ReplayLogger, RequestTimer, clampElapsed, type ReplayLogEntry } from './replay-logger';

const successEntry: ReplayLogEntry = {
  timestamp: '2024-05-27T21:51:29.094Z',
  method: 'GET',
  url: 'http://www.dogs.com/comments/best-dogs/',
  target: 'http://teststage.local/comments/best-dogs/',
  status: 'success',
  statusCode: 301,
  durationMs: 27,
};

const errorEntry: ReplayLogEntry = {
  timestamp: '2024-05-27T21:51:29.094Z',
  method: 'GET',
  url: 'http://www.dogs.com/',
  target: 'http://teststage.local/',
  status: 'error',
  error: 'connect ECONNREFUSED 127.0.0.1:80',
  durationMs: 1,
};

describe('ReplayLogger', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  describe('formatResult()', () => {
    it('formats a status code result', () => {
      const logger = new ReplayLogger({ color: false });

      expect(logger.formatResult(successEntry)).toBe(
        '2024-05-27T21:51:29.094Z [27ms] [301] GET http://www.dogs.com/comments/best-dogs/'
      );
    });

    it('puts the error text where the status code would be', () => {
      const logger = new ReplayLogger({ color: false });

      expect(logger.formatResult(errorEntry)).toBe(
        '2024-05-27T21:51:29.094Z [1ms] [connect ECONNREFUSED 127.0.0.1:80] GET http://www.dogs.com/'
      );
    });

    it('follows the detected color level when color is enabled', () => {
      // tests/setup.ts sets chalk.level to 0
      const logger = new ReplayLogger({ color: true });
      expect(logger.formatResult(successEntry)).toBe(
        '2024-05-27T21:51:29.094Z [27ms] [301] GET http://www.dogs.com/comments/best-dogs/'
      );
    });
  });

  describe('logResult()', () => {
    it('writes exactly one line to stdout', async () => {
      const logger = new ReplayLogger({ color: false });

      await logger.logResult(successEntry);

      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(logSpy).toHaveBeenCalledWith(
        '2024-05-27T21:51:29.094Z [27ms] [301] GET http://www.dogs.com/comments/best-dogs/'
      );
    });

    describe('with a JSON log file', () => {
      let dir: string;

      beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'replay-logger-'));
      });

      afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
      });

      it('appends one JSON object per result', async () => {
        const jsonLogPath = path.join(dir, 'results.jsonl');
        const logger = new ReplayLogger({ color: false, jsonLogPath });

        await logger.logResult(successEntry);
        await logger.logResult(errorEntry);

        const lines = (await fs.readFile(jsonLogPath, 'utf-8')).trim().split('\n');
        expect(lines.map((line) => JSON.parse(line))).toEqual([successEntry, errorEntry]);
      });

      it('reports write failures on stderr and keeps going', async () => {
        const jsonLogPath = path.join(dir, 'missing', 'results.jsonl');
        const logger = new ReplayLogger({ color: false, jsonLogPath });

        await expect(logger.logResult(successEntry)).resolves.toBeUndefined();

        expect(logSpy).toHaveBeenCalledTimes(1);
        expect(errorSpy).toHaveBeenCalledTimes(1);
        expect(String(errorSpy.mock.calls[0][0])).toContain(`[replay] Failed to write to ${jsonLogPath}`);
      });
    });
  });

  describe('debug()', () => {
    it('is silent unless verbose', () => {
      new ReplayLogger().debug('hidden');
      expect(errorSpy).not.toHaveBeenCalled();

      new ReplayLogger({ verbose: true }).debug('shown');
      expect(errorSpy).toHaveBeenCalledWith('shown');
    });
  });

  describe('warn()', () => {
    it('writes to stderr', () => {
      new ReplayLogger().warn('Skipping request');

      expect(errorSpy).toHaveBeenCalledWith('⚠️  Skipping request');
      expect(logSpy).not.toHaveBeenCalled();
    });
  });
});

describe('clampElapsed()', () => {
  it('never reports less than 1ms', () => {
    expect(clampElapsed(0)).toBe(1);
    expect(clampElapsed(-15)).toBe(1);
    expect(clampElapsed(0.4)).toBe(1);
  });

  it('truncates to whole milliseconds', () => {
    expect(clampElapsed(26.9)).toBe(26);
  });
});

describe('RequestTimer', () => {
  it('reports at least 1ms even when the clock goes backwards', () => {
    const now = vi.spyOn(Date, 'now').mockReturnValue(10_000);
    const timer = new RequestTimer();

    now.mockReturnValue(9_000);
    expect(timer.elapsed()).toBe(1);

    now.mockReturnValue(10_042);
    expect(timer.elapsed()).toBe(42);
  });
});
