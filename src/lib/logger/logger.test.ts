import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, createLogger, formatError, generateRequestId, shouldLog } from './logger';

describe('Logger', () => {
  const originalLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    process.env.LOG_LEVEL = 'debug';
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  describe('shouldLog', () => {
    it('filters levels below LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'warn';

      expect(shouldLog('debug')).toBe(false);
      expect(shouldLog('info')).toBe(false);
      expect(shouldLog('warn')).toBe(true);
      expect(shouldLog('error')).toBe(true);
    });

    it('ignores an unknown LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'verbose';
      const nodeEnv = process.env.NODE_ENV;
      process.env.NODE_ENV = 'production';

      expect(shouldLog('debug')).toBe(false);
      expect(shouldLog('info')).toBe(true);

      process.env.NODE_ENV = nodeEnv;
    });
  });

  describe('formatError', () => {
    it('returns undefined for no error', () => {
      expect(formatError(undefined)).toBeUndefined();
    });

    it('formats Error instances', () => {
      const formatted = formatError(new TypeError('bad input'));

      expect(formatted?.name).toBe('TypeError');
      expect(formatted?.message).toBe('bad input');
    });

    it('formats plain objects with a message', () => {
      expect(formatError({ message: 'socket hang up' })).toEqual({
        name: 'UnknownError',
        message: 'socket hang up',
      });
    });

    it('formats primitives', () => {
      expect(formatError('boom')).toEqual({ name: 'UnknownError', message: 'boom' });
    });
  });

  describe('output', () => {
    it('prefixes messages with service and request ID', () => {
      const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => undefined);
      const log = createLogger('L337x').child({ requestId: 'abc' });

      log.info('Listing fetched');

      expect(infoSpy).toHaveBeenCalledTimes(1);
      const [message] = infoSpy.mock.calls[0];
      expect(message).toMatch(/ INFO \[L337x\]\[req:abc\] Listing fetched$/);
    });

    it('appends extra context keys', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const log = new Logger({ service: 'YTS', query: 'Heat' });

      log.warn('Slow response');

      expect(warnSpy.mock.calls[0]).toContainEqual({ query: 'Heat' });
    });

    it('does not output when level is filtered', () => {
      process.env.LOG_LEVEL = 'error';
      const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

      createLogger('EZTV').debug('hidden');

      expect(debugSpy).not.toHaveBeenCalled();
    });
  });

  describe('startOperation', () => {
    it('logs the start and the completion with its duration', () => {
      const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      const log = createLogger('Registry');

      const done = log.startOperation('YTS movie search', { title: 'Heat' });
      expect(debugSpy).toHaveBeenCalledTimes(1);
      expect(debugSpy.mock.calls[0][0]).toMatch(/ DEBUG \[Registry\] Starting: YTS movie search$/);

      done();
      expect(debugSpy).toHaveBeenCalledTimes(2);
      expect(debugSpy.mock.calls[1][0]).toMatch(/ DEBUG \[Registry\] Completed: YTS movie search$/);
      expect(debugSpy.mock.calls[1][2]).toMatchObject({ title: 'Heat', duration: expect.stringMatching(/^\d+ms$/) });
    });
  });

  describe('generateRequestId', () => {
    it('generates distinct IDs', () => {
      expect(generateRequestId()).not.toBe(generateRequestId());
    });
  });
});
