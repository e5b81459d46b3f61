import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger, levelFromEnv } from '../Utils/logger.js';

describe('Logger', () => {
  let spy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    spy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    spy.mockRestore();
  });

  describe('level filtering', () => {
    it('should log at or above the configured level', () => {
      const log = new Logger('test', 'warn');

      log.debug('skip');
      log.info('skip');
      log.warn('show');
      log.error('show');

      expect(spy).toHaveBeenCalledTimes(2);
    });

    it('should log everything at debug level', () => {
      const log = new Logger('test', 'debug');

      log.debug('d');
      log.info('i');
      log.warn('w');
      log.error('e');

      expect(spy).toHaveBeenCalledTimes(4);
    });

    it('should log nothing when silent', () => {
      const log = new Logger('test', 'silent');

      log.debug('d');
      log.info('i');
      log.warn('w');
      log.error('e');

      expect(spy).not.toHaveBeenCalled();
    });
  });

  describe('output format', () => {
    it('should include timestamp, level, context, and message', () => {
      const log = new Logger('runblock:shell', 'info');
      log.info('shell not found');

      expect(spy).toHaveBeenCalledTimes(1);
      const output = spy.mock.calls[0][0] as string;

      expect(output).toMatch(/^\[.+\] \[INFO\] \[runblock:shell\] shell not found$/);
    });

    it('should append JSON data when provided', () => {
      const log = new Logger('svc', 'info');
      log.info('dispatching', { kind: 'shell', timeoutMs: 500 });

      const output = spy.mock.calls[0][0] as string;
      expect(output.endsWith(' {"kind":"shell","timeoutMs":500}')).toBe(true);
    });

    it('should serialize Error objects with message, name, and code', () => {
      const log = new Logger('svc', 'error');
      const err = Object.assign(new Error('spawn nosuchshell ENOENT'), { code: 'ENOENT' });
      log.error('launch failed', err);

      const output = spy.mock.calls[0][0] as string;
      expect(output).toContain('"message":"spawn nosuchshell ENOENT"');
      expect(output).toContain('"name":"Error"');
      expect(output).toContain('"code":"ENOENT"');
      expect(output).toContain('"stack"');
    });

    it('should write to console.error, never stdout', () => {
      const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      const log = new Logger('test', 'info');
      log.info('test message');

      expect(spy).toHaveBeenCalled();
      expect(stdoutSpy).not.toHaveBeenCalled();
      stdoutSpy.mockRestore();
    });
  });
});

describe('levelFromEnv', () => {
  it('should prefer RUNBLOCK_LOG_LEVEL over LOG_LEVEL', () => {
    expect(levelFromEnv({ RUNBLOCK_LOG_LEVEL: 'debug', LOG_LEVEL: 'error' })).toBe('debug');
  });

  it('should fall back to LOG_LEVEL', () => {
    expect(levelFromEnv({ LOG_LEVEL: 'warn' })).toBe('warn');
  });

  it('should accept mixed case and surrounding spaces', () => {
    expect(levelFromEnv({ LOG_LEVEL: ' Error ' })).toBe('error');
  });

  it('should skip an invalid value and keep looking', () => {
    expect(levelFromEnv({ RUNBLOCK_LOG_LEVEL: 'loud', LOG_LEVEL: 'debug' })).toBe('debug');
  });

  it('should default to info', () => {
    expect(levelFromEnv({})).toBe('info');
  });
});
