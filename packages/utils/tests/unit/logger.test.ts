/**
 * Logger Tests
 * ============
 * Tests for the centralized logging system
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { logger, createLogger, LogLevel, winstonLogger } from '../../src/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    logger.clearContext();
  });

  describe('Log Levels', () => {
    it('should have all required log levels', () => {
      expect(LogLevel.ERROR).toBe('error');
      expect(LogLevel.WARN).toBe('warn');
      expect(LogLevel.INFO).toBe('info');
      expect(LogLevel.DEBUG).toBe('debug');
      expect(LogLevel.TRACE).toBe('trace');
    });
  });

  describe('namespacing', () => {
    it('uses the default namespace', () => {
      expect(logger.getNamespace()).toBe('idsampler');
    });

    it('creates package loggers', () => {
      expect(createLogger('sampling').getNamespace()).toBe('sampling');
    });
  });

  describe('context', () => {
    it('merges namespace and context into info logs', () => {
      const spy = vi.spyOn(winstonLogger, 'info').mockImplementation(() => winstonLogger);
      const log = createLogger('cli');
      log.setContext({ command: 'sampling.run' });
      log.info('started', { requestId: 'req-1' });
      expect(spy).toHaveBeenCalledWith('started', {
        namespace: 'cli',
        command: 'sampling.run',
        requestId: 'req-1',
      });
    });

    it('child loggers inherit context without changing the parent', () => {
      const parent = createLogger('cli');
      parent.setContext({ command: 'sampling.run' });
      const child = parent.child({ source: 'fullPool' });
      expect(child.getContext()).toEqual({ command: 'sampling.run', source: 'fullPool' });
      expect(parent.getContext()).toEqual({ command: 'sampling.run' });
    });
  });

  describe('error', () => {
    it('expands Error instances', () => {
      const spy = vi.spyOn(winstonLogger, 'error').mockImplementation(() => winstonLogger);
      const error = new Error('disk full');
      createLogger('cli').error('export failed', error);
      expect(spy).toHaveBeenCalledWith('export failed', {
        namespace: 'cli',
        error: { message: 'disk full', stack: error.stack, name: 'Error' },
      });
    });

    it('passes through non-Error payloads', () => {
      const spy = vi.spyOn(winstonLogger, 'error').mockImplementation(() => winstonLogger);
      createLogger('cli').error('odd failure', { reason: 'x' });
      expect(spy).toHaveBeenCalledWith('odd failure', { namespace: 'cli', error: { reason: 'x' } });
    });
  });

  describe('trace', () => {
    it('logs at debug with a trace marker', () => {
      const spy = vi.spyOn(winstonLogger, 'debug').mockImplementation(() => winstonLogger);
      createLogger('core').trace('draw');
      expect(spy).toHaveBeenCalledWith('draw', { namespace: 'core', level: 'trace' });
    });
  });
});
