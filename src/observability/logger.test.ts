/**
 * @fileoverview Unit tests for Logger
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Logger, MemoryTransport, parseSeverity } from './logger.js';
import { Severity } from '../types/index.js';

describe('Logger', () => {
  let memoryTransport: MemoryTransport;
  let logger: Logger;

  beforeEach(() => {
    memoryTransport = new MemoryTransport(100);
    logger = new Logger({
      minLevel: Severity.DEBUG,
      transports: [memoryTransport],
      module: 'test',
    });
  });

  describe('logging levels', () => {
    it('should log DEBUG messages with data', () => {
      logger.debug('debug message', { key: 'value' });

      const entries = memoryTransport.getEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0].level).toBe(Severity.DEBUG);
      expect(entries[0].message).toBe('debug message');
      expect(entries[0].data).toEqual({ key: 'value' });
    });

    it('should log WARN messages', () => {
      logger.warn('warn message');

      const entries = memoryTransport.getEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0].level).toBe(Severity.WARN);
    });

    it('should attach error details', () => {
      logger.error('error message', {}, new Error('test error'));

      const entries = memoryTransport.getEntries();
      expect(entries[0].error?.message).toBe('test error');
      expect(entries[0].error?.name).toBe('Error');
    });

    it('should describe non-Error values', () => {
      logger.error('error message', {}, 'plain string');

      expect(memoryTransport.getEntries()[0].error).toEqual({
        name: 'NonError',
        message: 'plain string',
        stack: undefined,
        code: undefined,
      });
    });
  });

  describe('level filtering', () => {
    it('should filter messages below minimum level', () => {
      const warnLogger = new Logger({
        minLevel: Severity.WARN,
        transports: [memoryTransport],
        module: 'test',
      });

      warnLogger.debug('debug');
      warnLogger.info('info');
      warnLogger.warn('warn');
      warnLogger.error('error');

      const entries = memoryTransport.getEntries();
      expect(entries).toHaveLength(2);
      expect(entries[0].level).toBe(Severity.WARN);
      expect(entries[1].level).toBe(Severity.ERROR);
    });
  });

  describe('child loggers', () => {
    it('should stamp the run ID and module on entries', () => {
      const child = logger.child({ module: 'engine', runId: 'run-1' });
      child.info('child message');

      const [entry] = memoryTransport.getEntries();
      expect(entry.module).toBe('engine');
      expect(entry.runId).toBe('run-1');
      expect(memoryTransport.findByRunId('run-1')).toHaveLength(1);
    });

    it('should keep the parent module when none is given', () => {
      logger.child({ runId: 'run-2' }).info('message');

      expect(memoryTransport.getEntries()[0].module).toBe('test');
    });
  });

  describe('time()', () => {
    it('should log the duration of a successful operation', async () => {
      const result = await logger.time('round trip', () => Promise.resolve(42));

      expect(result).toBe(42);
      const [entry] = memoryTransport.findByMessage('round trip completed');
      expect(entry.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('should log and rethrow failures', async () => {
      await expect(
        logger.time('round trip', () => Promise.reject(new Error('boom'))),
      ).rejects.toThrow('boom');

      const [entry] = memoryTransport.findByMessage('round trip failed');
      expect(entry.level).toBe(Severity.ERROR);
      expect(entry.error?.message).toBe('boom');
    });
  });

  describe('MemoryTransport', () => {
    it('should respect max entries limit', () => {
      const smallTransport = new MemoryTransport(3);
      const smallLogger = new Logger({
        minLevel: Severity.DEBUG,
        transports: [smallTransport],
        module: 'test',
      });

      smallLogger.info('message 1');
      smallLogger.info('message 2');
      smallLogger.info('message 3');
      smallLogger.info('message 4');

      const entries = smallTransport.getEntries();
      expect(entries).toHaveLength(3);
      expect(entries[0].message).toBe('message 2');
      expect(entries[2].message).toBe('message 4');
    });
  });

  describe('parseSeverity()', () => {
    it('should accept any casing', () => {
      expect(parseSeverity('debug')).toBe(Severity.DEBUG);
      expect(parseSeverity(' Warn ')).toBe(Severity.WARN);
    });

    it('should reject unknown levels', () => {
      expect(parseSeverity('verbose')).toBeNull();
    });
  });
});
