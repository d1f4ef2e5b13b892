import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger, logger as defaultLogger } from './logger.js';

describe('Logger', () => {
  let capturedOutput: string[] = [];
  let originalWrite: typeof process.stderr.write;

  beforeEach(() => {
    capturedOutput = [];
    originalWrite = process.stderr.write.bind(process.stderr);
    process.stderr.write = vi.fn((chunk: string | Uint8Array): boolean => {
      capturedOutput.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    }) as typeof process.stderr.write;
  });

  afterEach(() => {
    process.stderr.write = originalWrite;
  });

  function parseOutput(index: number): Record<string, unknown> {
    const output = capturedOutput[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return JSON.parse(output.trim()) as Record<string, unknown>;
  }

  describe('entries', () => {
    it('should write one JSON line with component, event and data', () => {
      const logger = new Logger({ component: 'Engine' });

      logger.info('run_completed', { total: 4, failed: 0 });

      expect(capturedOutput).toHaveLength(1);
      expect(capturedOutput[0]?.endsWith('\n')).toBe(true);
      const parsed = parseOutput(0);
      expect(parsed.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
      expect(parsed.level).toBe('info');
      expect(parsed.component).toBe('Engine');
      expect(parsed.event).toBe('run_completed');
      expect(parsed.data).toEqual({ total: 4, failed: 0 });
    });

    it('should leave out data when none is given', () => {
      new Logger({ component: 'Engine' }).error('run_aborted');
      expect(Object.keys(parseOutput(0))).toEqual(['timestamp', 'level', 'component', 'event']);
    });

    it('should tag each level', () => {
      const logger = new Logger({ component: 'Engine', debugMode: true });

      logger.debug('element_analyzed');
      logger.info('run_completed');
      logger.warn('element_failed');
      logger.error('run_aborted');

      expect(capturedOutput.map((_, index) => parseOutput(index).level)).toEqual(['debug', 'info', 'warn', 'error']);
    });
  });

  describe('debug mode', () => {
    it('should drop debug entries unless enabled', () => {
      new Logger({ component: 'Engine' }).debug('element_analyzed', { qualifiedPath: 'billing' });
      defaultLogger.debug('element_analyzed');
      expect(capturedOutput).toHaveLength(0);
    });

    it('should pass debug mode on to child loggers', () => {
      const parent = new Logger({ component: 'DocSchema', debugMode: true });

      parent.child('Engine').debug('run_started', { elements: 3 });

      const parsed = parseOutput(0);
      expect(parsed.component).toBe('Engine');
      expect(parsed.data).toEqual({ elements: 3 });
    });
  });

  describe('unserializable data', () => {
    it('should write a fallback entry for circular data', () => {
      const logger = new Logger({ component: 'Engine' });
      const circular: Record<string, unknown> = { qualifiedPath: 'billing' };
      circular.self = circular;

      expect(() => {
        logger.warn('element_failed', circular);
      }).not.toThrow();

      const parsed = parseOutput(0);
      expect(parsed.level).toBe('warn');
      expect(parsed.event).toBe('element_failed');
      expect(typeof parsed.serializationError).toBe('string');
      expect(parsed.originalData).toBe('[unserializable]');
      expect(parsed.data).toBeUndefined();
    });

    it('should always write exactly one parseable line', () => {
      const logger = new Logger({ component: 'Engine' });

      fc.assert(
        fc.property(fc.dictionary(fc.string(), fc.anything()), (data) => {
          capturedOutput = [];
          logger.info('run_completed', data);

          expect(capturedOutput).toHaveLength(1);
          expect(capturedOutput[0]?.trim().split('\n')).toHaveLength(1);
          expect(parseOutput(0).event).toBe('run_completed');
        })
      );
    });
  });
});
