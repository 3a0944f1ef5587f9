import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { isLogLevel, Logger } from './logger.js';

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

  describe('level threshold', () => {
    it('should drop debug entries at the default level', () => {
      const logger = new Logger({ component: 'Resolver' });

      logger.debug('lookup_started', { address: 'node1' });

      expect(capturedOutput).toHaveLength(0);
    });

    it('should write debug entries when the level is debug', () => {
      const logger = new Logger({ component: 'Resolver', level: 'debug' });

      logger.debug('lookup_started', { address: 'node1' });

      expect(capturedOutput).toHaveLength(1);
      expect(parseOutput(0).level).toBe('debug');
    });

    it('should drop info and warn entries at the error level', () => {
      const logger = new Logger({ component: 'Resolver', level: 'error' });

      logger.info('a');
      logger.warn('b');
      logger.error('c');

      expect(capturedOutput).toHaveLength(1);
      expect(parseOutput(0).event).toBe('c');
    });

    it('should keep the level in child loggers', () => {
      const parent = new Logger({ component: 'Guard', level: 'warn' });
      const child = parent.child('ConstraintBuilder');

      child.info('ignored');
      child.warn('kept');

      expect(child.level).toBe('warn');
      expect(capturedOutput).toHaveLength(1);
      expect(parseOutput(0).component).toBe('ConstraintBuilder');
    });
  });

  describe('entry format', () => {
    it('should write one JSON line with all fields', () => {
      const logger = new Logger({ component: 'ConstraintBuilder' });

      logger.info('constraint_created', { id: 'ha_order_set_A_B' });

      expect(capturedOutput).toHaveLength(1);
      expect(capturedOutput[0]?.endsWith('\n')).toBe(true);
      const parsed = parseOutput(0);
      expect(parsed.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
      expect(parsed.level).toBe('info');
      expect(parsed.component).toBe('ConstraintBuilder');
      expect(parsed.event).toBe('constraint_created');
      expect(parsed.data).toEqual({ id: 'ha_order_set_A_B' });
    });

    it('should omit data when none is given', () => {
      const logger = new Logger({ component: 'Guard' });

      logger.warn('no_data');

      expect('data' in parseOutput(0)).toBe(false);
    });

    it('should replace circular data instead of throwing', () => {
      const logger = new Logger({ component: 'Guard' });
      const circular: Record<string, unknown> = { name: 'test' };
      circular.self = circular;

      expect(() => {
        logger.error('circular', circular);
      }).not.toThrow();

      const parsed = parseOutput(0);
      expect(parsed.event).toBe('circular');
      expect(parsed.originalData).toBe('[unserializable]');
      expect(typeof parsed.serializationError).toBe('string');
    });

    it('should write parseable JSON for arbitrary JSON data (property-based)', () => {
      const logger = new Logger({ component: 'PropertyTest' });

      fc.assert(
        fc.property(fc.dictionary(fc.string(), fc.jsonValue()), (data) => {
          capturedOutput = [];
          logger.info('fuzz', data);

          expect(capturedOutput).toHaveLength(1);
          const parsed = parseOutput(0);
          expect(parsed.component).toBe('PropertyTest');
          expect(parsed.event).toBe('fuzz');
        })
      );
    });
  });

  describe('isLogLevel', () => {
    it('should accept known levels only', () => {
      expect(isLogLevel('warn')).toBe(true);
      expect(isLogLevel('trace')).toBe(false);
    });
  });
});
