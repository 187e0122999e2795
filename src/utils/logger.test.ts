import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import * as fc from 'fast-check';
import { Logger } from './logger.js';

describe('Logger', () => {
  let capturedOutput: string[] = [];
  const stream = {
    write: (chunk: string | Uint8Array): boolean => {
      capturedOutput.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    },
  };

  beforeEach(() => {
    capturedOutput = [];
  });

  function getOutput(index: number): string {
    const output = capturedOutput[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return output;
  }

  function parseOutput(index: number): Record<string, unknown> {
    return JSON.parse(getOutput(index).trim()) as Record<string, unknown>;
  }

  describe('safe JSON.stringify', () => {
    it('should handle circular references without throwing', () => {
      const logger = new Logger({ component: 'TestLogger', stream });

      const circularObj: Record<string, unknown> = { name: 'test' };
      circularObj.self = circularObj;

      expect(() => {
        logger.info('circular_test', circularObj);
      }).not.toThrow();

      expect(capturedOutput.length).toBe(1);
      const parsed = parseOutput(0);

      expect(parsed.level).toBe('info');
      expect(parsed.component).toBe('TestLogger');
      expect(parsed.event).toBe('circular_test');
      expect(typeof parsed.serializationError).toBe('string');
      expect(parsed.originalData).toBe('[unserializable]');
      expect(parsed.data).toBeUndefined();
    });

    it('should handle BigInt values without throwing', () => {
      const logger = new Logger({ component: 'TestLogger', stream });

      logger.info('bigint_test', { value: BigInt(9007199254740991) });

      const parsed = parseOutput(0);
      expect(parsed.event).toBe('bigint_test');
      expect(parsed.originalData).toBe('[unserializable]');
    });

    it('should emit a single JSON line for arbitrary data (property-based)', () => {
      const logger = new Logger({ component: 'PropertyTest', stream });

      fc.assert(
        fc.property(fc.dictionary(fc.string(), fc.anything()), (arbitraryData) => {
          capturedOutput = [];

          logger.info('fuzz_test', arbitraryData);

          expect(capturedOutput.length).toBe(1);
          const output = getOutput(0);
          expect(output.endsWith('\n')).toBe(true);

          const parsed = JSON.parse(output.trim()) as Record<string, unknown>;
          expect(parsed.level).toBe('info');
          expect(parsed.component).toBe('PropertyTest');
          expect(parsed.event).toBe('fuzz_test');
        })
      );
    });
  });

  describe('levels', () => {
    it('should log info messages with data', () => {
      const logger = new Logger({ component: 'TestLogger', stream });

      logger.info('header_written', { path: 'out/info_config.h' });

      const parsed = parseOutput(0);
      expect(parsed.level).toBe('info');
      expect(parsed.event).toBe('header_written');
      expect(parsed.data).toEqual({ path: 'out/info_config.h' });
      expect(parsed.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
    });

    it('should omit the data field when no data is given', () => {
      const logger = new Logger({ component: 'TestLogger', stream });

      logger.warn('no_data');

      expect('data' in parseOutput(0)).toBe(false);
    });

    it('should not log debug messages when debugMode is false', () => {
      const logger = new Logger({ component: 'TestLogger', debugMode: false, stream });

      logger.debug('debug_event', { key: 'value' });

      expect(capturedOutput.length).toBe(0);
    });

    it('should log debug messages when debugMode is true', () => {
      const logger = new Logger({ component: 'TestLogger', debugMode: true, stream });

      logger.debug('debug_event');

      expect(parseOutput(0).level).toBe('debug');
    });

    it('should suppress debug and info but keep warn and error in quiet mode', () => {
      const logger = new Logger({ component: 'TestLogger', debugMode: true, quiet: true, stream });

      logger.debug('a');
      logger.info('b');
      logger.warn('c');
      logger.error('d', { code: 1 });

      expect(capturedOutput.length).toBe(2);
      expect(parseOutput(0).event).toBe('c');
      expect(parseOutput(1)).toMatchObject({ level: 'error', event: 'd', data: { code: 1 } });
    });
  });

  describe('child', () => {
    it('should prefix the component and inherit settings', () => {
      const logger = new Logger({ component: 'kbgen', debugMode: true, stream });

      logger.child('resolver').debug('keyboard_resolved');

      expect(parseOutput(0).component).toBe('kbgen:resolver');
    });
  });

  describe('default stream', () => {
    let writeSpy: MockInstance<Parameters<typeof process.stderr.write>, boolean>;

    beforeEach(() => {
      writeSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should write to stderr when no stream is configured', () => {
      const logger = new Logger({ component: 'TestLogger' });

      logger.error('stderr_event');

      expect(writeSpy).toHaveBeenCalledTimes(1);
    });
  });
});
