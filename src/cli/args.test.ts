import { describe, it, expect } from 'vitest';
import { CliUsageError, parseArgs } from './args.js';

function usageError(argv: readonly string[]): CliUsageError {
  try {
    parseArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected parseArgs to throw');
}

describe('parseArgs', () => {
  describe('top-level commands', () => {
    it('should show help when no command is given', () => {
      expect(parseArgs([])).toEqual({ type: 'help', command: undefined });
    });

    it('should accept help flags and a command to describe', () => {
      expect(parseArgs(['--help'])).toEqual({ type: 'help', command: undefined });
      expect(parseArgs(['help', 'generate-config-h'])).toEqual({
        type: 'help',
        command: 'generate-config-h',
      });
    });

    it('should recognize every spelling of version', () => {
      for (const arg of ['version', '--version', '-v']) {
        expect(parseArgs([arg])).toEqual({ type: 'version' });
      }
    });

    it('should report unknown commands without throwing', () => {
      expect(parseArgs(['compile', '-kb', 'x'])).toEqual({ type: 'unknown', command: 'compile' });
    });
  });

  describe('generate-config-h', () => {
    it('should parse short flags', () => {
      expect(
        parseArgs(['generate-config-h', '-kb', 'acme/pad', '-km', 'default', '-o', 'out.h', '-q'])
      ).toEqual({
        type: 'generate-config-h',
        options: { keyboard: 'acme/pad', keymap: 'default', output: 'out.h', quiet: true },
      });
    });

    it('should parse long flags in both forms', () => {
      expect(
        parseArgs(['generate-config-h', '--keyboard=acme/pad', '--output', 'build/info_config.h'])
      ).toEqual({
        type: 'generate-config-h',
        options: { keyboard: 'acme/pad', output: 'build/info_config.h', quiet: false },
      });
    });

    it('should leave the keyboard unset when it is not given', () => {
      expect(parseArgs(['generate-config-h'])).toEqual({
        type: 'generate-config-h',
        options: { quiet: false },
      });
    });

    it('should let the last occurrence of a flag win', () => {
      const command = parseArgs(['generate-config-h', '-kb', 'first', '--keyboard', 'second']);

      expect(command).toEqual({
        type: 'generate-config-h',
        options: { keyboard: 'second', quiet: false },
      });
    });

    it('should turn a help flag into command help', () => {
      expect(parseArgs(['generate-config-h', '-kb', 'acme/pad', '--help'])).toEqual({
        type: 'help',
        command: 'generate-config-h',
      });
    });

    it('should reject a flag without a value', () => {
      expect(usageError(['generate-config-h', '-kb']).message).toBe('Option -kb requires a value');
      expect(usageError(['generate-config-h', '--keymap', '-q']).message).toBe(
        'Option --keymap requires a value'
      );
    });

    it('should reject unknown options and stray arguments', () => {
      const unknown = usageError(['generate-config-h', '--frobnicate']);

      expect(unknown.message).toBe('Unknown option: --frobnicate');
      expect(unknown.command).toBe('generate-config-h');
      expect(usageError(['generate-config-h', 'acme/pad']).message).toBe(
        'Unexpected argument: acme/pad'
      );
    });
  });
});
