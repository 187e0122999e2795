import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { DEFAULT_SETTINGS, SettingsParseError, parseSettings } from './index.js';

function parseError(toml: string): SettingsParseError {
  try {
    parseSettings(toml);
  } catch (error) {
    if (error instanceof SettingsParseError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected parseSettings to throw');
}

describe('Settings Parser', () => {
  describe('parseSettings', () => {
    describe('valid TOML parsing', () => {
      it('should parse empty TOML to default settings', () => {
        expect(parseSettings('')).toEqual(DEFAULT_SETTINGS);
      });

      it('should parse a complete settings file', () => {
        const toml = `
[paths]
keyboards = "vendor/keyboards"

[output]
backup_suffix = ".orig"

[logging]
debug = true
quiet = true
`;

        expect(parseSettings(toml)).toEqual({
          paths: { keyboards: 'vendor/keyboards' },
          output: { backup_suffix: '.orig' },
          logging: { debug: true, quiet: true },
        });
      });

      it('should fill missing fields from defaults', () => {
        const settings = parseSettings('[logging]\nquiet = true\n');

        expect(settings.logging).toEqual({ debug: false, quiet: true });
        expect(settings.paths).toEqual(DEFAULT_SETTINGS.paths);
        expect(settings.output).toEqual(DEFAULT_SETTINGS.output);
      });

      it('should ignore unknown sections and keys', () => {
        const settings = parseSettings('[extra]\nvalue = 1\n\n[paths]\nother = "x"\n');

        expect(settings).toEqual(DEFAULT_SETTINGS);
      });

      it('should not share objects with the defaults', () => {
        const settings = parseSettings('');
        settings.paths.keyboards = 'changed';

        expect(DEFAULT_SETTINGS.paths.keyboards).toBe('keyboards');
      });
    });

    describe('invalid input', () => {
      it('should reject invalid TOML syntax', () => {
        const error = parseError('[paths\nkeyboards = ');

        expect(error.message.startsWith('Invalid TOML syntax: ')).toBe(true);
        expect(error.cause).toBeInstanceOf(Error);
      });

      it('should reject a string field holding a number', () => {
        expect(parseError('[output]\nbackup_suffix = 3\n').message).toBe(
          "Invalid type for 'output.backup_suffix': expected string, got number"
        );
      });

      it('should reject a boolean field holding a string', () => {
        expect(parseError('[logging]\ndebug = "yes"\n').message).toBe(
          "Invalid type for 'logging.debug': expected boolean, got string"
        );
      });

      it('should reject an array where a string is expected', () => {
        expect(parseError('[paths]\nkeyboards = ["a", "b"]\n').message).toBe(
          "Invalid type for 'paths.keyboards': expected string, got array"
        );
      });

      it('should reject a section that is not a table', () => {
        expect(parseError('paths = "keyboards"\n').message).toBe(
          "Invalid type for 'paths': expected table, got string"
        );
      });
    });

    describe('properties', () => {
      it('should read back any plain keyboards path', () => {
        fc.assert(
          fc.property(fc.stringMatching(/^[a-z0-9_./-]{1,24}$/), (dir) => {
            const settings = parseSettings(`[paths]\nkeyboards = ${JSON.stringify(dir)}\n`);
            expect(settings.paths.keyboards).toBe(dir);
          })
        );
      });

      it('should read back both logging switches', () => {
        fc.assert(
          fc.property(fc.boolean(), fc.boolean(), (debug, quiet) => {
            const settings = parseSettings(
              `[logging]\ndebug = ${String(debug)}\nquiet = ${String(quiet)}\n`
            );
            expect(settings.logging).toEqual({ debug, quiet });
          })
        );
      });
    });
  });
});
