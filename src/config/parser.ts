/**
 * TOML parser for kbgen.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_LOGGING, DEFAULT_OUTPUT, DEFAULT_PATHS } from './defaults.js';
import type { LoggingSettings, OutputSettings, PathSettings, Settings } from './types.js';

/**
 * Error class for settings parsing errors.
 */
export class SettingsParseError extends Error {
  /**
   * Creates a new SettingsParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'SettingsParseError';
  }
}

type Table = Record<string, unknown>;

function describeType(value: unknown): string {
  if (Array.isArray(value)) {
    return 'array';
  }
  if (value instanceof Date) {
    return 'datetime';
  }
  return typeof value;
}

function isTable(value: unknown): value is Table {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

/**
 * Returns a top-level section as a table, or undefined when it is absent.
 *
 * @throws SettingsParseError if the key holds something other than a table.
 */
function readSection(parsed: Table, name: string): Table | undefined {
  if (!(name in parsed)) {
    return undefined;
  }
  const value = parsed[name];
  if (!isTable(value)) {
    throw new SettingsParseError(
      `Invalid type for '${name}': expected table, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @throws SettingsParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new SettingsParseError(
      `Invalid type for '${fieldPath}': expected string, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @throws SettingsParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new SettingsParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${describeType(value)}`
    );
  }
  return value;
}

function parsePaths(raw: Table | undefined): PathSettings {
  const result: PathSettings = { ...DEFAULT_PATHS };

  if (raw !== undefined && 'keyboards' in raw) {
    result.keyboards = validateString(raw.keyboards, 'paths.keyboards');
  }

  return result;
}

function parseOutput(raw: Table | undefined): OutputSettings {
  const result: OutputSettings = { ...DEFAULT_OUTPUT };

  if (raw !== undefined && 'backup_suffix' in raw) {
    result.backup_suffix = validateString(raw.backup_suffix, 'output.backup_suffix');
  }

  return result;
}

function parseLogging(raw: Table | undefined): LoggingSettings {
  const result: LoggingSettings = { ...DEFAULT_LOGGING };

  if (raw === undefined) {
    return result;
  }
  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  if ('quiet' in raw) {
    result.quiet = validateBoolean(raw.quiet, 'logging.quiet');
  }

  return result;
}

/**
 * Parses a TOML string into validated settings.
 *
 * Unknown sections and keys are ignored.
 *
 * @param tomlContent - Raw TOML content.
 * @returns Settings with defaults applied for missing fields.
 * @throws SettingsParseError for invalid TOML syntax or wrongly typed fields.
 *
 * @example
 * ```typescript
 * const settings = parseSettings(`
 * [paths]
 * keyboards = "vendor/keyboards"
 * `);
 * settings.paths.keyboards; // "vendor/keyboards"
 * settings.output.backup_suffix; // ".bak"
 * ```
 */
export function parseSettings(tomlContent: string): Settings {
  let parsed: Table;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new SettingsParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    paths: parsePaths(readSection(parsed, 'paths')),
    output: parseOutput(readSection(parsed, 'output')),
    logging: parseLogging(readSection(parsed, 'logging')),
  };
}
