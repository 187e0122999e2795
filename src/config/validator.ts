/**
 * Semantic validation for settings values.
 *
 * Checks what the parser's type checks cannot:
 * - The keyboards directory is a non-empty path
 * - The backup suffix is non-empty and stays beside the target file
 *
 * @packageDocumentation
 */

import type { Settings } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class SettingsValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new SettingsValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'SettingsValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

function validatePaths(settings: Settings, errors: ValidationError[]): void {
  const { keyboards } = settings.paths;

  if (keyboards.trim() === '') {
    errors.push({
      field: 'paths.keyboards',
      value: keyboards,
      message: 'Keyboards directory must not be empty',
    });
  } else if (keyboards.includes('\0')) {
    errors.push({
      field: 'paths.keyboards',
      value: keyboards,
      message: 'Keyboards directory must not contain null bytes',
    });
  }
}

function validateOutput(settings: Settings, errors: ValidationError[]): void {
  const suffix = settings.output.backup_suffix;

  if (suffix === '') {
    errors.push({
      field: 'output.backup_suffix',
      value: suffix,
      message: 'Backup suffix must not be empty',
    });
  } else if (/[/\\\0]/.test(suffix)) {
    errors.push({
      field: 'output.backup_suffix',
      value: suffix,
      message: `Backup suffix '${suffix}' must not contain path separators or null bytes`,
    });
  }
}

/**
 * Validates settings semantically.
 *
 * @param settings - The parsed settings to validate.
 * @returns Validation result with every error found.
 */
export function validateSettings(settings: Settings): ValidationResult {
  const errors: ValidationError[] = [];

  validatePaths(settings, errors);
  validateOutput(settings, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates settings and throws if invalid.
 *
 * @param settings - The parsed settings to validate.
 * @throws SettingsValidationError if validation fails.
 */
export function assertSettingsValid(settings: Settings): void {
  const result = validateSettings(settings);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new SettingsValidationError(
      `Settings validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
