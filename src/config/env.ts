/**
 * Environment variable overrides for settings.
 *
 * Provides support for KBGEN_* environment variables to override settings at
 * runtime. Environment variables take precedence over the settings file, which
 * takes precedence over defaults.
 *
 * Override precedence: env > settings file > defaults
 *
 * @packageDocumentation
 */

import type {
  LoggingSettings,
  OutputSettings,
  PartialSettings,
  PathSettings,
  Settings,
} from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvMapping =
  | { section: 'paths'; field: keyof PathSettings; type: 'string'; description: string }
  | { section: 'output'; field: keyof OutputSettings; type: 'string'; description: string }
  | { section: 'logging'; field: keyof LoggingSettings; type: 'boolean'; description: string };

/**
 * Mapping from environment variable names to settings paths.
 *
 * Format: KBGEN_<SECTION>_<FIELD> maps to settings.<section>.<field>.
 * Shortcuts come first so that the full name wins when both are set.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  // Shortcuts
  KBGEN_KEYBOARDS: {
    section: 'paths',
    field: 'keyboards',
    type: 'string',
    description: 'Override the keyboards directory (shortcut for KBGEN_PATHS_KEYBOARDS)',
  },
  KBGEN_DEBUG: {
    section: 'logging',
    field: 'debug',
    type: 'boolean',
    description: 'Enable debug logging (shortcut for KBGEN_LOGGING_DEBUG)',
  },
  KBGEN_QUIET: {
    section: 'logging',
    field: 'quiet',
    type: 'boolean',
    description: 'Suppress info logging (shortcut for KBGEN_LOGGING_QUIET)',
  },

  // Full paths
  KBGEN_PATHS_KEYBOARDS: {
    section: 'paths',
    field: 'keyboards',
    type: 'string',
    description: 'Override the keyboards directory',
  },
  KBGEN_OUTPUT_BACKUP_SUFFIX: {
    section: 'output',
    field: 'backup_suffix',
    type: 'string',
    description: 'Override the suffix used for backups of overwritten files',
  },
  KBGEN_LOGGING_DEBUG: {
    section: 'logging',
    field: 'debug',
    type: 'boolean',
    description: 'Enable or disable debug logging (true/false)',
  },
  KBGEN_LOGGING_QUIET: {
    section: 'logging',
    field: 'quiet',
    type: 'boolean',
    description: 'Enable or disable quiet mode (true/false)',
  },
};

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  if (TRUTHY.includes(trimmed)) {
    return true;
  }

  if (FALSY.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...TRUTHY, ...FALSY].join(', ')}`
  );
}

function applyMapping(
  overrides: PartialSettings,
  mapping: EnvMapping,
  value: string,
  envVar: string
): void {
  switch (mapping.section) {
    case 'paths': {
      const paths = { ...overrides.paths };
      paths[mapping.field] = value;
      overrides.paths = paths;
      return;
    }
    case 'output': {
      const output = { ...overrides.output };
      output[mapping.field] = value;
      overrides.output = output;
      return;
    }
    case 'logging': {
      const logging = { ...overrides.logging };
      logging[mapping.field] = coerceToBoolean(value, envVar);
      overrides.logging = logging;
      return;
    }
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial settings with values from environment variables. */
  overrides: PartialSettings;
  /** List of environment variables that were applied. */
  appliedVars: string[];
}

/**
 * Reads environment variables and returns settings overrides.
 *
 * Empty values are treated as unset.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @returns Result containing overrides and the variables that produced them.
 * @throws {EnvCoercionError} On the first value that cannot be coerced.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ KBGEN_KEYBOARDS: '/src/keyboards' });
 * result.overrides.paths?.keyboards; // "/src/keyboards"
 * result.appliedVars; // ["KBGEN_KEYBOARDS"]
 * ```
 */
export function readEnvOverrides(env: EnvRecord = process.env): EnvOverrideResult {
  const overrides: PartialSettings = {};
  const appliedVars: string[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    applyMapping(overrides, mapping, value, envVar);
    appliedVars.push(envVar);
  }

  return { overrides, appliedVars };
}

/**
 * Merges partial settings into complete settings.
 *
 * @param base - The base settings.
 * @param partial - The partial settings to merge.
 * @returns New settings with partial values merged in.
 */
export function mergeSettings(base: Settings, partial: PartialSettings): Settings {
  return {
    paths: { ...base.paths, ...partial.paths },
    output: { ...base.output, ...partial.output },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to settings.
 *
 * @param settings - The base settings to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The settings with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(settings: Settings, env: EnvRecord = process.env): Settings {
  const { overrides } = readEnvOverrides(env);

  return mergeSettings(settings, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
