/**
 * Settings module for kbgen.toml parsing and validation.
 *
 * Override precedence: CLI flags > env > settings file > defaults
 *
 * @packageDocumentation
 */

export { SettingsParseError, parseSettings } from './parser.js';
export type {
  LoggingSettings,
  OutputSettings,
  PartialSettings,
  PathSettings,
  Settings,
} from './types.js';
export {
  DEFAULT_LOGGING,
  DEFAULT_OUTPUT,
  DEFAULT_PATHS,
  DEFAULT_SETTINGS,
  SETTINGS_FILE,
} from './defaults.js';
export { SettingsValidationError, assertSettingsValid, validateSettings } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeSettings,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { loadSettings } from './loader.js';
export type { LoadSettingsOptions } from './loader.js';
