/**
 * Default values for kbgen.toml.
 *
 * @packageDocumentation
 */

import type { LoggingSettings, OutputSettings, PathSettings, Settings } from './types.js';

/** Name of the settings file looked up in the working directory. */
export const SETTINGS_FILE = 'kbgen.toml';

export const DEFAULT_PATHS: PathSettings = {
  keyboards: 'keyboards',
};

export const DEFAULT_OUTPUT: OutputSettings = {
  backup_suffix: '.bak',
};

export const DEFAULT_LOGGING: LoggingSettings = {
  debug: false,
  quiet: false,
};

/**
 * Complete default settings.
 */
export const DEFAULT_SETTINGS: Settings = {
  paths: DEFAULT_PATHS,
  output: DEFAULT_OUTPUT,
  logging: DEFAULT_LOGGING,
};
