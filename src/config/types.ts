/**
 * Settings types for kbgen.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Where keyboard definitions are looked up.
 */
export interface PathSettings {
  /** Root directory holding keyboard folders. Relative paths resolve against the working directory. */
  keyboards: string;
}

/**
 * Behaviour of the file output sink.
 */
export interface OutputSettings {
  /** Suffix appended to an overwritten file's path for its backup. */
  backup_suffix: string;
}

/**
 * Logger switches.
 */
export interface LoggingSettings {
  /** Emit debug-level events. */
  debug: boolean;
  /** Suppress info-level events. */
  quiet: boolean;
}

/**
 * Complete settings object parsed from kbgen.toml.
 */
export interface Settings {
  paths: PathSettings;
  output: OutputSettings;
  logging: LoggingSettings;
}

/**
 * Partial settings for merging with defaults.
 */
export interface PartialSettings {
  paths?: Partial<PathSettings>;
  output?: Partial<OutputSettings>;
  logging?: Partial<LoggingSettings>;
}
