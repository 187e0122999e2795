/**
 * Loads the effective settings for a run.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { safeExists, safeReadFile } from '../utils/safe-fs.js';
import { DEFAULT_SETTINGS, SETTINGS_FILE } from './defaults.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { parseSettings, SettingsParseError } from './parser.js';
import type { Settings } from './types.js';
import { assertSettingsValid } from './validator.js';

/**
 * Options for {@link loadSettings}.
 */
export interface LoadSettingsOptions {
  /** Directory holding kbgen.toml and against which relative paths resolve. */
  cwd?: string | undefined;
  /** Environment to read KBGEN_* overrides from. */
  env?: EnvRecord | undefined;
}

/**
 * Reads kbgen.toml from `cwd` if it exists, applies environment overrides,
 * validates the result and resolves `paths.keyboards` to an absolute path.
 *
 * @throws SettingsParseError if the file is not valid settings TOML.
 * @throws EnvCoercionError if an override cannot be coerced.
 * @throws SettingsValidationError if the merged settings are invalid.
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<Settings> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const file = path.join(cwd, SETTINGS_FILE);

  let settings: Settings = DEFAULT_SETTINGS;
  if (await safeExists(file)) {
    try {
      settings = parseSettings(await safeReadFile(file));
    } catch (error) {
      if (error instanceof SettingsParseError) {
        throw new SettingsParseError(`${file}: ${error.message}`, error);
      }
      throw error;
    }
  }

  settings = applyEnvOverrides(settings, env);
  assertSettingsValid(settings);

  return {
    ...settings,
    paths: { ...settings.paths, keyboards: path.resolve(cwd, settings.paths.keyboards) },
  };
}
