/**
 * Resolves a keyboard name to its merged definition.
 *
 * A keyboard lives at `<keyboardsDir>/<name>`, where the name may be nested
 * (`clueboard/66/rev3`). Each level may carry its own info.json; deeper levels
 * override shallower ones, and a keymap's info.json overrides them all.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import type { Logger } from '../utils/logger.js';
import { safeExists, safeReadFile, safeStat } from '../utils/safe-fs.js';
import {
  KeyboardInfoError,
  KeyboardNotFoundError,
  KeymapNotFoundError,
} from './errors.js';
import { isJsonObject, mergeInfo, type JsonObject } from './merge.js';
import { validateKeyboardInfo } from './schema.js';
import type { KeyboardInfo } from './types.js';

/** File name of a keyboard definition at any level. */
export const INFO_FILE = 'info.json';

/** Files whose presence marks a directory as a buildable keyboard. */
export const KEYBOARD_MARKERS: readonly string[] = ['rules.mk', INFO_FILE];

/**
 * Options for {@link resolveKeyboardInfo}.
 */
export interface ResolveKeyboardOptions {
  /** Root directory holding all keyboard folders. */
  keyboardsDir: string;
  /** Keyboard name relative to `keyboardsDir`, `/`-separated. */
  keyboard: string;
  /** Optional keymap whose info.json is merged last. */
  keymap?: string | undefined;
  /** Receives `info_files_loaded` at debug level. */
  logger?: Logger | undefined;
}

/**
 * A merged keyboard definition together with the files it came from.
 */
export interface ResolvedKeyboard {
  readonly info: KeyboardInfo;
  /** info.json files in merge order. */
  readonly files: readonly string[];
}

function isMissingPathError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await safeStat(dirPath)).isDirectory();
  } catch (error) {
    if (isMissingPathError(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Splits a keyboard name into path segments.
 *
 * @returns The segments, or undefined when the name is empty, absolute, or
 *   would step outside the keyboards directory.
 */
export function keyboardSegments(keyboard: string): string[] | undefined {
  if (keyboard === '' || keyboard.includes('\\') || keyboard.startsWith('/')) {
    return undefined;
  }

  const segments = keyboard.split('/');
  if (segments.some((s) => s === '' || s === '.' || s === '..')) {
    return undefined;
  }

  return segments;
}

/**
 * Checks whether a keyboard name refers to a keyboard directory.
 *
 * @param keyboardsDir - Root directory holding all keyboard folders.
 * @param keyboard - Keyboard name, e.g. `clueboard/66/rev3`.
 */
export async function isKeyboard(keyboardsDir: string, keyboard: string): Promise<boolean> {
  const segments = keyboardSegments(keyboard);
  if (segments === undefined) {
    return false;
  }

  const keyboardDir = path.join(keyboardsDir, ...segments);
  if (!(await isDirectory(keyboardDir))) {
    return false;
  }

  for (const marker of KEYBOARD_MARKERS) {
    if (await safeExists(path.join(keyboardDir, marker))) {
      return true;
    }
  }
  return false;
}

async function findKeymapDir(
  keyboardsDir: string,
  segments: readonly string[],
  keyboard: string,
  keymap: string
): Promise<string> {
  const invalidName =
    keymap === '' || keymap === '.' || keymap === '..' || /[\\/]/.test(keymap);
  if (invalidName) {
    throw new KeymapNotFoundError(keyboard, keymap);
  }

  for (let depth = segments.length; depth > 0; depth--) {
    const candidate = path.join(keyboardsDir, ...segments.slice(0, depth), 'keymaps', keymap);
    if (await isDirectory(candidate)) {
      return candidate;
    }
  }

  throw new KeymapNotFoundError(keyboard, keymap);
}

/**
 * Lists the info.json files that make up a keyboard's definition, in merge order.
 *
 * @param keyboardsDir - Root directory holding all keyboard folders.
 * @param keyboard - Keyboard name.
 * @param keymap - Keymap whose info.json goes last. The nearest `keymaps/<keymap>`
 *   folder, searching from the keyboard's own directory upwards, is used.
 * @throws {KeyboardNotFoundError} If the name is not a valid relative path.
 * @throws {KeymapNotFoundError} If a keymap is given but no folder for it exists.
 */
export async function findInfoJsonFiles(
  keyboardsDir: string,
  keyboard: string,
  keymap?: string
): Promise<string[]> {
  const segments = keyboardSegments(keyboard);
  if (segments === undefined) {
    throw new KeyboardNotFoundError(keyboard);
  }

  const files: string[] = [];

  for (let depth = 1; depth <= segments.length; depth++) {
    const candidate = path.join(keyboardsDir, ...segments.slice(0, depth), INFO_FILE);
    if (await safeExists(candidate)) {
      files.push(candidate);
    }
  }

  if (keymap !== undefined) {
    const keymapDir = await findKeymapDir(keyboardsDir, segments, keyboard, keymap);
    const candidate = path.join(keymapDir, INFO_FILE);
    if (await safeExists(candidate)) {
      files.push(candidate);
    }
  }

  return files;
}

/**
 * Reads, parses and schema-checks a single info.json.
 *
 * @param file - Path to the file.
 * @throws {KeyboardInfoError} If the file cannot be read, is not a JSON object,
 *   or fails the schema.
 */
export async function readInfoFile(file: string): Promise<JsonObject> {
  let text: string;
  try {
    text = await safeReadFile(file);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new KeyboardInfoError(file, `cannot be read: ${reason}`, [], error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new KeyboardInfoError(file, `is not valid JSON: ${reason}`, [], error);
  }

  if (!isJsonObject(parsed)) {
    throw new KeyboardInfoError(file, 'expected a JSON object at the top level');
  }

  await validateKeyboardInfo(parsed, file);
  return parsed;
}

/**
 * Resolves a keyboard (and optionally a keymap) to its merged definition.
 *
 * @throws {KeyboardNotFoundError} If the keyboard does not exist.
 * @throws {KeymapNotFoundError} If a keymap is given but not found.
 * @throws {KeyboardInfoError} If any info.json, or the merged result, is invalid.
 *
 * @example
 * ```typescript
 * const { info } = await resolveKeyboardInfo({
 *   keyboardsDir: 'keyboards',
 *   keyboard: 'clueboard/66/rev3',
 * });
 * ```
 */
export async function resolveKeyboardInfo(
  options: ResolveKeyboardOptions
): Promise<ResolvedKeyboard> {
  const { keyboardsDir, keyboard, keymap, logger } = options;

  if (!(await isKeyboard(keyboardsDir, keyboard))) {
    throw new KeyboardNotFoundError(keyboard);
  }

  const files = await findInfoJsonFiles(keyboardsDir, keyboard, keymap);

  let merged: JsonObject = {};
  for (const file of files) {
    merged = mergeInfo(merged, await readInfoFile(file));
  }

  const label = keymap !== undefined ? `${keyboard}:${keymap}` : keyboard;
  const info = await validateKeyboardInfo(merged, `${label} (merged)`);

  logger?.debug('info_files_loaded', { keyboard, keymap, files });

  return { info, files };
}
