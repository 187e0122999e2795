/**
 * Keyboard resolution: name in, merged and schema-checked definition out.
 *
 * @packageDocumentation
 */

export {
  ConfigurationError,
  KeyboardInfoError,
  KeyboardNotFoundError,
  KeymapNotFoundError,
} from './errors.js';
export { isJsonObject, mergeInfo } from './merge.js';
export type { JsonObject } from './merge.js';
export {
  INFO_FILE,
  KEYBOARD_MARKERS,
  findInfoJsonFiles,
  isKeyboard,
  keyboardSegments,
  readInfoFile,
  resolveKeyboardInfo,
} from './resolver.js';
export type { ResolveKeyboardOptions, ResolvedKeyboard } from './resolver.js';
export {
  KEYBOARD_SCHEMA_PATH,
  formatSchemaErrors,
  getKeyboardValidator,
  validateKeyboardInfo,
} from './schema.js';
export type { KeyboardInfo, MatrixPins, UsbInfo, UsbValue } from './types.js';
