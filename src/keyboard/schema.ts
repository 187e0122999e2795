/**
 * JSON-schema validation of keyboard definitions.
 *
 * @packageDocumentation
 */

import AjvModule from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import { fileURLToPath } from 'node:url';
import { safeReadFile } from '../utils/safe-fs.js';
import { KeyboardInfoError } from './errors.js';
import type { KeyboardInfo } from './types.js';

// ajv ships CommonJS; under NodeNext the class sits on the default export's `default`.
const Ajv = AjvModule.default;

/**
 * Location of the bundled keyboard schema.
 */
export const KEYBOARD_SCHEMA_PATH = fileURLToPath(
  new URL('../../schemas/keyboard.schema.json', import.meta.url)
);

let validatorPromise: Promise<ValidateFunction<KeyboardInfo>> | undefined;

async function compileValidator(): Promise<ValidateFunction<KeyboardInfo>> {
  const schema: SchemaObject = JSON.parse(await safeReadFile(KEYBOARD_SCHEMA_PATH));
  if (typeof schema !== 'object' || schema === null || Array.isArray(schema)) {
    throw new Error(`Keyboard schema at ${KEYBOARD_SCHEMA_PATH} is not a JSON object`);
  }

  const ajv = new Ajv({ allErrors: true });
  return ajv.compile<KeyboardInfo>(schema);
}

/**
 * Returns the compiled keyboard validator, compiling it on first use.
 * A failed compile is not cached; the next call tries again.
 */
export function getKeyboardValidator(): Promise<ValidateFunction<KeyboardInfo>> {
  validatorPromise ??= compileValidator().catch((error: unknown) => {
    validatorPromise = undefined;
    throw error;
  });
  return validatorPromise;
}

/**
 * Formats ajv errors as `instancePath: message` lines.
 *
 * @param errors - Errors from a failed validation.
 */
export function formatSchemaErrors(errors: readonly ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(
    (e) => `${e.instancePath === '' ? '/' : e.instancePath}: ${e.message ?? 'Unknown error'}`
  );
}

/**
 * Validates data against the keyboard schema.
 *
 * @param data - Parsed info.json content (or a merge of several).
 * @param source - Label used in error messages, usually a file path.
 * @returns The same data, typed.
 * @throws {KeyboardInfoError} Listing every schema violation.
 */
export async function validateKeyboardInfo(data: unknown, source: string): Promise<KeyboardInfo> {
  const validate = await getKeyboardValidator();

  if (!validate(data)) {
    throw new KeyboardInfoError(
      source,
      'does not match the keyboard schema',
      formatSchemaErrors(validate.errors)
    );
  }

  return data;
}
