/**
 * Deep merge for info.json documents.
 *
 * @packageDocumentation
 */

/**
 * A parsed JSON object.
 */
export type JsonObject = Record<string, unknown>;

/**
 * Narrows a value to a plain (non-array) JSON object.
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merges `overlay` onto `base` without mutating either.
 *
 * Nested objects are merged key by key. Arrays and scalars in the overlay
 * replace the base value outright, so a child keyboard's `matrix_pins.cols`
 * fully supersedes its parent's.
 *
 * @example
 * ```typescript
 * mergeInfo({ usb: { vid: '0xFEED', pid: '0x0001' } }, { usb: { pid: '0x0002' } });
 * // { usb: { vid: '0xFEED', pid: '0x0002' } }
 * ```
 */
export function mergeInfo(base: JsonObject, overlay: JsonObject): JsonObject {
  const result: JsonObject = { ...base };

  for (const [key, value] of Object.entries(overlay)) {
    if (key === '__proto__') {
      continue;
    }
    const existing = result[key];
    result[key] = isJsonObject(existing) && isJsonObject(value) ? mergeInfo(existing, value) : value;
  }

  return result;
}
