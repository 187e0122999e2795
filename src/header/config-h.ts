/**
 * Generates `info_config.h` text from a resolved keyboard definition.
 *
 * Every macro is wrapped in an `#ifndef` guard so that a definition made
 * earlier in the firmware build (a user's own config.h) always wins. The
 * builders here are pure: no I/O, no clock, no shared state.
 *
 * @packageDocumentation
 */

import type { KeyboardInfo, MatrixPins, UsbInfo } from '../keyboard/types.js';
import { MatrixShapeError } from './errors.js';

/**
 * Ordered lines of a generated header.
 */
export type HeaderText = readonly string[];

/**
 * First line of every generated header.
 */
export const HEADER_COMMENT =
  '/* This file was generated by the config generator. Do not edit or copy. */';

/**
 * Placeholder for an unconnected position in a direct-pin grid.
 */
export const NO_PIN = 'NO_PIN';

/**
 * USB info.json keys and the macros they define, in emission order.
 */
export const USB_PROPERTIES: readonly (readonly [keyof UsbInfo, string])[] = [
  ['vid', 'VENDOR_ID'],
  ['pid', 'PRODUCT_ID'],
  ['device_ver', 'DEVICE_VER'],
];

/**
 * Returns the `#ifndef` / `#define` / `#endif` triple for one macro.
 *
 * @param name - Macro name.
 * @param value - Replacement text, substituted verbatim.
 */
export function guardedDefine(name: string, value: string | number): HeaderText {
  return [`#ifndef ${name}`, `#    define ${name} ${String(value)}`, `#endif // ${name}`];
}

function fragment(...defines: (readonly [string, string | number])[]): HeaderText {
  return defines.flatMap(([name, value]) => ['', ...guardedDefine(name, value)]);
}

function braceList(items: readonly string[]): string {
  return `{${items.join(',')}}`;
}

/**
 * Lines that set the diode direction.
 */
export function diodeDirection(value: string): HeaderText {
  return fragment(['DIODE_DIRECTION', value]);
}

/**
 * Lines that set the keyboard's name. `DESCRIPTION` and `PRODUCT` carry the same value.
 */
export function keyboardName(value: string): HeaderText {
  return fragment(['DESCRIPTION', value], ['PRODUCT', value]);
}

/**
 * Lines that set the manufacturer.
 */
export function manufacturer(value: string): HeaderText {
  return fragment(['MANUFACTURER', value]);
}

/**
 * Lines that set the matrix size and the direct pin grid.
 *
 * The column count is the length of the first row; every other row must match it.
 *
 * @param grid - One inner array per row.
 * @throws {MatrixShapeError} If the grid has no rows, an empty first row, or ragged rows.
 */
export function directPins(grid: NonNullable<MatrixPins['direct']>): HeaderText {
  const field = 'matrix_pins.direct';
  const [firstRow] = grid;

  if (firstRow === undefined) {
    throw new MatrixShapeError(field, 'no_rows', 'expected at least one row');
  }
  if (firstRow.length === 0) {
    throw new MatrixShapeError(field, 'no_columns', 'row 0 has no columns', 0);
  }

  const colCount = firstRow.length;
  const raggedIndex = grid.findIndex((row) => row.length !== colCount);
  if (raggedIndex !== -1) {
    throw new MatrixShapeError(
      field,
      'ragged_row',
      `row ${String(raggedIndex)} has ${String(grid[raggedIndex]?.length ?? 0)} columns, expected ${String(colCount)}`,
      raggedIndex
    );
  }

  const rows = grid.map((row) =>
    braceList(row.map((cell) => (cell !== null && cell !== '' ? cell : NO_PIN)))
  );

  return fragment(
    ['MATRIX_COLS', colCount],
    ['MATRIX_ROWS', grid.length],
    ['DIRECT_PINS', braceList(rows)]
  );
}

/**
 * Lines that set the column count and column pins.
 */
export function colPins(pins: readonly string[]): HeaderText {
  return fragment(['MATRIX_COLS', pins.length], ['MATRIX_COL_PINS', braceList(pins)]);
}

/**
 * Lines that set the row count and row pins.
 */
export function rowPins(pins: readonly string[]): HeaderText {
  return fragment(['MATRIX_ROWS', pins.length], ['MATRIX_ROW_PINS', braceList(pins)]);
}

/**
 * Lines for whichever USB identifiers are present, in `USB_PROPERTIES` order.
 */
export function usbProperties(usb: UsbInfo): HeaderText {
  return USB_PROPERTIES.flatMap(([key, macro]) => {
    const value = usb[key];
    return value !== undefined ? fragment([macro, value]) : [];
  });
}

/**
 * Builds the full header for a keyboard, one array entry per line.
 *
 * Absent fields produce no lines. Blocks always appear in this order: diode
 * direction, name, manufacturer, direct pins, column pins, row pins, USB.
 *
 * @param info - Merged keyboard definition.
 * @throws {MatrixShapeError} If `matrix_pins.direct` is malformed.
 *
 * @example
 * ```typescript
 * generateConfigH({ diode_direction: 'COL2ROW' });
 * // [HEADER_COMMENT, '', '#pragma once', '', '#ifndef DIODE_DIRECTION', ...]
 * ```
 */
export function generateConfigH(info: KeyboardInfo): HeaderText {
  const lines: string[] = [HEADER_COMMENT, '', '#pragma once'];

  if (info.diode_direction !== undefined) {
    lines.push(...diodeDirection(info.diode_direction));
  }

  if (info.keyboard_name !== undefined) {
    lines.push(...keyboardName(info.keyboard_name));
  }

  if (info.manufacturer !== undefined) {
    lines.push(...manufacturer(info.manufacturer));
  }

  const pins = info.matrix_pins;
  if (pins !== undefined) {
    if (pins.direct !== undefined) {
      lines.push(...directPins(pins.direct));
    }
    if (pins.cols !== undefined) {
      lines.push(...colPins(pins.cols));
    }
    if (pins.rows !== undefined) {
      lines.push(...rowPins(pins.rows));
    }
  }

  if (info.usb !== undefined) {
    lines.push(...usbProperties(info.usb));
  }

  return lines;
}

/**
 * Renders the header as file contents: lines joined by `\n` with a trailing newline.
 *
 * @param info - Merged keyboard definition.
 */
export function renderConfigH(info: KeyboardInfo): string {
  return generateConfigH(info).join('\n') + '\n';
}
