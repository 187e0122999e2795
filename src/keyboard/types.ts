/**
 * Types for resolved keyboard definitions.
 *
 * @packageDocumentation
 */

/**
 * A USB descriptor value as written in info.json: `"0x1234"` or a plain number.
 */
export type UsbValue = string | number;

/**
 * Electrical wiring of the key matrix.
 */
export interface MatrixPins {
  /**
   * Directly wired pins, one inner array per row. `null` or `""` marks an
   * unconnected position.
   */
  readonly direct?: readonly (readonly (string | null)[])[];
  /** Column pins, in column order. */
  readonly cols?: readonly string[];
  /** Row pins, in row order. */
  readonly rows?: readonly string[];
}

/**
 * USB identifiers.
 */
export interface UsbInfo {
  readonly vid?: UsbValue;
  readonly pid?: UsbValue;
  readonly device_ver?: UsbValue;
}

/**
 * A keyboard definition after keyboard-level and keymap-level info.json files
 * have been merged. Every field is optional; keys not listed here are kept
 * but never read by the header generator.
 */
export interface KeyboardInfo {
  readonly diode_direction?: string;
  readonly keyboard_name?: string;
  readonly manufacturer?: string;
  readonly matrix_pins?: MatrixPins;
  readonly usb?: UsbInfo;
  readonly [key: string]: unknown;
}
