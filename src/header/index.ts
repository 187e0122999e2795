/**
 * Header generator: keyboard definition in, guarded C macros out.
 *
 * @packageDocumentation
 */

export {
  HEADER_COMMENT,
  NO_PIN,
  USB_PROPERTIES,
  colPins,
  diodeDirection,
  directPins,
  generateConfigH,
  guardedDefine,
  keyboardName,
  manufacturer,
  renderConfigH,
  rowPins,
  usbProperties,
} from './config-h.js';
export type { HeaderText } from './config-h.js';
export { MatrixShapeError } from './errors.js';
export type { MatrixShapeProblem } from './errors.js';
