/**
 * Errors raised by the header generator.
 *
 * @packageDocumentation
 */

import { ConfigurationError } from '../keyboard/errors.js';

/**
 * Reasons a direct-pin grid cannot be turned into matrix dimensions.
 */
export type MatrixShapeProblem = 'no_rows' | 'no_columns' | 'ragged_row';

/**
 * `matrix_pins.direct` is empty or not rectangular.
 */
export class MatrixShapeError extends ConfigurationError {
  /** Dotted path of the offending field. */
  public readonly field: string;
  /** What is wrong with the grid. */
  public readonly problem: MatrixShapeProblem;
  /** Index of the first offending row, when one row is to blame. */
  public readonly rowIndex: number | undefined;

  /**
   * @param field - Dotted path of the offending field.
   * @param problem - What is wrong with the grid.
   * @param message - Human-readable description.
   * @param rowIndex - Index of the first offending row.
   */
  constructor(field: string, problem: MatrixShapeProblem, message: string, rowIndex?: number) {
    super(`Invalid '${field}': ${message}`);
    this.name = 'MatrixShapeError';
    this.field = field;
    this.problem = problem;
    this.rowIndex = rowIndex;
  }
}
