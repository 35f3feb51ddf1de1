/**
 * Square padding for rectangular matrices
 *
 * More tasks than agents: zero rows are appended (synthetic agents).
 * More agents than tasks: zero columns are appended (synthetic tasks).
 * Original entries keep their row and column positions.
 */

import {
  assignmentLogger,
  IS_ASSIGNMENT_DEBUG_ENABLED,
  type BalanceInfo,
} from '../assignment-logger';
import { PADDING_VALUE } from '../constants';
import type { Matrix } from '../types';

/**
 * Builds a row of padding entries
 *
 * @param length - Number of entries in the row
 */
function createPaddingRow(length: number): number[] {
  return new Array<number>(length).fill(PADDING_VALUE);
}

/**
 * Pads a rectangular matrix to a square one with side max(rows, columns)
 *
 * A square input is returned unchanged; callers must not rely on whether
 * the result aliases the input.
 *
 * @param matrix - Rectangular matrix with at least one row
 * @returns Square matrix
 */
export function balanceMatrix(matrix: Matrix): Matrix {
  const rows = matrix.length;
  const columns = matrix[0]?.length ?? 0;

  const paddingRows = Math.max(columns - rows, 0);
  const paddingColumns = Math.max(rows - columns, 0);

  if (IS_ASSIGNMENT_DEBUG_ENABLED) {
    const info: BalanceInfo = { rows, columns, paddingRows, paddingColumns };
    assignmentLogger.withMetadata(info).debug('Balancing matrix');
  }

  if (paddingRows > 0) {
    const extraRows = Array.from({ length: paddingRows }, () =>
      createPaddingRow(columns),
    );
    return [...matrix, ...extraRows];
  }

  if (paddingColumns > 0) {
    const extraColumns = createPaddingRow(paddingColumns);
    return matrix.map((row) => [...row, ...extraColumns]);
  }

  return matrix;
}
