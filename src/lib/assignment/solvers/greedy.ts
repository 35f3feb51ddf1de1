/**
 * Greedy minimum-selection heuristic for the square assignment problem
 *
 * Repeatedly takes the smallest entry among rows and columns that are
 * still available, records it, and retires its row and column. After N
 * rounds every row and column has been used exactly once.
 *
 * This is an approximation: on the same matrix it can return a strictly
 * higher total than solveHungarian. That is expected, not a defect.
 *
 * Time Complexity: O(N³)
 */

import {
  assignmentLogger,
  IS_ASSIGNMENT_DEBUG_ENABLED,
  type GreedySelectionInfo,
  type SolveCompletionInfo,
} from '../assignment-logger';
import { METHOD_GREEDY } from '../constants';
import { assertSquare } from '../matrix/validation';
import type { AssignmentPair, AssignmentResult, Matrix } from '../types';
import { computeTotalCost } from './total-cost';

/** Entry chosen in one greedy round */
interface Selection {
  readonly row: number;
  readonly column: number;
  readonly value: number;
}

/**
 * Finds the smallest entry among available rows and columns
 *
 * Scans in row-major order and only replaces the candidate on a strictly
 * smaller value, so ties go to the lowest row, then the lowest column.
 *
 * @param matrix - Square matrix
 * @param rowAvailable - Rows not yet assigned
 * @param columnAvailable - Columns not yet assigned
 * @returns The selected entry, or null when nothing is available
 */
export function findMinimumAvailable(
  matrix: Matrix,
  rowAvailable: readonly boolean[],
  columnAvailable: readonly boolean[],
): Selection | null {
  let best: Selection | null = null;

  for (let row = 0; row < matrix.length; row++) {
    if (rowAvailable[row]) {
      const rowValues = matrix[row];

      for (let column = 0; column < rowValues.length; column++) {
        const value = rowValues[column];
        const isCandidate = columnAvailable[column];
        const isBetter = best === null || value < best.value;

        if (isCandidate && isBetter) {
          best = { row, column, value };
        }
      }
    }
  }

  return best;
}

/**
 * Computes an assignment by greedy minimum selection
 *
 * The returned pairs are in selection order, not agent order. The total
 * may exceed the optimum; compare with solveHungarian when that matters.
 *
 * @param matrix - Square cost matrix
 * @returns Assignment covering every row and column once, and its total
 * @throws ShapeError if the matrix is empty, ragged or not square
 */
export function solveGreedyMatrix(matrix: Matrix): AssignmentResult {
  const size = assertSquare(matrix);

  const rowAvailable = new Array<boolean>(size).fill(true);
  const columnAvailable = new Array<boolean>(size).fill(true);
  const assignment: AssignmentPair[] = [];

  for (let round = 1; round <= size; round++) {
    const selection = findMinimumAvailable(
      matrix,
      rowAvailable,
      columnAvailable,
    );

    if (selection === null) {
      throw new Error(`No available entry left in round ${round}`);
    }

    if (IS_ASSIGNMENT_DEBUG_ENABLED) {
      const info: GreedySelectionInfo = { round, ...selection };
      assignmentLogger.withMetadata(info).debug('Greedy selection');
    }

    rowAvailable[selection.row] = false;
    columnAvailable[selection.column] = false;
    assignment.push({
      agentIndex: selection.row,
      taskIndex: selection.column,
    });
  }

  const totalCost = computeTotalCost(matrix, assignment);

  if (IS_ASSIGNMENT_DEBUG_ENABLED) {
    const info: SolveCompletionInfo = {
      method: METHOD_GREEDY,
      size,
      totalCost,
    };
    assignmentLogger.withMetadata(info).debug('Greedy solve completed');
  }

  return { assignment, totalCost };
}
