/**
 * Criterion transform for raw matrices
 *
 * Both solvers minimise. Optimising for cost uses the matrix as given;
 * optimising for time inverts the scale (maxValue - entry) so that the
 * most desirable entries become the smallest.
 */

import {
  assignmentLogger,
  IS_ASSIGNMENT_DEBUG_ENABLED,
  type TimeTransformInfo,
} from '../assignment-logger';
import { CRITERION_COST } from '../constants';
import type { Matrix } from '../types';
import { parseCriterion } from './validation';

/**
 * Finds the largest entry of a matrix
 *
 * @param matrix - Non-empty matrix
 * @returns Maximum value over all entries
 */
export function findMaxValue(matrix: Matrix): number {
  let maxValue = -Infinity;

  for (const row of matrix) {
    for (const value of row) {
      if (value > maxValue) {
        maxValue = value;
      }
    }
  }

  return maxValue;
}

/**
 * Inverts every entry against the matrix maximum
 *
 * The maximal entry becomes 0 and zeros become the maximum.
 */
function invertAgainstMax(matrix: Matrix): Matrix {
  const maxValue = findMaxValue(matrix);

  if (IS_ASSIGNMENT_DEBUG_ENABLED) {
    const info: TimeTransformInfo = { maxValue };
    assignmentLogger.withMetadata(info).debug('Inverting matrix for time');
  }

  return matrix.map((row) => row.map((value) => maxValue - value));
}

/**
 * Converts a raw matrix according to the optimisation criterion
 *
 * - 'cost': identity, the input itself is returned
 * - 'time': every entry becomes maxValue - entry
 *
 * The criterion is validated before any work is done.
 *
 * @param matrix - Raw cost/time matrix
 * @param criterion - 'cost' or 'time'
 * @returns Matrix ready for minimisation
 * @throws InvalidCriterionError for any other criterion
 */
export function transformMatrix(matrix: Matrix, criterion: string): Matrix {
  const checkedCriterion = parseCriterion(criterion);

  const isCostCriterion = checkedCriterion === CRITERION_COST;
  if (isCostCriterion) {
    return matrix;
  }

  return invertAgainstMax(matrix);
}
