/**
 * Task assignment solver
 *
 * Prepares a raw cost/time matrix for minimisation and resolves it with
 * either the exact Hungarian solver or the greedy heuristic.
 *
 * Stages:
 * 1. Validate: criterion first, then matrix shape
 * 2. Transform: invert the scale when optimising for time
 * 3. Balance: pad to a square matrix with zero rows or columns
 * 4. Solve: exact or greedy, on the resulting working matrix
 *
 * The working matrix is a plain immutable value; every solve takes it as
 * an argument and returns a fresh result.
 */

import {
  assignmentLogger,
  IS_ASSIGNMENT_DEBUG_ENABLED,
  type PreparationInfo,
} from './assignment-logger';
import { METHOD_EXACT } from './constants';
import { balanceMatrix } from './matrix/balance';
import { transformMatrix } from './matrix/transform';
import {
  assertRectangular,
  parseCriterion,
  parseSolverMethod,
} from './matrix/validation';
import { solveGreedyMatrix } from './solvers/greedy';
import { solveHungarian } from './solvers/hungarian';
import type {
  AssignmentResult,
  DescribedPair,
  Matrix,
  SolverComparison,
  WorkingMatrix,
} from './types';

// Re-export public API
export type {
  Assignment,
  AssignmentPair,
  AssignmentResult,
  DescribedPair,
  Matrix,
  OptimisationCriterion,
  SolverComparison,
  SolverMethod,
  WorkingMatrix,
} from './types';
export {
  AssignmentError,
  InvalidAnswerError,
  InvalidCriterionError,
  InvalidSolverMethodError,
  ShapeError,
} from './errors';
export { balanceMatrix } from './matrix/balance';
export { transformMatrix } from './matrix/transform';
export { parseRawMatrix } from './matrix/validation';
export { solveGreedyMatrix } from './solvers/greedy';
export { solveHungarian } from './solvers/hungarian';

// ============================================================================
// Preparation
// ============================================================================

/**
 * Builds the square working matrix for a solving session
 *
 * The criterion is checked before the matrix is inspected, so an invalid
 * criterion is reported even for a malformed matrix.
 *
 * @param rawMatrix - Agents (rows) by tasks (columns)
 * @param criterion - 'cost' or 'time'
 * @returns Frozen working matrix
 * @throws InvalidCriterionError for an unrecognised criterion
 * @throws ShapeError for an empty, ragged or non-finite matrix
 */
export function prepareWorkingMatrix(
  rawMatrix: Matrix,
  criterion: string,
): WorkingMatrix {
  const checkedCriterion = parseCriterion(criterion);
  const { rows, columns } = assertRectangular(rawMatrix);

  const transformed = transformMatrix(rawMatrix, checkedCriterion);
  const balanced = balanceMatrix(transformed);

  // Row-by-row snapshot: later edits to the raw input must not leak in
  const values: Matrix = Object.freeze(
    balanced.map((row) => Object.freeze([...row])),
  );

  const working: WorkingMatrix = Object.freeze({
    values,
    size: values.length,
    originalRows: rows,
    originalColumns: columns,
    criterion: checkedCriterion,
  });

  if (IS_ASSIGNMENT_DEBUG_ENABLED) {
    const info: PreparationInfo = {
      criterion: checkedCriterion,
      originalRows: rows,
      originalColumns: columns,
      size: working.size,
    };
    assignmentLogger.withMetadata(info).debug('Working matrix prepared');
  }

  return working;
}

// ============================================================================
// Solving
// ============================================================================

/**
 * Optimal assignment of the working matrix (Hungarian algorithm)
 */
export function solveExact(working: WorkingMatrix): AssignmentResult {
  return solveHungarian(working.values);
}

/**
 * Greedy assignment of the working matrix
 *
 * Not guaranteed optimal: the total can be strictly higher than
 * solveExact on the same working matrix.
 */
export function solveGreedy(working: WorkingMatrix): AssignmentResult {
  return solveGreedyMatrix(working.values);
}

/**
 * Dispatches to the solver named by a method string
 *
 * @param working - Prepared working matrix
 * @param method - 'exact' or 'greedy'
 * @throws InvalidSolverMethodError for any other method
 */
export function solveWithMethod(
  working: WorkingMatrix,
  method: string,
): AssignmentResult {
  const checkedMethod = parseSolverMethod(method);

  const isExact = checkedMethod === METHOD_EXACT;
  return isExact ? solveExact(working) : solveGreedy(working);
}

/**
 * Runs both strategies on the same working matrix
 *
 * For non-negative matrices the gap is never negative.
 */
export function compareSolvers(working: WorkingMatrix): SolverComparison {
  const exact = solveExact(working);
  const greedy = solveGreedy(working);
  const greedyGap = greedy.totalCost - exact.totalCost;

  return { exact, greedy, greedyGap };
}

// ============================================================================
// Reporting Helpers
// ============================================================================

/**
 * Annotates every pair with its value and whether it touches padding
 *
 * No pair is dropped: an agent matched to a padding task (or a padding
 * agent matched to a real task) is still reported, only flagged.
 *
 * @param working - Working matrix the result was solved against
 * @param result - Solver output
 * @returns One described pair per assignment pair, in the same order
 */
export function describeAssignment(
  working: WorkingMatrix,
  result: AssignmentResult,
): DescribedPair[] {
  return result.assignment.map(({ agentIndex, taskIndex }) => ({
    agentIndex,
    taskIndex,
    value: working.values[agentIndex][taskIndex],
    isPaddingAgent: agentIndex >= working.originalRows,
    isPaddingTask: taskIndex >= working.originalColumns,
  }));
}
