/**
 * Input validation for raw matrices, criteria and solver methods.
 *
 * Zod schemas describe the accepted shapes of untyped input (JSON files,
 * CLI arguments); the assert helpers enforce the matrix shape invariants
 * and raise the domain errors the rest of the library expects.
 */

import * as z from 'zod';

import {
  MIN_MATRIX_DIMENSION,
  OPTIMISATION_CRITERIA,
  SOLVER_METHODS,
} from '../constants';
import {
  InvalidCriterionError,
  InvalidSolverMethodError,
  ShapeError,
} from '../errors';
import type { Matrix, OptimisationCriterion, SolverMethod } from '../types';

// ============================================================================
// Schemas
// ============================================================================

/** Structural shape of a raw matrix: rows of numbers */
export const rawMatrixSchema = z.array(z.array(z.number()));

export const optimisationCriterionSchema = z.enum(OPTIMISATION_CRITERIA);

export const solverMethodSchema = z.enum(SOLVER_METHODS);

// ============================================================================
// Criterion and Method Parsing
// ============================================================================

/**
 * Narrows an arbitrary value to an optimisation criterion
 *
 * @throws InvalidCriterionError if the value is not 'cost' or 'time'
 */
export function parseCriterion(value: unknown): OptimisationCriterion {
  const parsed = optimisationCriterionSchema.safeParse(value);

  if (!parsed.success) {
    throw new InvalidCriterionError(value);
  }

  return parsed.data;
}

/**
 * Narrows an arbitrary value to a solver method
 *
 * @throws InvalidSolverMethodError if the value is not 'exact' or 'greedy'
 */
export function parseSolverMethod(value: unknown): SolverMethod {
  const parsed = solverMethodSchema.safeParse(value);

  if (!parsed.success) {
    throw new InvalidSolverMethodError(value);
  }

  return parsed.data;
}

// ============================================================================
// Shape Assertions
// ============================================================================

/**
 * Checks that a matrix has at least one row and one column, that every
 * row has the same length and that every entry is finite
 *
 * @param matrix - Matrix to check
 * @returns Number of rows and columns
 * @throws ShapeError describing the first violation found
 */
export function assertRectangular(matrix: Matrix): {
  rows: number;
  columns: number;
} {
  const rows = matrix.length;

  if (rows < MIN_MATRIX_DIMENSION) {
    throw new ShapeError('Matrix must have at least one row', rows, null);
  }

  const columns = matrix[0].length;

  if (columns < MIN_MATRIX_DIMENSION) {
    throw new ShapeError('Matrix must have at least one column', rows, columns);
  }

  matrix.forEach((row, rowIndex) => {
    const isRagged = row.length !== columns;
    if (isRagged) {
      throw new ShapeError(
        `Row ${rowIndex} has ${row.length} entries, expected ${columns}`,
        rows,
        columns,
      );
    }

    const badColumn = row.findIndex((value) => !Number.isFinite(value));
    if (badColumn !== -1) {
      throw new ShapeError(
        `Entry at row ${rowIndex}, column ${badColumn} is not a finite number`,
        rows,
        columns,
      );
    }
  });

  return { rows, columns };
}

/**
 * Checks that a matrix is rectangular and square
 *
 * @returns Side of the square matrix
 * @throws ShapeError if the matrix is empty, ragged or not square
 */
export function assertSquare(matrix: Matrix): number {
  const { rows, columns } = assertRectangular(matrix);

  if (rows !== columns) {
    throw new ShapeError(
      `Solver requires a square matrix, got ${rows}x${columns}`,
      rows,
      columns,
    );
  }

  return rows;
}

/**
 * Parses untyped input (e.g. decoded JSON) into a rectangular matrix
 *
 * @throws ShapeError if the input is not rows of finite numbers
 */
export function parseRawMatrix(input: unknown): Matrix {
  const parsed = rawMatrixSchema.safeParse(input);

  if (!parsed.success) {
    const firstIssue = parsed.error.issues[0];
    const location = firstIssue.path.join('.');
    throw new ShapeError(
      `Matrix must be an array of numeric rows (at '${location}': ${firstIssue.message})`,
    );
  }

  assertRectangular(parsed.data);
  return parsed.data;
}
