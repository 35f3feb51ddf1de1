/**
 * Errors raised by matrix preparation and the solvers.
 *
 * All of them describe deterministic input problems, so none is retried.
 */

/** Base class so callers can catch every assignment failure at once */
export class AssignmentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Optimisation criterion is neither 'cost' nor 'time'.
 */
export class InvalidCriterionError extends AssignmentError {
  readonly criterion: unknown;

  constructor(criterion: unknown) {
    super(
      `Unrecognised optimisation criterion ${JSON.stringify(criterion)}: use 'cost' or 'time'`,
    );
    this.criterion = criterion;
  }
}

/**
 * Solver method is neither 'exact' nor 'greedy'.
 */
export class InvalidSolverMethodError extends AssignmentError {
  readonly method: unknown;

  constructor(method: unknown) {
    super(
      `Unrecognised solver method ${JSON.stringify(method)}: use 'exact' or 'greedy'`,
    );
    this.method = method;
  }
}

/**
 * Matrix is empty, ragged, holds non-finite values, or is not square
 * where a square matrix is required.
 */
export class ShapeError extends AssignmentError {
  readonly rows: number | null;
  readonly columns: number | null;

  constructor(
    message: string,
    rows: number | null = null,
    columns: number | null = null,
  ) {
    super(message);
    this.rows = rows;
    this.columns = columns;
  }
}

/**
 * Interactive answer never matched one of the accepted choices.
 */
export class InvalidAnswerError extends AssignmentError {
  readonly attempts: number;

  constructor(attempts: number) {
    super(`No valid answer after ${attempts} attempts`);
    this.attempts = attempts;
  }
}
