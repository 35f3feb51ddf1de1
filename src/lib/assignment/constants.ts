/**
 * Shared constants for the task assignment solver.
 *
 * Centralises values used across matrix preparation, the solvers and the
 * CLI to avoid duplication and circular imports.
 */

// ============================================================================
// Optimisation Criteria
// ============================================================================

/** Minimise the raw matrix values as given */
export const CRITERION_COST = 'cost';

/** Maximise time efficiency by inverting the scale before minimising */
export const CRITERION_TIME = 'time';

/** All accepted optimisation criteria */
export const OPTIMISATION_CRITERIA = [CRITERION_COST, CRITERION_TIME] as const;

// ============================================================================
// Solver Methods
// ============================================================================

/** Hungarian (Kuhn-Munkres) optimal solver */
export const METHOD_EXACT = 'exact';

/** Row-major greedy minimum selection */
export const METHOD_GREEDY = 'greedy';

/** All accepted solver methods */
export const SOLVER_METHODS = [METHOD_EXACT, METHOD_GREEDY] as const;

// ============================================================================
// Matrix Padding
// ============================================================================

/**
 * Value of every synthetic entry added when squaring a matrix.
 * Zero keeps padding neutral: every full assignment pays the same amount
 * for it, so the optimum over real entries is unchanged.
 */
export const PADDING_VALUE = 0;

/** Smallest accepted number of agents or tasks */
export const MIN_MATRIX_DIMENSION = 1;
