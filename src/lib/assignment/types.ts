/**
 * Types for matrix preparation and assignment solving.
 */

import type { OPTIMISATION_CRITERIA, SOLVER_METHODS } from './constants';

// ============================================================================
// Matrices
// ============================================================================

/** Immutable row-major grid of numbers (rows are agents, columns tasks) */
export type Matrix = ReadonlyArray<ReadonlyArray<number>>;

/** How the raw matrix values should be optimised */
export type OptimisationCriterion = (typeof OPTIMISATION_CRITERIA)[number];

/** Which strategy resolves the assignment */
export type SolverMethod = (typeof SOLVER_METHODS)[number];

/**
 * Square, criterion-transformed matrix used by the solvers.
 * Built once per session by prepareWorkingMatrix and never mutated.
 */
export interface WorkingMatrix {
  /** Square values with side `size` */
  readonly values: Matrix;

  /** Side of the square matrix: max(originalRows, originalColumns) */
  readonly size: number;

  /** Number of real agents in the raw input */
  readonly originalRows: number;

  /** Number of real tasks in the raw input */
  readonly originalColumns: number;

  /** Criterion the values were transformed with */
  readonly criterion: OptimisationCriterion;
}

// ============================================================================
// Assignment
// ============================================================================

/** A single agent-to-task pairing (0-based indices) */
export interface AssignmentPair {
  readonly agentIndex: number;
  readonly taskIndex: number;
}

/**
 * Ordered pairs covering every row and every column exactly once.
 */
export type Assignment = readonly AssignmentPair[];

/** Output of a single solve */
export interface AssignmentResult {
  readonly assignment: Assignment;

  /** Sum of the solved matrix over the assignment */
  readonly totalCost: number;
}

/**
 * Assignment pair annotated for consumers that care about padding.
 */
export interface DescribedPair extends AssignmentPair {
  /** Working matrix value at this pair */
  readonly value: number;

  /** Agent index lies in a synthetic padding row */
  readonly isPaddingAgent: boolean;

  /** Task index lies in a synthetic padding column */
  readonly isPaddingTask: boolean;
}

/**
 * Both strategies run on the same working matrix.
 */
export interface SolverComparison {
  readonly exact: AssignmentResult;
  readonly greedy: AssignmentResult;

  /** greedy.totalCost - exact.totalCost */
  readonly greedyGap: number;
}
