/**
 * Test fixtures for the assignment solvers
 *
 * Contains:
 * - Hand-checked scenario matrices
 * - Random matrix generation (seeded faker)
 * - Brute-force optimum for small matrices
 * - Assignment validation helpers
 */

import { faker } from '@faker-js/faker';

import type { Assignment, Matrix } from '../types';

// ============================================================================
// Scenario Matrices
// ============================================================================

/**
 * 3x3 scenario: optimum is 1 + 2 + 2 = 5 via (0,1), (1,0), (2,2);
 * greedy takes 0 at (1,1), then 2 at (2,2), then 4 at (0,0) = 6
 */
export const SCENARIO_3X3: Matrix = [
  [4, 1, 3],
  [2, 0, 5],
  [3, 2, 2],
];

export const SCENARIO_3X3_OPTIMUM = 5;

export const SCENARIO_3X3_GREEDY_TOTAL = 6;

/** Two agents, three tasks */
export const SCENARIO_2X3: Matrix = [
  [7, 3, 5],
  [2, 6, 4],
];

/** Three agents, two tasks */
export const SCENARIO_3X2: Matrix = [
  [9, 1],
  [4, 8],
  [5, 2],
];

/** Every entry equal: every assignment is optimal */
export const UNIFORM_3X3: Matrix = [
  [5, 5, 5],
  [5, 5, 5],
  [5, 5, 5],
];

// ============================================================================
// Random Generation
// ============================================================================

/** Seed shared by the random property tests */
export const RANDOM_SEED = 20240611;

/** Number of random matrices per property */
export const RANDOM_MATRIX_COUNT = 25;

/** Side range of random square matrices (brute force stays cheap) */
export const RANDOM_SIZE_FAKEOPTS = { min: 1, max: 6 };

/** Value range of random matrix entries */
export const RANDOM_VALUE_FAKEOPTS = { min: 0, max: 50 };

/**
 * Creates a random matrix of non-negative integers
 *
 * @param rows - Number of rows
 * @param columns - Number of columns
 */
export function generateRandomMatrix(rows: number, columns: number): number[][] {
  return Array.from({ length: rows }, () =>
    Array.from({ length: columns }, () =>
      faker.number.int(RANDOM_VALUE_FAKEOPTS),
    ),
  );
}

/**
 * Creates a random square matrix with a random side
 */
export function generateRandomSquareMatrix(): number[][] {
  const size = faker.number.int(RANDOM_SIZE_FAKEOPTS);
  return generateRandomMatrix(size, size);
}

// ============================================================================
// Brute Force
// ============================================================================

/**
 * Generates all permutations of 0..size-1
 */
export function generatePermutations(size: number): number[][] {
  if (size === 0) {
    return [[]];
  }

  const permutations: number[][] = [];

  for (const shorter of generatePermutations(size - 1)) {
    for (let position = 0; position <= shorter.length; position++) {
      const permutation = [...shorter];
      permutation.splice(position, 0, size - 1);
      permutations.push(permutation);
    }
  }

  return permutations;
}

/**
 * Minimum total cost over every permutation of a square matrix
 */
export function bruteForceMinimum(matrix: Matrix): number {
  let minimum = Infinity;

  for (const permutation of generatePermutations(matrix.length)) {
    let total = 0;
    permutation.forEach((column, row) => {
      total += matrix[row][column];
    });
    minimum = Math.min(minimum, total);
  }

  return minimum;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Checks that agent indices and task indices are each a permutation of
 * 0..size-1
 */
export function isBijection(assignment: Assignment, size: number): boolean {
  const agents = new Set(assignment.map((pair) => pair.agentIndex));
  const tasks = new Set(assignment.map((pair) => pair.taskIndex));

  const hasExpectedLength = assignment.length === size;
  const inRange = (index: number) => index >= 0 && index < size;
  const agentsCovered =
    agents.size === size && [...agents].every(inRange);
  const tasksCovered = tasks.size === size && [...tasks].every(inRange);

  return hasExpectedLength && agentsCovered && tasksCovered;
}

/**
 * Sorted agent indices and task indices of an assignment
 */
export function coveredIndices(assignment: Assignment): {
  agents: number[];
  tasks: number[];
} {
  const byNumber = (first: number, second: number) => first - second;

  return {
    agents: assignment.map((pair) => pair.agentIndex).sort(byNumber),
    tasks: assignment.map((pair) => pair.taskIndex).sort(byNumber),
  };
}
