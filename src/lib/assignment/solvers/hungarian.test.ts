/**
 * Unit tests for the Hungarian solver
 *
 * Tests verify optimality against brute force, not just that a valid
 * assignment is produced.
 */

import { faker } from '@faker-js/faker';
import { describe, expect, test } from 'vitest';

import { ShapeError } from '../errors';
import { solveHungarian } from './hungarian';
import {
  bruteForceMinimum,
  generateRandomSquareMatrix,
  isBijection,
  RANDOM_MATRIX_COUNT,
  RANDOM_SEED,
  SCENARIO_3X3,
  SCENARIO_3X3_OPTIMUM,
  UNIFORM_3X3,
} from './solvers.fixtures';

faker.seed(RANDOM_SEED);

describe('solveHungarian', () => {
  test('finds the optimum of the 3x3 scenario', () => {
    const result = solveHungarian(SCENARIO_3X3);

    expect(result.totalCost).toBe(SCENARIO_3X3_OPTIMUM);
    expect(result.totalCost).toBe(bruteForceMinimum(SCENARIO_3X3));
    expect(result.assignment).toEqual([
      { agentIndex: 0, taskIndex: 1 },
      { agentIndex: 1, taskIndex: 0 },
      { agentIndex: 2, taskIndex: 2 },
    ]);
  });

  test('solves a 1x1 matrix', () => {
    expect(solveHungarian([[7]])).toEqual({
      assignment: [{ agentIndex: 0, taskIndex: 0 }],
      totalCost: 7,
    });
  });

  test('prefers the anti-diagonal when it is cheaper', () => {
    const result = solveHungarian([
      [10, 1],
      [1, 10],
    ]);

    expect(result.assignment).toEqual([
      { agentIndex: 0, taskIndex: 1 },
      { agentIndex: 1, taskIndex: 0 },
    ]);
    expect(result.totalCost).toBe(2);
  });

  test('handles negative entries', () => {
    const result = solveHungarian([
      [-1, 2],
      [3, -4],
    ]);

    expect(result.totalCost).toBe(-5);
  });

  test('returns the same assignment on repeated runs with ties', () => {
    const first = solveHungarian(UNIFORM_3X3);
    const second = solveHungarian(UNIFORM_3X3);

    expect(first.totalCost).toBe(15);
    expect(isBijection(first.assignment, 3)).toBe(true);
    expect(second).toEqual(first);
  });

  test('does not modify the input matrix', () => {
    const matrix = [
      [4, 1, 3],
      [2, 0, 5],
      [3, 2, 2],
    ];
    solveHungarian(matrix);

    expect(matrix).toEqual(SCENARIO_3X3);
  });

  test('rejects a non-square matrix', () => {
    expect(() => solveHungarian([[1, 2, 3], [4, 5, 6]])).toThrow(ShapeError);
  });

  test('rejects an empty matrix', () => {
    expect(() => solveHungarian([])).toThrow(ShapeError);
  });
});

describe('solveHungarian on random matrices', () => {
  for (let matrixNumber = 0; matrixNumber < RANDOM_MATRIX_COUNT; matrixNumber++) {
    const matrix = generateRandomSquareMatrix();
    const size = matrix.length;

    test(`${matrixNumber} - ${size}x${size} matches brute force`, () => {
      const result = solveHungarian(matrix);

      expect(isBijection(result.assignment, size)).toBe(true);
      expect(result.totalCost).toBe(bruteForceMinimum(matrix));
    });
  }
});
