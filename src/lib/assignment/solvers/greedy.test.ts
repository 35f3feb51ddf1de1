import { faker } from '@faker-js/faker';
import { describe, expect, test } from 'vitest';

import { ShapeError } from '../errors';
import { balanceMatrix } from '../matrix/balance';
import { findMinimumAvailable, solveGreedyMatrix } from './greedy';
import {
  coveredIndices,
  generateRandomSquareMatrix,
  isBijection,
  RANDOM_MATRIX_COUNT,
  RANDOM_SEED,
  SCENARIO_2X3,
  SCENARIO_3X3,
  SCENARIO_3X3_GREEDY_TOTAL,
} from './solvers.fixtures';

faker.seed(RANDOM_SEED);

describe('findMinimumAvailable', () => {
  test('returns the first minimum in row-major order', () => {
    const matrix = [
      [3, 1, 1],
      [1, 3, 3],
    ];

    expect(findMinimumAvailable(matrix, [true, true], [true, true, true]))
      .toEqual({ row: 0, column: 1, value: 1 });
  });

  test('skips retired rows and columns', () => {
    const matrix = [
      [0, 5],
      [6, 7],
    ];

    expect(findMinimumAvailable(matrix, [false, true], [false, true]))
      .toEqual({ row: 1, column: 1, value: 7 });
  });

  test('returns null when nothing is available', () => {
    expect(findMinimumAvailable([[1]], [false], [true])).toBeNull();
  });
});

describe('solveGreedyMatrix', () => {
  test('selects minima in order on the 3x3 scenario', () => {
    const result = solveGreedyMatrix(SCENARIO_3X3);

    expect(result.assignment).toEqual([
      { agentIndex: 1, taskIndex: 1 },
      { agentIndex: 2, taskIndex: 2 },
      { agentIndex: 0, taskIndex: 0 },
    ]);
    expect(result.totalCost).toBe(SCENARIO_3X3_GREEDY_TOTAL);
  });

  test('breaks ties by lowest row, then lowest column', () => {
    const result = solveGreedyMatrix([
      [3, 1, 1],
      [1, 3, 3],
      [2, 2, 1],
    ]);

    expect(result.assignment).toEqual([
      { agentIndex: 0, taskIndex: 1 },
      { agentIndex: 1, taskIndex: 0 },
      { agentIndex: 2, taskIndex: 2 },
    ]);
    expect(result.totalCost).toBe(3);
  });

  test('covers every row and column of a balanced 2x3 matrix', () => {
    const result = solveGreedyMatrix(balanceMatrix(SCENARIO_2X3));

    expect(result.assignment).toHaveLength(3);
    expect(coveredIndices(result.assignment)).toEqual({
      agents: [0, 1, 2],
      tasks: [0, 1, 2],
    });
    expect(result.assignment[0]).toEqual({ agentIndex: 2, taskIndex: 0 });
    expect(result.totalCost).toBe(7);
  });

  test('rejects a non-square matrix', () => {
    expect(() => solveGreedyMatrix(SCENARIO_2X3)).toThrow(ShapeError);
  });
});

describe('solveGreedyMatrix on random matrices', () => {
  for (let matrixNumber = 0; matrixNumber < RANDOM_MATRIX_COUNT; matrixNumber++) {
    const matrix = generateRandomSquareMatrix();
    const size = matrix.length;

    test(`${matrixNumber} - ${size}x${size} yields a bijection`, () => {
      const result = solveGreedyMatrix(matrix);

      expect(isBijection(result.assignment, size)).toBe(true);
    });
  }
});
