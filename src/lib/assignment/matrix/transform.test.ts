import { faker } from '@faker-js/faker';
import { describe, expect, test } from 'vitest';

import { InvalidCriterionError } from '../errors';
import {
  generateRandomMatrix,
  RANDOM_MATRIX_COUNT,
  RANDOM_SEED,
  RANDOM_SIZE_FAKEOPTS,
} from '../solvers/solvers.fixtures';
import { findMaxValue, transformMatrix } from './transform';

faker.seed(RANDOM_SEED);

describe('transformMatrix', () => {
  test('cost criterion returns the input itself', () => {
    const matrix = [
      [4, 1],
      [2, 0],
    ];

    expect(transformMatrix(matrix, 'cost')).toBe(matrix);
  });

  test('time criterion inverts every entry against the maximum', () => {
    const matrix = [
      [1, 5],
      [3, 0],
    ];

    expect(transformMatrix(matrix, 'time')).toEqual([
      [4, 0],
      [2, 5],
    ]);
  });

  test('time criterion does not modify the input', () => {
    const matrix = [[2, 7, 1]];
    transformMatrix(matrix, 'time');

    expect(matrix).toEqual([[2, 7, 1]]);
  });

  test('time criterion on equal entries yields zeros', () => {
    expect(transformMatrix([[3, 3], [3, 3]], 'time')).toEqual([
      [0, 0],
      [0, 0],
    ]);
  });

  test('time criterion accepts negative entries arithmetically', () => {
    expect(transformMatrix([[-2, 3]], 'time')).toEqual([[5, 0]]);
  });

  test('unknown criterion fails before any transform', () => {
    expect(() => transformMatrix([[1]], 'unknown')).toThrow(
      InvalidCriterionError,
    );
  });
});

describe('transform properties on random matrices', () => {
  for (let matrixNumber = 0; matrixNumber < RANDOM_MATRIX_COUNT; matrixNumber++) {
    const rows = faker.number.int(RANDOM_SIZE_FAKEOPTS);
    const columns = faker.number.int(RANDOM_SIZE_FAKEOPTS);
    const matrix = generateRandomMatrix(rows, columns);

    test(`${matrixNumber} - cost is the identity`, () => {
      expect(transformMatrix(matrix, 'cost')).toEqual(matrix);
    });

    test(`${matrixNumber} - time maps every maximal entry to zero`, () => {
      const maxValue = findMaxValue(matrix);
      const transformed = transformMatrix(matrix, 'time');

      matrix.forEach((row, rowIndex) => {
        row.forEach((value, columnIndex) => {
          if (value === maxValue) {
            expect(transformed[rowIndex][columnIndex]).toBe(0);
          }
        });
      });
    });
  }
});
