import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterAll, beforeAll, describe, expect, test } from 'vitest';

import { InvalidCriterionError, ShapeError } from '@/lib/assignment/errors';
import {
  SCENARIO_2X3,
  SCENARIO_3X3,
} from '@/lib/assignment/solvers/solvers.fixtures';

import { createQuestioner } from './scripts.fixtures';
import { collectInput, parseCliArgs, runSession } from './solve-assignment';

describe('parseCliArgs', () => {
  test('reads long options', () => {
    expect(
      parseCliArgs([
        '--matrix',
        '[[1,2],[3,4]]',
        '--criterion',
        'time',
        '--method',
        'compare',
      ]),
    ).toEqual({
      matrix: '[[1,2],[3,4]]',
      file: undefined,
      criterion: 'time',
      method: 'compare',
    });
  });

  test('reads aliases', () => {
    expect(parseCliArgs(['-f', 'matrix.json', '-s', 'greedy'])).toEqual({
      matrix: undefined,
      file: 'matrix.json',
      criterion: undefined,
      method: 'greedy',
    });
  });

  test('leaves everything undefined for an interactive run', () => {
    expect(parseCliArgs([])).toEqual({
      matrix: undefined,
      file: undefined,
      criterion: undefined,
      method: undefined,
    });
  });
});

describe('collectInput', () => {
  let directory: string;

  beforeAll(async () => {
    directory = await mkdtemp(join(tmpdir(), 'solve-assignment-'));
  });

  afterAll(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  test('uses --matrix with the default criterion and method', async () => {
    const { questioner, queries } = createQuestioner([]);
    const args = parseCliArgs(['--matrix', '[[4,1],[2,0]]']);

    await expect(collectInput(args, questioner)).resolves.toEqual({
      matrix: [
        [4, 1],
        [2, 0],
      ],
      criterion: 'cost',
      method: 'exact',
    });
    expect(queries).toEqual([]);
  });

  test('keeps the criterion and method given with --matrix', async () => {
    const { questioner } = createQuestioner([]);
    const args = parseCliArgs([
      '-m',
      '[[1]]',
      '-c',
      'time',
      '-s',
      'compare',
    ]);

    await expect(collectInput(args, questioner)).resolves.toEqual({
      matrix: [[1]],
      criterion: 'time',
      method: 'compare',
    });
  });

  test('reads the matrix from --file', async () => {
    const filePath = join(directory, 'matrix.json');
    await writeFile(filePath, '[[7,3,5],[2,6,4]]', 'utf8');
    const { questioner, queries } = createQuestioner([]);
    const args = parseCliArgs(['--file', filePath, '--method', 'greedy']);

    await expect(collectInput(args, questioner)).resolves.toEqual({
      matrix: SCENARIO_2X3,
      criterion: 'cost',
      method: 'greedy',
    });
    expect(queries).toEqual([]);
  });

  test('reports a missing --file as a shape error', async () => {
    const { questioner } = createQuestioner([]);
    const args = parseCliArgs(['--file', join(directory, 'missing.json')]);

    await expect(collectInput(args, questioner)).rejects.toThrow(ShapeError);
  });

  test('prompts for the matrix, criterion and method', async () => {
    const { questioner, queries } = createQuestioner([
      '1',
      '1',
      '5',
      'time',
      'greedy',
    ]);

    await expect(collectInput(parseCliArgs([]), questioner)).resolves.toEqual({
      matrix: [[5]],
      criterion: 'time',
      method: 'greedy',
    });
    expect(queries.slice(3)).toEqual([
      'Optimise by (cost/time): ',
      'Solver (exact/greedy/compare): ',
    ]);
  });

  test('prompts only for the matrix when criterion and method are given', async () => {
    const { questioner, queries } = createQuestioner(['1', '2', '3', '4']);
    const args = parseCliArgs(['--criterion', 'cost', '--method', 'exact']);

    await expect(collectInput(args, questioner)).resolves.toEqual({
      matrix: [[3, 4]],
      criterion: 'cost',
      method: 'exact',
    });
    expect(queries).toHaveLength(4);
  });
});

describe('runSession', () => {
  test('renders the exact report', () => {
    const report = runSession({
      matrix: SCENARIO_3X3,
      criterion: 'cost',
      method: 'exact',
    });

    expect(report.split('\n').at(-1)).toBe('Total cost: 5');
  });

  test('renders the greedy report', () => {
    const report = runSession({
      matrix: SCENARIO_2X3,
      criterion: 'cost',
      method: 'greedy',
    });

    expect(report.split('\n').at(-1)).toBe('Total cost: 7');
  });

  test('renders the comparison report', () => {
    const report = runSession({
      matrix: SCENARIO_3X3,
      criterion: 'cost',
      method: 'compare',
    });

    expect(report.split('\n').at(-1)).toBe('Greedy gap: 1');
  });

  test('surfaces an invalid criterion', () => {
    expect(() =>
      runSession({ matrix: SCENARIO_3X3, criterion: 'unknown', method: 'exact' }),
    ).toThrow(InvalidCriterionError);
  });

  test('surfaces a ragged matrix', () => {
    expect(() =>
      runSession({ matrix: [[1, 2], [3]], criterion: 'cost', method: 'exact' }),
    ).toThrow(ShapeError);
  });
});
