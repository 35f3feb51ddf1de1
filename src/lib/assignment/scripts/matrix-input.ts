/**
 * Matrix input readers for the solve-assignment script.
 *
 * A matrix can come from inline JSON, a JSON file, or interactive prompts
 * asking for the agent count, the task count and each value in turn.
 */

import { readFile } from 'node:fs/promises';

import * as z from 'zod';

import { InvalidAnswerError, ShapeError } from '@/lib/assignment/errors';
import { parseRawMatrix } from '@/lib/assignment/matrix/validation';
import type { Matrix } from '@/lib/assignment/types';

// ============================================================================
// Types
// ============================================================================

/**
 * Anything that can ask a question and resolve with the typed answer.
 * readline/promises interfaces satisfy this.
 */
export interface Questioner {
  question(query: string): Promise<string>;
}

// ============================================================================
// Schemas
// ============================================================================

const dimensionSchema = z.coerce.number().int().min(1);

const entrySchema = z.coerce.number().finite();

// ============================================================================
// JSON Input
// ============================================================================

/**
 * Parses a JSON array of numeric rows into a matrix
 *
 * @param text - JSON text such as "[[4,1,3],[2,0,5]]"
 * @throws ShapeError if the text is not JSON or not a rectangular matrix
 */
export function parseMatrixJson(text: string): Matrix {
  let decoded: unknown;

  try {
    decoded = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ShapeError(`Matrix is not valid JSON: ${reason}`);
  }

  return parseRawMatrix(decoded);
}

/**
 * Reads a matrix from a JSON file
 *
 * @param filePath - Path to a file holding a JSON array of rows
 * @throws ShapeError if the file cannot be read or holds no valid matrix
 */
export async function readMatrixFile(filePath: string): Promise<Matrix> {
  let text: string;

  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ShapeError(`Cannot read matrix file '${filePath}': ${reason}`);
  }

  return parseMatrixJson(text);
}

// ============================================================================
// Interactive Input
// ============================================================================

/**
 * Asks for a positive whole number
 *
 * @throws ShapeError if the answer is not a positive integer
 */
async function askDimension(
  questioner: Questioner,
  query: string,
): Promise<number> {
  const answer = await questioner.question(query);
  const parsed = dimensionSchema.safeParse(answer.trim());

  if (!parsed.success) {
    throw new ShapeError(`Expected a positive whole number, got '${answer}'`);
  }

  return parsed.data;
}

/**
 * Asks for one matrix entry
 *
 * @throws ShapeError if the answer is not a finite number
 */
async function askEntry(
  questioner: Questioner,
  query: string,
): Promise<number> {
  const answer = await questioner.question(query);
  const trimmed = answer.trim();
  const parsed = entrySchema.safeParse(trimmed);

  // z.coerce turns '' into 0; an empty answer is not a value
  if (trimmed === '' || !parsed.success) {
    throw new ShapeError(`Expected a number, got '${answer}'`);
  }

  return parsed.data;
}

/**
 * Collects a matrix value by value, row by row
 *
 * Values are numbered consecutively across the whole matrix so the user
 * can follow progress.
 *
 * @param questioner - Prompt source
 * @returns Matrix of agentCount rows and taskCount columns
 */
export async function promptMatrix(questioner: Questioner): Promise<Matrix> {
  const agentCount = await askDimension(questioner, 'Number of agents: ');
  const taskCount = await askDimension(questioner, 'Number of tasks: ');

  const matrix: number[][] = [];
  let valueNumber = 1;

  for (let agent = 1; agent <= agentCount; agent++) {
    const row: number[] = [];

    for (let task = 1; task <= taskCount; task++) {
      const query = `Value for agent ${agent}, task ${task} (value ${valueNumber}): `;
      row.push(await askEntry(questioner, query));
      valueNumber++;
    }

    matrix.push(row);
  }

  return matrix;
}

/**
 * Asks a question until the trimmed, lower-cased answer is one of the
 * accepted choices
 *
 * @param questioner - Prompt source
 * @param query - Question text
 * @param choices - Accepted answers
 * @param maxAttempts - Attempts before giving up
 * @throws InvalidAnswerError once maxAttempts answers were rejected
 */
export async function promptChoice<Choice extends string>(
  questioner: Questioner,
  query: string,
  choices: readonly Choice[],
  maxAttempts = 3,
): Promise<Choice> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const answer = (await questioner.question(query)).trim().toLowerCase();
    const match = choices.find((choice) => choice === answer);

    if (match !== undefined) {
      return match;
    }
  }

  throw new InvalidAnswerError(maxAttempts);
}
