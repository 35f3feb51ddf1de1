/**
 * Plain-text rendering of solver results.
 *
 * Agents and tasks are numbered from 1 for display; pairs that land on a
 * padding row or column are annotated rather than hidden.
 */

import { describeAssignment } from './index';
import type {
  AssignmentResult,
  DescribedPair,
  Matrix,
  SolverComparison,
  WorkingMatrix,
} from './types';

/** Indentation in front of each matrix row */
const MATRIX_ROW_INDENT = '  ';

/** Separator between matrix values on a row */
const MATRIX_VALUE_SEPARATOR = '  ';

const PADDING_AGENT_NOTE = ' (padding agent)';
const PADDING_TASK_NOTE = ' (padding task)';

/**
 * Renders a matrix as indented rows of values
 */
export function formatMatrix(matrix: Matrix): string[] {
  return matrix.map(
    (row) => MATRIX_ROW_INDENT + row.map(String).join(MATRIX_VALUE_SEPARATOR),
  );
}

/**
 * Renders one pair as "Agent i -> Task j" with 1-based numbers
 */
export function formatPair(pair: DescribedPair): string {
  const agentNumber = pair.agentIndex + 1;
  const taskNumber = pair.taskIndex + 1;

  let note = '';
  if (pair.isPaddingAgent) {
    note = PADDING_AGENT_NOTE;
  } else if (pair.isPaddingTask) {
    note = PADDING_TASK_NOTE;
  }

  return `Agent ${agentNumber} -> Task ${taskNumber}${note}`;
}

function formatPairs(working: WorkingMatrix, result: AssignmentResult): string[] {
  return describeAssignment(working, result).map(formatPair);
}

/**
 * Renders the working matrix, the assignment and the total cost
 *
 * @param working - Working matrix the result was solved against
 * @param result - Solver output
 * @returns Multi-line report
 */
export function formatAssignmentReport(
  working: WorkingMatrix,
  result: AssignmentResult,
): string {
  const lines = [
    'Working matrix:',
    ...formatMatrix(working.values),
    'Assignments:',
    ...formatPairs(working, result),
    `Total cost: ${result.totalCost}`,
  ];

  return lines.join('\n');
}

/**
 * Renders both strategies side by side with the greedy gap
 */
export function formatComparisonReport(
  working: WorkingMatrix,
  comparison: SolverComparison,
): string {
  const lines = [
    'Working matrix:',
    ...formatMatrix(working.values),
    'Exact assignments:',
    ...formatPairs(working, comparison.exact),
    `Exact total cost: ${comparison.exact.totalCost}`,
    'Greedy assignments:',
    ...formatPairs(working, comparison.greedy),
    `Greedy total cost: ${comparison.greedy.totalCost}`,
    `Greedy gap: ${comparison.greedyGap}`,
  ];

  return lines.join('\n');
}
