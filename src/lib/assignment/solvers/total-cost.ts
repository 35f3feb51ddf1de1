import type { Assignment, Matrix } from '../types';

/**
 * Sums the matrix entries selected by an assignment
 *
 * @param matrix - Matrix the assignment was solved against
 * @param assignment - Agent/task pairs
 * @returns Total cost of the assignment
 */
export function computeTotalCost(matrix: Matrix, assignment: Assignment): number {
  let totalCost = 0;

  for (const { agentIndex, taskIndex } of assignment) {
    totalCost += matrix[agentIndex][taskIndex];
  }

  return totalCost;
}
