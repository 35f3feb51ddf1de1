/**
 * Hungarian Algorithm (Kuhn-Munkres) for the square assignment problem
 *
 * Finds a minimum-cost perfect matching between rows (agents) and columns
 * (tasks). Rows are inserted one at a time; each insertion grows a tree of
 * shortest alternating paths over reduced costs until a free column is
 * reached, then flips the path. Row and column potentials keep every
 * reduced cost non-negative, so the final matching is optimal.
 *
 * Time Complexity: O(N³) where N is the side of the matrix
 * Space Complexity: O(N)
 *
 * Indexing follows the classic formulation: rows and columns are 1-based
 * internally, and column 0 is a virtual column holding the row currently
 * being inserted.
 *
 * References:
 * - Kuhn, H. W. (1955). "The Hungarian method for the assignment problem"
 * - Munkres, J. (1957). "Algorithms for the Assignment and Transportation Problems"
 */

import {
  assignmentLogger,
  IS_ASSIGNMENT_DEBUG_ENABLED,
  type AugmentationInfo,
  type SolveCompletionInfo,
} from '../assignment-logger';
import { METHOD_EXACT } from '../constants';
import { assertSquare } from '../matrix/validation';
import type {
  AssignmentPair,
  AssignmentResult,
  Matrix,
} from '../types';
import { computeTotalCost } from './total-cost';

// ============================================================================
// Constants
// ============================================================================

/** Marker for "no row" in the 1-based column-to-row array */
const NO_ROW = 0;

/** Index of the virtual column used as the root of each search */
const VIRTUAL_COLUMN = 0;

// ============================================================================
// Types
// ============================================================================

/**
 * Mutable state shared by all row insertions
 */
interface HungarianState {
  /** Side of the matrix */
  readonly size: number;

  /** Row potentials, 1-based (index 0 unused) */
  readonly rowPotential: number[];

  /** Column potentials, index 0 is the virtual column */
  readonly columnPotential: number[];

  /** Row (1-based) matched to each column, NO_ROW if free */
  readonly columnToRow: number[];

  /** Previous column on the shortest alternating path */
  readonly previousColumn: number[];
}

// ============================================================================
// State Initialisation
// ============================================================================

/**
 * Creates zeroed potentials and an empty matching for a square matrix
 *
 * @param size - Side of the matrix
 */
function initialiseState(size: number): HungarianState {
  const arrayLength = size + 1;

  return {
    size,
    rowPotential: new Array<number>(arrayLength).fill(0),
    columnPotential: new Array<number>(arrayLength).fill(0),
    columnToRow: new Array<number>(arrayLength).fill(NO_ROW),
    previousColumn: new Array<number>(arrayLength).fill(VIRTUAL_COLUMN),
  };
}

// ============================================================================
// Row Insertion
// ============================================================================

/**
 * Grows the shortest-path tree from a row until a free column is reached
 *
 * On each step the unvisited column with the smallest reduced-cost
 * distance is visited; potentials of visited rows and columns shift by
 * that distance so the tree edges stay tight. Ties keep the lowest
 * column index, which makes the result deterministic.
 *
 * @param state - Algorithm state (modified in place)
 * @param matrix - Square cost matrix
 * @param row - Row to insert (1-based)
 * @returns Free column reached at the end of the path and the visit count
 */
function searchFreeColumn(
  state: HungarianState,
  matrix: Matrix,
  row: number,
): { freeColumn: number; visitedColumns: number } {
  const { size, rowPotential, columnPotential, columnToRow, previousColumn } =
    state;

  const minDistance = new Array<number>(size + 1).fill(Infinity);
  const visited = new Array<boolean>(size + 1).fill(false);

  columnToRow[VIRTUAL_COLUMN] = row;
  let currentColumn = VIRTUAL_COLUMN;
  let visitedColumns = 0;

  do {
    visited[currentColumn] = true;
    visitedColumns++;

    const currentRow = columnToRow[currentColumn];
    let delta = Infinity;
    let nextColumn = VIRTUAL_COLUMN;

    for (let column = 1; column <= size; column++) {
      if (!visited[column]) {
        const reducedCost =
          matrix[currentRow - 1][column - 1] -
          rowPotential[currentRow] -
          columnPotential[column];

        if (reducedCost < minDistance[column]) {
          minDistance[column] = reducedCost;
          previousColumn[column] = currentColumn;
        }

        if (minDistance[column] < delta) {
          delta = minDistance[column];
          nextColumn = column;
        }
      }
    }

    // Shift potentials so visited edges stay tight
    for (let column = 0; column <= size; column++) {
      if (visited[column]) {
        rowPotential[columnToRow[column]] += delta;
        columnPotential[column] -= delta;
      } else {
        minDistance[column] -= delta;
      }
    }

    currentColumn = nextColumn;
  } while (columnToRow[currentColumn] !== NO_ROW);

  return { freeColumn: currentColumn, visitedColumns };
}

/**
 * Flips the alternating path ending at a free column
 *
 * Every column on the path takes the row of its predecessor, which
 * inserts the new row and keeps all other rows matched.
 *
 * @param state - Algorithm state (modified in place)
 * @param freeColumn - Column where the path ends
 */
function augmentAlongPath(state: HungarianState, freeColumn: number): void {
  const { columnToRow, previousColumn } = state;
  let column = freeColumn;

  do {
    const predecessor = previousColumn[column];
    columnToRow[column] = columnToRow[predecessor];
    column = predecessor;
  } while (column !== VIRTUAL_COLUMN);
}

// ============================================================================
// Result Extraction
// ============================================================================

/**
 * Converts the column-to-row matching into pairs sorted by agent
 *
 * @param state - Final algorithm state
 * @returns 0-based assignment pairs in ascending agent order
 */
function extractAssignment(state: HungarianState): AssignmentPair[] {
  const taskForAgent = new Array<number>(state.size).fill(-1);

  for (let column = 1; column <= state.size; column++) {
    const row = state.columnToRow[column];
    if (row !== NO_ROW) {
      taskForAgent[row - 1] = column - 1;
    }
  }

  return taskForAgent.map((taskIndex, agentIndex) => {
    if (taskIndex === -1) {
      throw new Error(`Agent ${agentIndex} left unassigned`);
    }
    return { agentIndex, taskIndex };
  });
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Computes a minimum-cost assignment for a square matrix
 *
 * Equal-cost optima are resolved deterministically: the same matrix
 * always produces the same assignment. The total is evaluated against the
 * matrix passed in, so callers must supply the transformed and balanced
 * working values.
 *
 * @param matrix - Square cost matrix (any finite values)
 * @returns Optimal assignment in ascending agent order and its total cost
 * @throws ShapeError if the matrix is empty, ragged or not square
 */
export function solveHungarian(matrix: Matrix): AssignmentResult {
  const size = assertSquare(matrix);
  const state = initialiseState(size);

  for (let row = 1; row <= size; row++) {
    const { freeColumn, visitedColumns } = searchFreeColumn(state, matrix, row);

    if (IS_ASSIGNMENT_DEBUG_ENABLED) {
      const info: AugmentationInfo = { row: row - 1, visitedColumns };
      assignmentLogger.withMetadata(info).debug('Augmenting path found');
    }

    augmentAlongPath(state, freeColumn);
  }

  const assignment = extractAssignment(state);
  const totalCost = computeTotalCost(matrix, assignment);

  if (IS_ASSIGNMENT_DEBUG_ENABLED) {
    const info: SolveCompletionInfo = { method: METHOD_EXACT, size, totalCost };
    assignmentLogger.withMetadata(info).debug('Exact solve completed');
  }

  return { assignment, totalCost };
}
