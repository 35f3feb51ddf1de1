/**
 * Logger for the task assignment solver
 *
 * Usage: Enable via environment variable
 *   DEBUG=assignment npm test
 *
 * Or set LOG_LEVEL=debug for all logs
 */

import { ConsoleTransport, LogLayer } from 'loglayer';

// ============================================================================
// Constants
// ============================================================================

/** Logger prefix for assignment logs */
const LOGGER_PREFIX = '[ASSIGNMENT]';

/** Environment variable keyword for enabling assignment logs */
const DEBUG_KEYWORD = 'assignment';

/** Log level value that enables debug output */
const LOG_LEVEL_DEBUG = 'debug';

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Determines whether debug logging is enabled
 *
 * Returns true if either:
 * - DEBUG environment variable contains the 'assignment' keyword
 * - LOG_LEVEL environment variable is set to 'debug'
 */
function isDebugRequested(): boolean {
  const debugEnvContainsKeyword =
    process.env.DEBUG?.includes(DEBUG_KEYWORD) ?? false;
  const logLevelIsDebug = process.env.LOG_LEVEL === LOG_LEVEL_DEBUG;

  return debugEnvContainsKeyword || logLevelIsDebug;
}

// ============================================================================
// Logger Instance
// ============================================================================

/**
 * Whether debug logging is currently enabled for the solver
 *
 * Use this to conditionally create debug-only variables to avoid overhead
 * when logging is disabled
 */
export const IS_ASSIGNMENT_DEBUG_ENABLED = isDebugRequested();

/** Console transport for assignment logger */
const consoleTransport = new ConsoleTransport({
  logger: console,
});

/**
 * Logger instance for assignment debugging
 *
 * Silent unless DEBUG=assignment or LOG_LEVEL=debug is set.
 */
export const assignmentLogger = new LogLayer({
  transport: consoleTransport,
  prefix: LOGGER_PREFIX,
  enabled: IS_ASSIGNMENT_DEBUG_ENABLED,
});

// ============================================================================
// Debug Logging Interfaces
// ============================================================================

/**
 * Matrix preparation information for logging
 */
export interface PreparationInfo {
  /** Criterion used for the transform */
  readonly criterion: string;

  /** Rows in the raw matrix */
  readonly originalRows: number;

  /** Columns in the raw matrix */
  readonly originalColumns: number;

  /** Side of the square working matrix */
  readonly size: number;
}

/**
 * Time transform information for logging
 */
export interface TimeTransformInfo {
  /** Largest entry of the raw matrix */
  readonly maxValue: number;
}

/**
 * Balancing information for logging
 */
export interface BalanceInfo {
  readonly rows: number;
  readonly columns: number;

  /** Number of zero rows appended */
  readonly paddingRows: number;

  /** Number of zero columns appended */
  readonly paddingColumns: number;
}

/**
 * Hungarian augmentation step information for logging
 */
export interface AugmentationInfo {
  /** Row (0-based) being inserted into the matching */
  readonly row: number;

  /** Number of columns visited before a free column was reached */
  readonly visitedColumns: number;
}

/**
 * Greedy selection information for logging
 */
export interface GreedySelectionInfo {
  /** Selection round (1-indexed) */
  readonly round: number;
  readonly row: number;
  readonly column: number;
  readonly value: number;
}

/**
 * Solver completion information for logging
 */
export interface SolveCompletionInfo {
  /** Strategy that produced the result */
  readonly method: string;

  /** Side of the solved matrix */
  readonly size: number;
  readonly totalCost: number;
}
