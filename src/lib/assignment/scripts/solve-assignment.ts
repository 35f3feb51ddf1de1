/**
 * Assignment Solver Script
 *
 * Reads a cost/time matrix, prepares the working matrix for the chosen
 * criterion and prints the assignment found by the chosen method.
 *
 * Usage:
 *   npm run solve -- --matrix "[[4,1,3],[2,0,5],[3,2,2]]" --method compare
 *   npm run solve -- --file matrix.json --criterion time
 *   npm run solve                      (interactive prompts)
 */

import { resolve } from 'node:path';
import { createInterface } from 'node:readline/promises';
import { pathToFileURL } from 'node:url';

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import {
  AssignmentError,
  compareSolvers,
  prepareWorkingMatrix,
  solveWithMethod,
} from '@/lib/assignment';
import {
  CRITERION_COST,
  METHOD_EXACT,
  OPTIMISATION_CRITERIA,
  SOLVER_METHODS,
} from '@/lib/assignment/constants';
import {
  formatAssignmentReport,
  formatComparisonReport,
} from '@/lib/assignment/report';
import type { Matrix } from '@/lib/assignment/types';

import {
  parseMatrixJson,
  promptChoice,
  promptMatrix,
  readMatrixFile,
  type Questioner,
} from './matrix-input';

// ============================================================================
// Constants
// ============================================================================

/** Method value that runs both solvers */
const METHOD_COMPARE = 'compare';

/** Everything accepted by --method */
const METHOD_CHOICES = [...SOLVER_METHODS, METHOD_COMPARE] as const;

// CLI Constants (yargs configuration)
const CLI_SCRIPT_NAME = 'solve-assignment';
const CLI_USAGE = '$0 [options]';
const CLI_OPTION_HELP = 'help';
const CLI_HELP_ALIAS = 'h';
const YARGS_TYPE_STRING = 'string' as const;

const CLI_OPTION_MATRIX = 'matrix';
const CLI_MATRIX_ALIAS = 'm';
const CLI_MATRIX_DESCRIPTION = 'Matrix as JSON, rows are agents';

const CLI_OPTION_FILE = 'file';
const CLI_FILE_ALIAS = 'f';
const CLI_FILE_DESCRIPTION = 'Path to a JSON file holding the matrix';

const CLI_OPTION_CRITERION = 'criterion';
const CLI_CRITERION_ALIAS = 'c';
const CLI_CRITERION_DESCRIPTION = 'Optimise by cost or by time';

const CLI_OPTION_METHOD = 'method';
const CLI_METHOD_ALIAS = 's';
const CLI_METHOD_DESCRIPTION = 'Solver to run';

/** Exit code for invalid input */
const EXIT_CODE_INVALID_INPUT = 1;

// ============================================================================
// CLI Arguments
// ============================================================================

/** Method type derived from METHOD_CHOICES */
type CliMethod = (typeof METHOD_CHOICES)[number];

/**
 * Parsed CLI arguments.
 *
 * Criterion and method stay undefined when not given, so interactive
 * sessions can ask for them.
 */
export interface CliArgs {
  readonly matrix: string | undefined;
  readonly file: string | undefined;
  readonly criterion: string | undefined;
  readonly method: CliMethod | undefined;
}

/**
 * Narrows a --method value to a known method
 */
function toCliMethod(value: string | undefined): CliMethod | undefined {
  return METHOD_CHOICES.find((choice) => choice === value);
}

/**
 * Parses CLI arguments using yargs.
 *
 * parseSync() is used since no command is asynchronous.
 *
 * @param processArgs - Arguments without the executable and script path
 * @returns Parsed CLI arguments
 */
export function parseCliArgs(processArgs: string[]): CliArgs {
  const argv = yargs(processArgs)
    .scriptName(CLI_SCRIPT_NAME)
    .usage(CLI_USAGE)
    .option(CLI_OPTION_MATRIX, {
      alias: CLI_MATRIX_ALIAS,
      type: YARGS_TYPE_STRING,
      description: CLI_MATRIX_DESCRIPTION,
    })
    .option(CLI_OPTION_FILE, {
      alias: CLI_FILE_ALIAS,
      type: YARGS_TYPE_STRING,
      description: CLI_FILE_DESCRIPTION,
    })
    .conflicts(CLI_OPTION_MATRIX, CLI_OPTION_FILE)
    .option(CLI_OPTION_CRITERION, {
      alias: CLI_CRITERION_ALIAS,
      type: YARGS_TYPE_STRING,
      description: CLI_CRITERION_DESCRIPTION,
      choices: OPTIMISATION_CRITERIA,
    })
    .option(CLI_OPTION_METHOD, {
      alias: CLI_METHOD_ALIAS,
      type: YARGS_TYPE_STRING,
      description: CLI_METHOD_DESCRIPTION,
      choices: METHOD_CHOICES,
    })
    .help()
    .alias(CLI_OPTION_HELP, CLI_HELP_ALIAS)
    .version(false)
    .strict()
    .parseSync();

  return {
    matrix: argv[CLI_OPTION_MATRIX],
    file: argv[CLI_OPTION_FILE],
    criterion: argv[CLI_OPTION_CRITERION],
    method: toCliMethod(argv[CLI_OPTION_METHOD]),
  };
}

// ============================================================================
// Session
// ============================================================================

/** Resolved inputs of one solving session */
export interface SessionInput {
  readonly matrix: Matrix;
  readonly criterion: string;
  readonly method: CliMethod;
}

/**
 * Collects the matrix, criterion and method
 *
 * Without --matrix or --file the user is prompted for the matrix, and
 * for the criterion and method when those flags are missing too.
 */
export async function collectInput(
  args: CliArgs,
  questioner: Questioner,
): Promise<SessionInput> {
  if (args.matrix !== undefined) {
    return {
      matrix: parseMatrixJson(args.matrix),
      criterion: args.criterion ?? CRITERION_COST,
      method: args.method ?? METHOD_EXACT,
    };
  }

  if (args.file !== undefined) {
    return {
      matrix: await readMatrixFile(args.file),
      criterion: args.criterion ?? CRITERION_COST,
      method: args.method ?? METHOD_EXACT,
    };
  }

  const matrix = await promptMatrix(questioner);
  const criterion =
    args.criterion ??
    (await promptChoice(
      questioner,
      `Optimise by (${OPTIMISATION_CRITERIA.join('/')}): `,
      OPTIMISATION_CRITERIA,
    ));
  const method =
    args.method ??
    (await promptChoice(
      questioner,
      `Solver (${METHOD_CHOICES.join('/')}): `,
      METHOD_CHOICES,
    ));

  return { matrix, criterion, method };
}

/**
 * Prepares the working matrix and renders the requested solve
 *
 * @returns Report text
 * @throws AssignmentError for invalid matrices, criteria or methods
 */
export function runSession(input: SessionInput): string {
  const working = prepareWorkingMatrix(input.matrix, input.criterion);

  if (input.method === METHOD_COMPARE) {
    return formatComparisonReport(working, compareSolvers(working));
  }

  const result = solveWithMethod(working, input.method);
  return formatAssignmentReport(working, result);
}

// ============================================================================
// CLI Runner
// ============================================================================

/**
 * Main entry point for CLI execution.
 *
 * Input errors are printed to stderr with a non-zero exit code; anything
 * else propagates.
 */
async function main(): Promise<void> {
  const args = parseCliArgs(hideBin(process.argv));
  const readline = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  try {
    const input = await collectInput(args, readline);
    console.log(runSession(input));
  } catch (error) {
    if (!(error instanceof AssignmentError)) {
      throw error;
    }
    console.error(error.message);
    process.exitCode = EXIT_CODE_INVALID_INPUT;
  } finally {
    readline.close();
  }
}

/**
 * Entry point check: true when this file is executed directly, not
 * imported (e.g. by tests).
 */
function isDirectExecution(): boolean {
  const entryPath = process.argv[1];
  const hasEntryPath = entryPath !== undefined;

  return hasEntryPath && import.meta.url === pathToFileURL(resolve(entryPath)).href;
}

if (isDirectExecution()) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = EXIT_CODE_INVALID_INPUT;
  });
}
