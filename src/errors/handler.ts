/**
 * CLI error display
 *
 * Formats errors that escape a command for the terminal (chalk) or for
 * scripts (--json), and maps them to an exit code.
 */

import chalk from 'chalk';
import { CLIError, ContractError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  name: string;
  code: number;
  hint?: string;
  stack?: string;
}

/** Exit code for internal contract violations (EX_SOFTWARE) */
const CONTRACT_ERROR_CODE = 70;

/**
 * Get the exit code for an error.
 *
 * CLIError carries its own code, contract violations exit with 70,
 * everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  if (error instanceof ContractError) {
    return CONTRACT_ERROR_CODE;
  }
  return 1;
}

function toErrorOutput(error: unknown, verbose: boolean): ErrorOutput {
  if (error instanceof Error) {
    return {
      error: error.message,
      name: error.name,
      code: getExitCode(error),
      hint: error instanceof CLIError ? error.hint : undefined,
      stack: verbose ? error.stack : undefined,
    };
  }
  return { error: String(error), name: 'Error', code: 1 };
}

/**
 * Format an error for display without exiting, so it can be tested
 * and reused for logging.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;
  const output = toErrorOutput(error, verbose);

  if (json) {
    return JSON.stringify(output, null, 2);
  }

  const lines: string[] = [chalk.red('Error: ') + output.error];

  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  }

  if (output.stack) {
    lines.push('');
    lines.push(chalk.dim('Stack trace:'));
    lines.push(chalk.dim(output.stack));
  } else if (error instanceof Error && !(error instanceof CLIError)) {
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  return lines.join('\n');
}

/**
 * Print an error to stderr and exit with its code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Create a handler for process-level events:
 *
 *   process.on('uncaughtException', createGlobalErrorHandler({ verbose }));
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
