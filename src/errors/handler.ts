/**
 * Error output for the CLI: colored text on a terminal, JSON under --json,
 * stack traces under --verbose.
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

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
  code: number;
  hint?: string;
  stack?: string;
}

const VERBOSE_HINT = 'Run with --verbose for more details';

/**
 * Reduce any thrown value to the fields both output modes print.
 */
function toErrorOutput(error: unknown, verbose: boolean): ErrorOutput {
  if (error instanceof CLIError) {
    return {
      error: error.message,
      code: error.code,
      hint: error.hint,
      stack: verbose ? error.stack : undefined,
    };
  }
  if (error instanceof Error) {
    return {
      error: error.message,
      code: 1,
      hint: verbose ? undefined : VERBOSE_HINT,
      stack: verbose ? error.stack : undefined,
    };
  }
  return { error: String(error), code: 1 };
}

/**
 * Format an error for display. Separate from handleError so it can be
 * tested without process.exit.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const output = toErrorOutput(error, verbose);

  if (json) {
    // No --verbose hint in JSON
    const hint = output.hint === VERBOSE_HINT ? undefined : output.hint;
    return JSON.stringify({ ...output, hint }, null, 2);
  }

  const lines = [chalk.red('Error: ') + output.error];
  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  }
  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }
  return lines.join('\n');
}

/**
 * CLIError carries its own code; everything else exits with 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * One-line description of a thrown value for inline messages and debug
 * logs.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Print the error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Handler for process-level events.
 *
 *   const handler = createGlobalErrorHandler({ verbose: true });
 *   process.on('uncaughtException', handler);
 *   process.on('unhandledRejection', handler);
 */
export function createGlobalErrorHandler(options: ErrorHandlerOptions = {}): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
