/**
 * Startup Configuration Validation
 *
 * Runs before commands that talk to remote services. A broken config file
 * blocks the command; missing API keys only warn, since the pipeline
 * degrades without them (no completion key → inline ⚠️ answer, no Exa key
 * → web-search questions get no results).
 */

import chalk from 'chalk';
import { loadConfig } from './loader.js';
import { hasApiKey, SETUP_INSTRUCTIONS } from './env.js';
import { describeError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

export interface StartupValidationResult {
  /** Whether the command may run */
  valid: boolean;
  /** Non-fatal issues */
  warnings: string[];
  /** Fatal issues */
  errors: string[];
  /** Setup instructions for the issues above */
  hints: string[];
}

export interface StartupValidationOptions {
  /** Skip the completion key check (commands that never generate answers) */
  skipCompletion?: boolean;
  /** Skip the web search key check */
  skipSearch?: boolean;
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate configuration at CLI startup.
 *
 * @example
 * const result = validateStartupConfig({ skipSearch: true });
 * if (!result.valid) printStartupValidation(result);
 */
export function validateStartupConfig(
  options: StartupValidationOptions = {}
): StartupValidationResult {
  const { skipCompletion = false, skipSearch = false } = options;
  const warnings: string[] = [];
  const errors: string[] = [];
  const hints: string[] = [];

  try {
    loadConfig(false);
  } catch (error) {
    errors.push(describeError(error));
    hints.push('Run: opsguide config reset --force  to restore defaults');
  }

  if (!skipCompletion && !hasApiKey('openrouter')) {
    warnings.push('OPENROUTER_API_KEY is not set; answers cannot be generated');
    hints.push(SETUP_INSTRUCTIONS.openrouter);
  }

  if (!skipSearch && !hasApiKey('exa')) {
    warnings.push('EXA_API_KEY is not set; web search is disabled');
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
    hints,
  };
}

/**
 * Print startup validation results.
 *
 * @param verbose - Show warnings and hints even when there are no errors
 */
export function printStartupValidation(
  result: StartupValidationResult,
  verbose = false
): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }

  if (verbose || result.errors.length > 0) {
    for (const warning of result.warnings) {
      console.warn(chalk.yellow(`⚠ ${warning}`));
    }
    for (const hint of result.hints) {
      console.error(chalk.dim(`  ${hint}`));
    }
  }
}

/**
 * Commands that generate answers.
 */
export const COMMANDS_REQUIRING_COMPLETION = ['ask', 'chat'];

/**
 * Commands that may hit the web search source.
 */
export const COMMANDS_USING_SEARCH = ['ask', 'chat', 'route'];

/**
 * Validation options for a command name; config commands skip everything.
 */
export function getValidationOptionsForCommand(
  command: string
): StartupValidationOptions {
  return {
    skipCompletion: !COMMANDS_REQUIRING_COMPLETION.includes(command),
    skipSearch: !COMMANDS_USING_SEARCH.includes(command),
  };
}
