#!/usr/bin/env node
/**
 * opsguide CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createRouteCommand } from './commands/route.js';
import { createChatCommand } from './commands/chat.js';
import { createConfigCommand } from './commands/config.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';
import {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
} from '../config/index.js';

// Same relative path from src/cli and dist/cli
const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
    const parsed = PackageJsonSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

const program = new Command();

program
  .name('opsguide')
  .description('IT operations assistant - answers from AWS docs, Microsoft Learn and the web')
  .version(readVersion(), '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('opsguide ask "How do I rotate IAM access keys?"')}    Ask one question
  ${chalk.cyan('opsguide ask "What is Azure AD?" --explain')}         Show how it was routed
  ${chalk.cyan('opsguide route "Latest OpenSSL CVE"')}                Route without answering
  ${chalk.cyan('opsguide chat')}                                      Start an interactive session
  ${chalk.cyan('opsguide config set scope.enforce false')}            Change a setting
`);

/**
 * Create a command context with logging utilities.
 * This is passed to all command handlers.
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Commander stores global options on the root program after parsing.
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

// ============================================================================
// COMMANDS
// ============================================================================

program.addCommand(createAskCommand(getContext));
program.addCommand(createRouteCommand(getContext));
program.addCommand(createChatCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0] ?? ''}`, 'Run: opsguide --help  to see available commands');
});

// Check config and keys before commands that reach remote services
program.hook('preAction', (_thisCommand, actionCommand) => {
  const opts = getGlobalOptions();
  const validationOptions = getValidationOptionsForCommand(actionCommand.name());

  if (validationOptions.skipCompletion && validationOptions.skipSearch) {
    return;
  }

  const result = validateStartupConfig(validationOptions);

  if (result.errors.length > 0 || (opts.verbose && result.warnings.length > 0)) {
    printStartupValidation(result, opts.verbose);

    if (result.errors.length > 0) {
      throw new CLIError('Configuration validation failed', 'Fix the issues above and try again');
    }
  }
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Last resort for errors that escape every command
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
