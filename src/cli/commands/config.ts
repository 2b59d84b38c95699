/**
 * Config Command
 *
 * Manages ~/.opsguide/config.toml:
 *   opsguide config get <key>          - Get a specific value
 *   opsguide config set <key> <value>  - Set a value (validated before writing)
 *   opsguide config list               - Show all configuration
 *   opsguide config path               - Show config file location
 *   opsguide config reset --force      - Restore the commented template
 */

import { existsSync, rmSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, getConfigValue, setConfigValue, listConfig, getConfigPath } from '../../config/loader.js';
import { describeError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

// ============================================================================
// Rendering
// ============================================================================

export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean' || typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

/**
 * `key = value` lines with a blank line between top-level sections.
 */
export function renderConfigList(entries: ReadonlyArray<[string, unknown]>): string[] {
  const lines: string[] = [];
  let section: string | undefined;

  for (const [key, value] of entries) {
    const head = key.split('.')[0] ?? key;
    if (section !== undefined && head !== section) {
      lines.push('');
    }
    section = head;
    lines.push(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
  }
  return lines;
}

/**
 * Run a subcommand body; loader errors become an error line and exit code 1.
 */
function runConfigAction(ctx: CommandContext, body: () => void): void {
  try {
    body();
  } catch (error) {
    ctx.error(describeError(error));
    process.exitCode = 1;
  }
}

// ============================================================================
// Command Factory
// ============================================================================

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., opsguide config get sources.timeout_ms)')
    .action((key: string) => {
      const ctx = getContext();
      runConfigAction(ctx, () => {
        const value = getConfigValue(key);
        if (value === undefined) {
          ctx.error(`Unknown config key: ${key}`);
          ctx.log(`Run ${chalk.cyan('opsguide config list')} to see all available keys.`);
          process.exitCode = 1;
        } else if (ctx.options.json) {
          console.log(JSON.stringify({ key, value }));
        } else {
          ctx.log(formatValue(value));
        }
      });
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., opsguide config set scope.enforce false)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      runConfigAction(ctx, () => {
        setConfigValue(key, value);
        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, value: getConfigValue(key) }));
        } else {
          ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
        }
      });
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      runConfigAction(ctx, () => {
        const entries = listConfig();
        if (ctx.options.json) {
          console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
          return;
        }
        ctx.log(chalk.bold('Configuration:'));
        ctx.log('');
        for (const line of renderConfigList(entries)) {
          ctx.log(line);
        }
        ctx.log('');
        ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
      });
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();
      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  configCmd
    .command('reset')
    .description('Restore the default configuration file')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow('This replaces the config file with the default template.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      runConfigAction(ctx, () => {
        const configPath = getConfigPath();
        if (existsSync(configPath)) {
          rmSync(configPath);
        }
        // Writes the template back
        loadConfig(true);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, path: configPath }));
        } else {
          ctx.log(`${chalk.green('✓')} Configuration reset to defaults (${configPath})`);
        }
      });
    });

  return configCmd;
}
