/**
 * Config Command
 *
 * Manages ~/.studydesk/config.toml via CLI:
 *   studydesk config get <key>          - Get a specific value
 *   studydesk config set <key> <value>  - Set a value
 *   studydesk config list               - Show all configuration
 *   studydesk config path               - Show config file location
 *   studydesk config reset --force      - Rewrite the defaults template
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  getConfigPath,
  getConfigValue,
  listConfig,
  resetConfig,
  setConfigValue,
} from '../../config/index.js';
import { formatError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  // studydesk config get <key>
  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., studydesk config get ai.model)')
    .action((key: string) => {
      const ctx = getContext();

      try {
        const value = getConfigValue(key);

        if (value === undefined) {
          ctx.error(`Unknown config key: ${key}`);
          ctx.log('');
          ctx.log(`Run ${chalk.cyan('studydesk config list')} to see all available keys.`);
          process.exitCode = 1;
          return;
        }

        if (ctx.options.json) {
          console.log(JSON.stringify({ key, value }));
        } else {
          ctx.log(formatValue(value));
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // studydesk config set <key> <value>
  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., studydesk config set pomodoro.work_minutes 50)')
    .action((key: string, value: string) => {
      const ctx = getContext();

      try {
        setConfigValue(key, value);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, value: getConfigValue(key) }));
        } else {
          ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // studydesk config list
  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();

      try {
        const entries = listConfig();

        if (ctx.options.json) {
          console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
          return;
        }

        ctx.log(chalk.bold('Configuration:'));
        ctx.log('');

        // Group by section for readability
        let currentGroup = '';
        for (const [key, value] of entries) {
          const group = key.split('.')[0] ?? '';
          if (group !== currentGroup) {
            if (currentGroup !== '') ctx.log('');
            currentGroup = group;
          }
          ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
        }

        ctx.log('');
        ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // studydesk config path
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

  // studydesk config reset
  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      try {
        const configPath = resetConfig();

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, path: configPath }));
        } else {
          ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  return configCmd;
}

/**
 * Format a value for display
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

function handleConfigError(ctx: CommandContext, error: unknown): void {
  if (ctx.options.json) {
    console.error(formatError(error, { json: true }));
  } else {
    ctx.error(error instanceof Error ? error.message : String(error));
  }

  process.exitCode = 2;
}
