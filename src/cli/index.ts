#!/usr/bin/env node
/**
 * StudyDesk CLI Entry Point
 *
 * `studydesk` launches the interactive app; `studydesk config ...` manages
 * the config file.
 */

import fs from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import type { GlobalOptions, CommandContext } from './types.js';
import { createConfigCommand } from './commands/config.js';
import { ReadlineTerminal } from './io.js';
import { runScreens } from './screens/index.js';
import { handleError, createGlobalErrorHandler, CLIError, StoreError } from '../errors/index.js';
import { expandHome, loadConfig, resolveDbPath } from '../config/index.js';
import { closeDb, configureDatabase, getDb, replaceDb, runMigrations } from '../database/index.js';
import { AppController } from '../session/index.js';
import { safeJsonParse } from '../utils/json.js';

const PackageSchema = z.object({ version: z.string() });

function readVersion(): string {
  try {
    const raw = fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
    const parsed = PackageSchema.safeParse(safeJsonParse(raw, undefined));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

// Create the root program
const program = new Command();

program
  .name('studydesk')
  .description('Local-first study companion: tasks, study logs, Pomodoro, AI helper, quizzes and chat')
  .version(readVersion(), '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--db <path>', 'Use this database file instead of the configured one')
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output errors as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('studydesk')}                                   Start the app
  ${chalk.cyan('studydesk --db ~/notes/study.db')}             Start with another database
  ${chalk.cyan('studydesk config list')}                       Show all configuration
  ${chalk.cyan('studydesk config set pomodoro.work_minutes 50')} Change a setting
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers and screens
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
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
    db: opts.db,
  };
}

/**
 * Open the database and run the interactive screens until the user quits.
 */
async function launch(ctx: CommandContext): Promise<void> {
  const config = loadConfig();
  const dbPath = ctx.options.db ? expandHome(ctx.options.db) : resolveDbPath(config);
  ctx.debug(`Database: ${dbPath}`);

  configureDatabase(dbPath);
  const db = getDb();
  const migrations = runMigrations(db);
  const failure = migrations.failed[0];
  if (failure) {
    throw new StoreError(`Migration ${failure.name} failed: ${failure.error}`);
  }
  if (migrations.applied.length > 0) {
    ctx.debug(`Applied migrations: ${migrations.applied.join(', ')}`);
  }

  const term = new ReadlineTerminal();
  const app = new AppController({ db, config, logger: ctx });

  try {
    await runScreens({ app, term, ctx, onDatabaseRestored: replaceDb });
  } finally {
    term.close();
    closeDb();
  }
}

// ============================================================================
// COMMANDS
// ============================================================================

program.action(() => launch(createContext(getGlobalOptions())));

// Config command - manage ~/.studydesk/config.toml
program.addCommand(createConfigCommand(() => createContext(getGlobalOptions())));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

// Handle unknown commands gracefully
program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0]}`, 'Run: studydesk --help  to see available commands');
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Set up global error handlers for uncaught exceptions
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
