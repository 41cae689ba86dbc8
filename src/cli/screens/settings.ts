/**
 * Settings: API key, Pomodoro durations, password, backup/restore, account.
 */

import path from 'node:path';
import chalk from 'chalk';
import { expandHome, getBackupDir } from '../../config/paths.js';
import { defaultBackupName, exportDatabase, restoreDatabase } from '../../database/backup.js';
import type { SettingKey } from '../../database/schema.js';
import { ValidationError } from '../../errors/index.js';
import { checkGeminiKeyFormat, maskApiKey } from '../../providers/validation.js';
import { ask, askHidden, confirm, heading, printHelp, runCommandPrompt, type CommandSpec } from './shared.js';
import type { ScreenContext, ScreenHandler } from './types.js';

function printOverview(context: ScreenContext): void {
  const { app, term } = context;
  const { repository } = app.requireSession();
  const key = repository.settings.get('gemini_api_key');
  const { pomodoro } = app.settings;
  const durations = repository.settings.getPomodoroDurations({
    workMinutes: pomodoro.work_minutes,
    breakMinutes: pomodoro.break_minutes,
    longBreakMinutes: pomodoro.long_break_minutes,
  });

  term.print(`  Gemini API key: ${key ? maskApiKey(key) : chalk.yellow('not set')}`);
  term.print(
    `  Pomodoro: ${durations.workMinutes} min work, ${durations.breakMinutes} min break, ` +
      `${durations.longBreakMinutes} min long break`
  );
}

async function saveApiKey(context: ScreenContext): Promise<void> {
  const session = context.app.requireSession();
  const key = (await askHidden(context, 'Gemini API key: ')).trim();

  const check = checkGeminiKeyFormat(key);
  if (!check.valid && key) {
    context.term.print(chalk.yellow(`Warning: ${check.error}`));
  }

  session.repository.settings.set('gemini_api_key', key);
  session.gateway.forgetApiKey();
  context.term.print(chalk.green(`Saved API key ${maskApiKey(key)}.`));
}

async function savePomodoro(context: ScreenContext): Promise<void> {
  const { settings } = context.app.requireSession().repository;
  const fields: Array<[SettingKey, string]> = [
    ['pomodoro_work_minutes', 'Work minutes'],
    ['pomodoro_break_minutes', 'Break minutes'],
    ['pomodoro_long_break_minutes', 'Long break minutes'],
  ];

  for (const [key, label] of fields) {
    const current = settings.get(key);
    const value = await ask(context, `${label}${current ? ` [${current}]` : ''}: `);
    if (value) {
      settings.set(key, value);
    }
  }
  context.term.print(chalk.green('Pomodoro durations saved.'));
}

async function changePassword(context: ScreenContext): Promise<void> {
  const current = await askHidden(context, 'Current password: ');
  const next = await askHidden(context, 'New password: ');
  const repeated = await askHidden(context, 'Repeat the new password: ');
  if (next !== repeated) {
    throw new ValidationError('Passwords do not match', ['password: Type the same password twice']);
  }
  await context.app.changePassword(current, next);
  context.term.print(chalk.green('Password changed.'));
}

function backup(args: string[], context: ScreenContext): void {
  const { app } = context;
  const destination =
    args.length > 0 ? expandHome(args.join(' ')) : path.join(getBackupDir(), defaultBackupName(app.now()));

  const written = exportDatabase(app.database, destination);
  context.term.print(chalk.green(`Backup written to ${written}`));
}

async function restore(args: string[], context: ScreenContext): Promise<void> {
  const { app, term } = context;
  const source = args.join(' ');
  if (!source) {
    throw new ValidationError('Missing backup file', ['file: restore <path to backup>']);
  }

  term.print(chalk.yellow('Restoring replaces ALL current data, for every account, with the backup.'));
  if (!(await confirm(context, 'Continue?'))) {
    return;
  }

  const db = restoreDatabase(expandHome(source), app.database);
  app.replaceDatabase(db);
  context.onDatabaseRestored?.(db);
  term.print(chalk.green('Backup restored. Log in again to continue.'));
}

async function deleteAccount(context: ScreenContext): Promise<void> {
  context.term.print(chalk.red('This permanently deletes your account and everything in it.'));
  if (!(await confirm(context, 'Delete your account?'))) {
    return;
  }
  await context.app.deleteAccount(await askHidden(context, 'Password: '));
  context.term.print(chalk.green('Account deleted.'));
}

const COMMANDS: Record<string, CommandSpec> = {
  key: { usage: 'key', description: 'Save your Gemini API key', run: (_args, context) => saveApiKey(context) },
  'key-remove': {
    usage: 'key-remove',
    description: 'Forget the saved API key',
    run: (_args, context) => {
      const session = context.app.requireSession();
      const removed = session.repository.settings.remove('gemini_api_key');
      session.gateway.forgetApiKey();
      context.term.print(removed ? chalk.green('API key removed.') : chalk.dim('No API key was saved.'));
    },
  },
  pomodoro: {
    usage: 'pomodoro',
    description: 'Set work/break durations (blank keeps the current value)',
    run: (_args, context) => savePomodoro(context),
  },
  password: { usage: 'password', description: 'Change your password', run: (_args, context) => changePassword(context) },
  backup: { usage: 'backup [file]', description: 'Copy the database to a backup file', run: backup },
  restore: { usage: 'restore <file>', description: 'Replace the database with a backup', run: restore },
  'delete-account': {
    usage: 'delete-account',
    description: 'Delete your account and all its data',
    run: (_args, context) => deleteAccount(context),
  },
  show: { usage: 'show', description: 'Show current settings', run: (_args, context) => printOverview(context) },
};

export const settingsScreen: ScreenHandler = async (context) => {
  if (context.entering) {
    heading(context, 'Settings');
    printOverview(context);
    printHelp(context, COMMANDS);
  }
  return runCommandPrompt(context, 'settings', COMMANDS);
};
