/**
 * Login / Register screen (no session).
 */

import chalk from 'chalk';
import { ValidationError } from '../../errors/index.js';
import type { DomainRepository } from '../../repository/index.js';
import { ask, askHidden, heading } from './shared.js';
import type { ScreenContext, ScreenHandler } from './types.js';

async function login(context: ScreenContext): Promise<void> {
  const username = await ask(context, 'Username: ');
  const password = await askHidden(context, 'Password: ');

  const session = await context.app.login(username, password);
  context.term.print(chalk.green(`Welcome back, ${session.username}!`));
  showReminders(context, session.repository);
}

async function register(context: ScreenContext): Promise<void> {
  const username = await ask(context, 'Choose a username: ');
  const password = await askHidden(context, 'Choose a password: ');
  const repeated = await askHidden(context, 'Repeat the password: ');

  if (password !== repeated) {
    throw new ValidationError('Passwords do not match', ['password: Type the same password twice']);
  }

  const user = await context.app.register(username, password);
  context.term.print(chalk.green(`Account "${user.username}" created. Log in to continue.`));
}

/**
 * Pending tasks due today and overdue, shown right after login.
 */
export function showReminders(context: ScreenContext, repository: DomainRepository): void {
  const { dueToday, overdue } = repository.tasks.reminders();
  if (dueToday.length === 0 && overdue.length === 0) {
    return;
  }

  context.term.print('');
  if (overdue.length > 0) {
    context.term.print(chalk.red(`Overdue (${overdue.length}):`));
    for (const task of overdue) {
      context.term.print(`  #${task.id} ${task.title} ${chalk.dim(`(due ${task.dueDate ?? ''})`)}`);
    }
  }
  if (dueToday.length > 0) {
    context.term.print(chalk.yellow(`Due today (${dueToday.length}):`));
    for (const task of dueToday) {
      context.term.print(`  #${task.id} ${task.title}`);
    }
  }
}

export const loggedOutScreen: ScreenHandler = async (context) => {
  if (context.entering) {
    heading(context, 'StudyDesk');
    context.term.print('  1) Log in');
    context.term.print('  2) Register');
    context.term.print('  q) Quit');
  }

  const choice = await context.term.prompt('> ');
  if (choice === undefined) {
    return 'quit';
  }

  switch (choice.trim().toLowerCase()) {
    case '1':
    case 'login':
      await login(context);
      break;
    case '2':
    case 'register':
      await register(context);
      break;
    case 'q':
    case 'quit':
      return 'quit';
    case '':
      break;
    default:
      context.term.print(chalk.yellow('Choose 1, 2 or q.'));
  }
  return 'continue';
};
