/**
 * Helpers shared by the screens: command prompts, field prompts, the AI
 * wait spinner and error reporting.
 */

import chalk from 'chalk';
import { CLIError, NotFoundError, ValidationError, formatError } from '../../errors/index.js';
import type { ScreenContext, ScreenOutcome } from './types.js';

/**
 * Input ended (Ctrl+D, closed stdin) in the middle of a screen.
 */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

// ============================================================================
// PROMPTS
// ============================================================================

/** Trimmed answer; throws InputClosedError once input has ended */
export async function ask(context: ScreenContext, question: string): Promise<string> {
  const answer = await context.term.prompt(question);
  if (answer === undefined) {
    throw new InputClosedError();
  }
  return answer.trim();
}

export async function askHidden(context: ScreenContext, question: string): Promise<string> {
  const answer = await context.term.promptHidden(question);
  if (answer === undefined) {
    throw new InputClosedError();
  }
  return answer;
}

export async function confirm(context: ScreenContext, question: string): Promise<boolean> {
  const answer = await ask(context, `${question} (y/N) `);
  return /^y(es)?$/i.test(answer);
}

/**
 * Positive integer id typed by the user.
 */
export function parseId(value: string | undefined, what: string): number {
  const id = Number(value);
  if (!value || !Number.isInteger(id) || id <= 0) {
    throw new ValidationError(`Invalid ${what} number`, [`id: Enter the ${what} number shown in the list`]);
  }
  return id;
}

// ============================================================================
// COMMAND PROMPT
// ============================================================================

export interface CommandSpec {
  /** e.g. `done <id>` */
  usage: string;
  description: string;
  run: (args: string[], context: ScreenContext) => Promise<ScreenOutcome | void> | ScreenOutcome | void;
}

export function printHelp(context: ScreenContext, commands: Record<string, CommandSpec>): void {
  const rows: Array<[string, string]> = [
    ...Object.values(commands).map((entry): [string, string] => [entry.usage, entry.description]),
    ['back', 'Return to the main menu'],
    ['help', 'Show this list'],
  ];
  const width = Math.max(...rows.map(([usage]) => usage.length));
  for (const [usage, description] of rows) {
    context.term.print(`  ${chalk.cyan(usage.padEnd(width))}  ${description}`);
  }
}

/**
 * Read one command line and dispatch it. `back` and `help` are built in.
 */
export async function runCommandPrompt(
  context: ScreenContext,
  label: string,
  commands: Record<string, CommandSpec>
): Promise<ScreenOutcome> {
  const line = await context.term.prompt(`${label}> `);
  if (line === undefined) {
    return 'quit';
  }

  const [name = '', ...args] = line.trim().split(/\s+/);
  const command = name.toLowerCase();
  if (!command) {
    return 'continue';
  }

  if (command === 'back') {
    context.app.back();
    return 'continue';
  }
  if (command === 'help' || command === '?') {
    printHelp(context, commands);
    return 'continue';
  }

  const entry = commands[command];
  if (!entry) {
    context.term.print(chalk.yellow(`Unknown command '${command}'. Type help for the list.`));
    return 'continue';
  }

  return (await entry.run(args, context)) ?? 'continue';
}

// ============================================================================
// AI WAIT
// ============================================================================

/**
 * Run an AI request behind a spinner. Ctrl+C abandons the wait.
 */
export async function withSpinner<T>(
  context: ScreenContext,
  text: string,
  work: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const unregister = context.term.onInterrupt(() => controller.abort());
  const spinner = context.term.spin(`${text} ${chalk.dim('(Ctrl+C to stop waiting)')}`);

  try {
    return await work(controller.signal);
  } finally {
    spinner.stop();
    unregister();
  }
}

// ============================================================================
// ERRORS
// ============================================================================

/**
 * Show a failure according to its disposition. Never exits.
 */
export function reportError(context: ScreenContext, error: unknown): void {
  const { term, app } = context;
  const disposition = app.handleError(error);
  const message = error instanceof Error ? error.message : String(error);

  switch (disposition) {
    case 'inline':
      term.print(chalk.red(`✗ ${message}`));
      if (error instanceof ValidationError) {
        for (const issue of error.issues) {
          term.print(chalk.red(`  ${issue}`));
        }
      }
      break;
    case 'form':
      term.print(chalk.red(`✗ ${message}`));
      break;
    case 'settings-hint':
      term.print(chalk.yellow(message));
      if (error instanceof CLIError && error.hint) {
        term.print(chalk.dim(error.hint));
      }
      break;
    case 'dialog':
      term.print('');
      term.print(formatError(error));
      term.print('');
      break;
    case 'notice':
      term.print(chalk.dim(message));
      break;
    case 'not-found':
      term.print(chalk.yellow(error instanceof NotFoundError ? `${error.entity} not found.` : 'Not found.'));
      break;
    case 'recover':
      term.print(chalk.red(`Something went wrong: ${message}`));
      if (app.screen !== 'LoggedOut') {
        term.print(chalk.dim('Back at the main menu.'));
      }
      break;
  }
}

// ============================================================================
// FORMATTING
// ============================================================================

export function formatPercent(ratio: number): string {
  return `${Math.round(ratio * 100)}%`;
}

export function heading(context: ScreenContext, title: string): void {
  context.term.print('');
  context.term.print(chalk.bold(title));
  context.term.print(chalk.dim('─'.repeat(Math.max(title.length, 20))));
}
