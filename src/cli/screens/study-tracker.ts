/**
 * Study Tracker: study logs, stopwatch and Pomodoro timer.
 */

import chalk from 'chalk';
import type { StudyLog } from '../../database/schema.js';
import { ValidationError } from '../../errors/index.js';
import { formatClock, type PomodoroPhase, type TimerMode } from '../../pomodoro/index.js';
import type { DomainRepository } from '../../repository/index.js';
import { formatTable, type Column } from '../../utils/table.js';
import { ask, confirm, heading, parseId, printHelp, runCommandPrompt, type CommandSpec } from './shared.js';
import type { ScreenContext, ScreenHandler } from './types.js';

const RECENT_LOGS = 20;

const LOG_COLUMNS: Column[] = [
  { header: '#', key: 'id', align: 'right' },
  { header: 'When', key: 'when' },
  { header: 'Subject', key: 'subject', maxWidth: 30 },
  { header: 'Min', key: 'minutes', align: 'right' },
  { header: 'Notes', key: 'notes', maxWidth: 30 },
];

const PHASE_LABELS: Record<PomodoroPhase, string> = {
  work: 'work',
  break: 'short break',
  long_break: 'long break',
};

function repo(context: ScreenContext): DomainRepository {
  return context.app.requireSession().repository;
}

function printLogs(context: ScreenContext, logs: StudyLog[]): void {
  if (logs.length === 0) {
    context.term.print(chalk.dim('No study sessions logged yet.'));
    return;
  }
  const rows = logs.map((log) => ({
    id: log.id,
    when: log.loggedAt.slice(0, 16),
    subject: log.subject,
    minutes: log.durationMinutes,
    notes: log.notes ?? '',
  }));
  context.term.print(formatTable(LOG_COLUMNS, rows));
}

function parseMinutes(value: string, fallback?: number): number {
  if (!value && fallback !== undefined) {
    return fallback;
  }
  const minutes = Number(value);
  if (!value || !Number.isInteger(minutes)) {
    throw new ValidationError('Invalid duration', ['durationMinutes: Enter whole minutes']);
  }
  return minutes;
}

/**
 * Ask for the rest of a log entry and save it. `minutes` pre-fills the duration.
 */
async function logSession(context: ScreenContext, minutes?: number): Promise<void> {
  const subject = await ask(context, 'Subject: ');
  const duration = await ask(context, minutes === undefined ? 'Minutes: ' : `Minutes [${minutes}]: `);
  const durationMinutes = parseMinutes(duration, minutes);
  const notes = await ask(context, 'Notes (optional): ');

  const log = repo(context).studyLogs.create({ subject, durationMinutes, notes });
  context.term.print(chalk.green(`Logged ${log.durationMinutes} min of ${log.subject}.`));
}

/**
 * Run the timer until the user presses Enter; returns the minutes studied.
 */
async function runTimer(context: ScreenContext, mode: TimerMode): Promise<number> {
  const timer = context.app.createTimer();
  timer.setMode(mode);
  timer.on('phase', (finished, next, snapshot) => {
    const minutes = Math.round((snapshot.remainingSeconds ?? 0) / 60);
    context.term.print(
      chalk.magenta(`⏰ ${PHASE_LABELS[finished]} finished. ${PHASE_LABELS[next]} for ${minutes} min.`)
    );
  });

  try {
    timer.start();
    await ask(context, chalk.dim(`${mode === 'pomodoro' ? 'Pomodoro' : 'Stopwatch'} running. Press Enter to stop.`));
    const elapsed = formatClock(timer.snapshot().elapsedSeconds);
    const minutes = timer.stop();
    context.term.print(`Stopped at ${elapsed}.`);
    return minutes;
  } finally {
    timer.reset();
    timer.removeAllListeners();
  }
}

const COMMANDS: Record<string, CommandSpec> = {
  log: {
    usage: 'log',
    description: 'Log a study session',
    run: (_args, context) => logSession(context),
  },
  list: {
    usage: 'list',
    description: `Show the last ${RECENT_LOGS} sessions`,
    run: (_args, context) => printLogs(context, repo(context).studyLogs.list({ limit: RECENT_LOGS })),
  },
  delete: {
    usage: 'delete <id>',
    description: 'Delete a session',
    run: async (args, context) => {
      const repository = repo(context);
      const log = repository.studyLogs.get(parseId(args[0], 'session'));
      if (await confirm(context, `Delete ${log.durationMinutes} min of ${log.subject}?`)) {
        repository.studyLogs.delete(log.id);
        context.term.print(chalk.green(`Deleted session #${log.id}.`));
      }
    },
  },
  stopwatch: {
    usage: 'stopwatch',
    description: 'Time a session, then log it',
    run: async (_args, context) => logSession(context, await runTimer(context, 'stopwatch')),
  },
  pomodoro: {
    usage: 'pomodoro',
    description: 'Work/break countdown; log the work time when stopped',
    run: async (_args, context) => {
      const minutes = await runTimer(context, 'pomodoro');
      if (await confirm(context, `Log ${minutes} min of work?`)) {
        await logSession(context, minutes);
      }
    },
  },
  totals: {
    usage: 'totals',
    description: 'Sessions and minutes so far',
    run: (_args, context) => {
      const { sessions, totalMinutes } = repo(context).studyLogs.totals();
      context.term.print(`${sessions} session(s), ${totalMinutes} minute(s) in total.`);
    },
  },
};

export const studyTrackerScreen: ScreenHandler = async (context) => {
  if (context.entering) {
    heading(context, 'Study Tracker');
    printLogs(context, repo(context).studyLogs.list({ limit: RECENT_LOGS }));
    printHelp(context, COMMANDS);
  }
  return runCommandPrompt(context, 'study', COMMANDS);
};
