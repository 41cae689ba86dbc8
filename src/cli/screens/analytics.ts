/**
 * Analytics: completion rate, study time, quiz performance, streak and
 * learning points.
 */

import chalk from 'chalk';
import type { AnalyticsSummary } from '../../analytics/index.js';
import { formatTable, type Column } from '../../utils/table.js';
import { formatPercent, heading, printHelp, runCommandPrompt, type CommandSpec } from './shared.js';
import type { ScreenContext, ScreenHandler } from './types.js';

const SUBJECT_COLUMNS: Column[] = [
  { header: 'Subject', key: 'subject', maxWidth: 30 },
  { header: 'Min', key: 'minutes', align: 'right' },
  { header: 'Sessions', key: 'sessions', align: 'right' },
];

/** Summary lines for the Analytics screen */
export function formatSummary(summary: AnalyticsSummary): string[] {
  const { tasks, study, quizzes } = summary;
  return [
    `${chalk.bold('Learning points:')} ${summary.learningPoints}`,
    `${chalk.bold('Study streak:')} ${summary.streak} day(s)`,
    '',
    `${chalk.bold('Tasks:')} ${tasks.completed}/${tasks.total} completed (${formatPercent(tasks.rate)}), ${tasks.pending} pending`,
    `${chalk.bold('Study:')} ${study.sessions} session(s), ${study.totalMinutes} min; ` +
      `${study.daysLast7} of the last 7 days, ${study.daysLast30} of the last 30`,
    `${chalk.bold('Quizzes:')} ${quizzes.taken} taken, average ${formatPercent(quizzes.averageScore)}, ` +
      `${quizzes.totalCorrect} correct answer(s)`,
  ];
}

function printSummary(context: ScreenContext): void {
  const summary = context.app.analytics().summary();
  for (const line of formatSummary(summary)) {
    context.term.print(line);
  }

  if (summary.study.topSubjects.length > 0) {
    context.term.print('');
    context.term.print(chalk.bold('Top subjects'));
    context.term.print(formatTable(SUBJECT_COLUMNS, summary.study.topSubjects.map((s) => ({ ...s }))));
  }

  if (summary.quizzes.recent.length > 0) {
    context.term.print('');
    context.term.print(chalk.bold('Recent quizzes'));
    for (const quiz of summary.quizzes.recent) {
      context.term.print(`  ${quiz.takenAt.slice(0, 10)}  ${quiz.topic}  ${quiz.score}/${quiz.totalQuestions}`);
    }
  }
}

const COMMANDS: Record<string, CommandSpec> = {
  refresh: { usage: 'refresh', description: 'Recalculate', run: (_args, context) => printSummary(context) },
  range: {
    usage: 'range <from> <to>',
    description: 'Task completion for tasks created between two dates',
    run: (args, context) => {
      const tasks = context.app.analytics().taskCompletion({ from: args[0], to: args[1] });
      context.term.print(
        `${tasks.completed}/${tasks.total} completed (${formatPercent(tasks.rate)}), ${tasks.pending} pending`
      );
    },
  },
};

export const analyticsScreen: ScreenHandler = async (context) => {
  if (context.entering) {
    heading(context, 'Analytics');
    printSummary(context);
    context.term.print('');
    printHelp(context, COMMANDS);
  }
  return runCommandPrompt(context, 'analytics', COMMANDS);
};
