/**
 * Review Hub: saved AI content and past quizzes.
 */

import chalk from 'chalk';
import { AI_CONTENT_KINDS, type AIContent, type AIContentKind } from '../../database/schema.js';
import { ValidationError } from '../../errors/index.js';
import { AI_CONTENT_LABELS, type DomainRepository } from '../../repository/index.js';
import { formatTable, type Column } from '../../utils/table.js';
import { CHOICE_LETTERS, printQuizHistory } from './ai-quiz.js';
import { heading, parseId, printHelp, runCommandPrompt, type CommandSpec } from './shared.js';
import type { ScreenContext, ScreenHandler } from './types.js';

const CONTENT_COLUMNS: Column[] = [
  { header: '#', key: 'id', align: 'right' },
  { header: 'Saved', key: 'saved' },
  { header: 'Kind', key: 'kind' },
  { header: 'Title', key: 'title', maxWidth: 50 },
];

function repo(context: ScreenContext): DomainRepository {
  return context.app.requireSession().repository;
}

function parseKind(value: string | undefined): AIContentKind | undefined {
  if (value === undefined) {
    return undefined;
  }
  const kind = AI_CONTENT_KINDS.find((k) => k === value.toLowerCase());
  if (!kind) {
    throw new ValidationError('Unknown kind', [`kind: Use one of ${AI_CONTENT_KINDS.join(', ')}`]);
  }
  return kind;
}

function printContentList(context: ScreenContext, items: AIContent[]): void {
  if (items.length === 0) {
    context.term.print(chalk.dim('Nothing saved yet.'));
    return;
  }
  const rows = items.map((item) => ({
    id: item.id,
    saved: item.createdAt.slice(0, 16),
    kind: AI_CONTENT_LABELS[item.kind],
    title: item.title,
  }));
  context.term.print(formatTable(CONTENT_COLUMNS, rows));
}

const COMMANDS: Record<string, CommandSpec> = {
  list: {
    usage: `list [${AI_CONTENT_KINDS.join('|')}]`,
    description: 'Saved AI content, newest first',
    run: (args, context) => printContentList(context, repo(context).aiContent.list({ kind: parseKind(args[0]) })),
  },
  show: {
    usage: 'show <id>',
    description: 'Open a saved item',
    run: (args, context) => {
      const item = repo(context).aiContent.get(parseId(args[0], 'item'));
      context.term.print('');
      context.term.print(chalk.bold(item.title));
      context.term.print(chalk.dim(`${AI_CONTENT_LABELS[item.kind]} · ${item.createdAt}`));
      context.term.print(chalk.dim(`Prompt: ${item.prompt}`));
      context.term.print('');
      context.term.print(item.responseText);
    },
  },
  quizzes: {
    usage: 'quizzes',
    description: 'Past quiz scores',
    run: (_args, context) => printQuizHistory(context, repo(context).quizzes.list()),
  },
  quiz: {
    usage: 'quiz <id>',
    description: 'Review the questions of a past quiz',
    run: (args, context) => {
      const result = repo(context).quizzes.get(parseId(args[0], 'quiz'));
      context.term.print('');
      context.term.print(chalk.bold(`${result.topic}: ${result.score}/${result.totalQuestions}`));

      if (result.questions.length === 0) {
        context.term.print(chalk.dim('The questions of this quiz were not kept.'));
        return;
      }
      result.questions.forEach((q, i) => {
        const correct = CHOICE_LETTERS[q.correctIndex] ?? '?';
        const picked = q.selectedIndex === null ? 'skipped' : (CHOICE_LETTERS[q.selectedIndex] ?? '?');
        const mark = q.selectedIndex === q.correctIndex ? chalk.green('✓') : chalk.red('✗');
        context.term.print(`${mark} ${i + 1}. ${q.question}`);
        context.term.print(chalk.dim(`   answer ${correct}, you chose ${picked}`));
      });
    },
  },
};

export const reviewHubScreen: ScreenHandler = async (context) => {
  if (context.entering) {
    heading(context, 'Review Hub');
    printContentList(context, repo(context).aiContent.list({ limit: 20 }));
    printHelp(context, COMMANDS);
  }
  return runCommandPrompt(context, 'review', COMMANDS);
};
