/**
 * AI Quiz: generate a multiple-choice quiz, take it, record the score.
 */

import chalk from 'chalk';
import type { AnsweredQuestion, QuizQuestion, QuizResult } from '../../database/schema.js';
import { ValidationError } from '../../errors/index.js';
import { formatTable, type Column } from '../../utils/table.js';
import {
  ask,
  formatPercent,
  heading,
  printHelp,
  runCommandPrompt,
  withSpinner,
  type CommandSpec,
} from './shared.js';
import type { ScreenContext, ScreenHandler } from './types.js';

export const CHOICE_LETTERS = ['A', 'B', 'C', 'D'] as const;

const HISTORY_COLUMNS: Column[] = [
  { header: '#', key: 'id', align: 'right' },
  { header: 'Taken', key: 'taken' },
  { header: 'Topic', key: 'topic', maxWidth: 40 },
  { header: 'Score', key: 'score', align: 'right' },
];

/** Letter (or 1-4) typed by the user; null when skipped or unrecognised */
export function parseChoice(answer: string): number | null {
  const value = answer.trim().toUpperCase();
  const letter = CHOICE_LETTERS.findIndex((l) => l === value);
  if (letter !== -1) {
    return letter;
  }
  const number = Number(value);
  return Number.isInteger(number) && number >= 1 && number <= 4 ? number - 1 : null;
}

export function printQuizHistory(context: ScreenContext, results: QuizResult[]): void {
  if (results.length === 0) {
    context.term.print(chalk.dim('No quizzes taken yet.'));
    return;
  }
  const rows = results.map((result) => ({
    id: result.id,
    taken: result.takenAt.slice(0, 16),
    topic: result.topic,
    score: `${result.score}/${result.totalQuestions}`,
  }));
  context.term.print(formatTable(HISTORY_COLUMNS, rows));
}

async function askQuestion(context: ScreenContext, question: QuizQuestion, position: string): Promise<AnsweredQuestion> {
  const { term } = context;
  term.print('');
  term.print(chalk.bold(`${position} ${question.question}`));
  question.choices.forEach((choice, i) => term.print(`  ${CHOICE_LETTERS[i] ?? '?'}) ${choice}`));

  const selectedIndex = parseChoice(await ask(context, 'Answer (A-D, blank to skip): '));
  const correctLetter = CHOICE_LETTERS[question.correctIndex] ?? '?';

  if (selectedIndex === question.correctIndex) {
    term.print(chalk.green('✓ Correct'));
  } else {
    term.print(chalk.red(`✗ The answer is ${correctLetter}) ${question.choices[question.correctIndex] ?? ''}`));
  }
  if (question.explanation) {
    term.print(chalk.dim(question.explanation));
  }

  return { ...question, selectedIndex };
}

async function takeQuiz(context: ScreenContext): Promise<void> {
  const { app } = context;
  const session = app.requireSession();
  const defaultCount = app.settings.quiz.default_questions;

  const topic = await ask(context, 'Quiz topic: ');
  const countText = await ask(context, `Number of questions [${defaultCount}]: `);
  const count = countText ? Number(countText) : defaultCount;
  if (!Number.isInteger(count)) {
    throw new ValidationError('Invalid quiz request', ['count: Enter a whole number']);
  }

  const questions = await withSpinner(context, 'Writing your quiz...', (signal) =>
    session.gateway.generateQuiz(topic, count, { signal })
  );

  const answered: AnsweredQuestion[] = [];
  for (const [i, question] of questions.entries()) {
    answered.push(await askQuestion(context, question, `Q${i + 1}/${questions.length}`));
  }

  const score = answered.filter((q) => q.selectedIndex === q.correctIndex).length;
  session.repository.quizzes.record({
    topic,
    score,
    totalQuestions: answered.length,
    questions: answered,
  });

  context.term.print('');
  context.term.print(
    chalk.bold(`Score: ${score}/${answered.length} (${formatPercent(score / answered.length)})`)
  );
}

const COMMANDS: Record<string, CommandSpec> = {
  new: { usage: 'new', description: 'Generate and take a quiz', run: (_args, context) => takeQuiz(context) },
  history: {
    usage: 'history',
    description: 'Past quiz scores',
    run: (_args, context) => printQuizHistory(context, context.app.requireSession().repository.quizzes.list()),
  },
};

export const aiQuizScreen: ScreenHandler = async (context) => {
  if (context.entering) {
    heading(context, 'AI Quiz');
    printHelp(context, COMMANDS);
  }
  return runCommandPrompt(context, 'quiz', COMMANDS);
};
