/**
 * AI Helper: explain, summarize, practice questions. Answers can be saved
 * to the Review Hub.
 */

import chalk from 'chalk';
import { HELPER_MODES, HELPER_MODE_KINDS, type HelperMode } from '../../providers/types.js';
import { ask, confirm, heading, printHelp, runCommandPrompt, withSpinner, type CommandSpec } from './shared.js';
import type { ScreenContext, ScreenHandler } from './types.js';

const DESCRIPTIONS: Record<HelperMode, string> = {
  explain: 'Explain a topic or passage',
  summarize: 'Summarize a passage into key points',
  questions: 'Write practice questions about a topic',
};

async function runHelper(context: ScreenContext, mode: HelperMode): Promise<void> {
  const session = context.app.requireSession();
  const prompt = await ask(context, 'Topic or text: ');

  const answer = await withSpinner(context, 'Asking Gemini...', (signal) =>
    session.gateway.ask(prompt, mode, { signal })
  );

  context.term.print('');
  context.term.print(answer);
  context.term.print('');

  if (await confirm(context, 'Save to the Review Hub?')) {
    const saved = session.repository.aiContent.save({
      kind: HELPER_MODE_KINDS[mode],
      prompt,
      responseText: answer,
    });
    context.term.print(chalk.green(`Saved as "${saved.title}".`));
  }
}

const COMMANDS: Record<string, CommandSpec> = Object.fromEntries(
  HELPER_MODES.map((mode): [string, CommandSpec] => [
    mode,
    { usage: mode, description: DESCRIPTIONS[mode], run: (_args, context) => runHelper(context, mode) },
  ])
);

export const aiHelperScreen: ScreenHandler = async (context) => {
  if (context.entering) {
    heading(context, 'AI Helper');
    printHelp(context, COMMANDS);
  }
  return runCommandPrompt(context, 'helper', COMMANDS);
};
