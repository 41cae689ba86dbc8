/**
 * AI Chat: persistent conversation with Gemini.
 *
 * Plain lines are messages; lines starting with "/" are commands.
 */

import chalk from 'chalk';
import type { ChatMessage } from '../../database/schema.js';
import type { ChatTurn } from '../../providers/types.js';
import { confirm, heading, withSpinner } from './shared.js';
import type { ScreenContext, ScreenHandler } from './types.js';

const SPEAKERS = { user: 'You', model: 'Gemini' } as const;

function printMessage(context: ScreenContext, message: ChatTurn): void {
  const speaker = SPEAKERS[message.role];
  const label = message.role === 'user' ? chalk.cyan(`${speaker}:`) : chalk.magenta(`${speaker}:`);
  context.term.print(`${label} ${message.content}`);
}

/** Plain-text transcript used for chat snapshots */
export function formatTranscript(messages: ChatMessage[]): string {
  return messages.map((m) => `${SPEAKERS[m.role]}: ${m.content}`).join('\n\n');
}

function printChatHelp(context: ScreenContext): void {
  context.term.print(chalk.dim('Type a message, or /save, /clear, /back, /help.'));
}

async function send(context: ScreenContext, text: string): Promise<void> {
  const { app } = context;
  const { repository, gateway } = app.requireSession();

  const history: ChatTurn[] = repository.chat
    .recent(app.settings.ai.chat_context_messages)
    .map((m) => ({ role: m.role, content: m.content }));

  const reply = await withSpinner(context, 'Gemini is thinking...', (signal) =>
    gateway.chat([...history, { role: 'user', content: text }], { signal })
  );

  repository.chat.appendExchange(text, reply);
  printMessage(context, { role: 'model', content: reply });
}

async function runSlashCommand(context: ScreenContext, command: string): Promise<void> {
  const { app, term } = context;
  const { repository } = app.requireSession();

  switch (command) {
    case '/back':
      app.back();
      return;
    case '/clear':
      if (await confirm(context, 'Delete the whole conversation?')) {
        const removed = repository.chat.clear();
        term.print(chalk.green(`Cleared ${removed} message(s).`));
      }
      return;
    case '/save': {
      const messages = repository.chat.recent(app.settings.ai.chat_history_limit);
      const firstQuestion = messages.find((m) => m.role === 'user');
      if (!firstQuestion) {
        term.print(chalk.yellow('Nothing to save yet.'));
        return;
      }
      const saved = repository.aiContent.save({
        kind: 'chat_snapshot',
        prompt: firstQuestion.content,
        responseText: formatTranscript(messages),
      });
      term.print(chalk.green(`Saved as "${saved.title}".`));
      return;
    }
    default:
      printChatHelp(context);
  }
}

export const aiChatScreen: ScreenHandler = async (context) => {
  const { app, term } = context;

  if (context.entering) {
    heading(context, 'AI Chat');
    const history = app.requireSession().repository.chat.recent(app.settings.ai.chat_history_limit);
    for (const message of history) {
      printMessage(context, message);
    }
    printChatHelp(context);
  }

  const line = await term.prompt(chalk.cyan('you> '));
  if (line === undefined) {
    return 'quit';
  }

  const text = line.trim();
  if (!text) {
    return 'continue';
  }
  if (text.startsWith('/')) {
    await runSlashCommand(context, text.toLowerCase());
  } else {
    await send(context, text);
  }
  return 'continue';
};
