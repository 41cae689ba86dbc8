/**
 * Main menu: the hub every signed-in screen returns to.
 */

import chalk from 'chalk';
import { MENU_SCREENS, type MenuScreen } from '../../session/navigation.js';
import { FALLBACK_QUOTE } from '../../providers/templates.js';
import { heading, withSpinner } from './shared.js';
import type { ScreenHandler } from './types.js';

export const SCREEN_LABELS: Record<MenuScreen, string> = {
  TaskManager: 'Task Manager',
  StudyTracker: 'Study Tracker',
  AIHelper: 'AI Helper',
  AIQuiz: 'AI Quiz',
  AIChat: 'AI Chat',
  Analytics: 'Analytics',
  ReviewHub: 'Review Hub',
  Settings: 'Settings',
};

function findScreen(choice: string): MenuScreen | undefined {
  const index = Number(choice);
  if (Number.isInteger(index) && index >= 1 && index <= MENU_SCREENS.length) {
    return MENU_SCREENS[index - 1];
  }
  const wanted = choice.replace(/\s+/g, '').toLowerCase();
  return MENU_SCREENS.find((screen) => screen.toLowerCase() === wanted);
}

export const mainMenuScreen: ScreenHandler = async (context) => {
  const { app, term } = context;

  if (context.entering) {
    heading(context, `Main menu · ${app.requireSession().username}`);
    const quote = app.hasApiKey()
      ? await withSpinner(context, 'Fetching inspiration...', (signal) => app.motivationalQuote(signal))
      : FALLBACK_QUOTE;
    term.print(chalk.italic(`"${quote}"`));
    MENU_SCREENS.forEach((screen, i) => term.print(`  ${i + 1}) ${SCREEN_LABELS[screen]}`));
    term.print('  l) Log out');
    term.print('  q) Quit');
  }

  const line = await term.prompt('> ');
  if (line === undefined) {
    app.logout();
    return 'quit';
  }

  const choice = line.trim().toLowerCase();
  if (!choice) {
    return 'continue';
  }
  if (choice === 'l' || choice === 'logout') {
    app.logout();
    term.print(chalk.dim('Logged out.'));
    return 'continue';
  }
  if (choice === 'q' || choice === 'quit') {
    app.logout();
    return 'quit';
  }

  const screen = findScreen(choice);
  if (!screen) {
    term.print(chalk.yellow(`Choose 1-${MENU_SCREENS.length}, l or q.`));
    return 'continue';
  }
  app.open(screen);
  return 'continue';
};
