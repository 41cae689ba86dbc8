/**
 * Screen table and the interactive loop.
 */

import type { Screen } from '../../session/navigation.js';
import { aiChatScreen } from './ai-chat.js';
import { aiHelperScreen } from './ai-helper.js';
import { aiQuizScreen } from './ai-quiz.js';
import { analyticsScreen } from './analytics.js';
import { loggedOutScreen } from './logged-out.js';
import { mainMenuScreen } from './main-menu.js';
import { reviewHubScreen } from './review-hub.js';
import { settingsScreen } from './settings.js';
import { InputClosedError, reportError } from './shared.js';
import { studyTrackerScreen } from './study-tracker.js';
import { taskManagerScreen } from './task-manager.js';
import type { ScreenContext, ScreenHandler } from './types.js';

export const SCREENS: Record<Screen, ScreenHandler> = {
  LoggedOut: loggedOutScreen,
  MainMenu: mainMenuScreen,
  TaskManager: taskManagerScreen,
  StudyTracker: studyTrackerScreen,
  AIHelper: aiHelperScreen,
  AIQuiz: aiQuizScreen,
  AIChat: aiChatScreen,
  Analytics: analyticsScreen,
  ReviewHub: reviewHubScreen,
  Settings: settingsScreen,
};

/**
 * Run screens until the user quits or input ends. Errors are reported by
 * disposition and never end the loop.
 */
export async function runScreens(context: Omit<ScreenContext, 'entering'>): Promise<void> {
  const { app } = context;
  let previous: Screen | undefined;

  for (;;) {
    const screen = app.screen;
    const entering = screen !== previous;
    previous = screen;

    try {
      const outcome = await SCREENS[screen]({ ...context, entering });
      if (outcome === 'quit') {
        break;
      }
    } catch (error) {
      if (error instanceof InputClosedError) {
        break;
      }
      reportError({ ...context, entering }, error);
    }
  }

  if (app.screen !== 'LoggedOut') {
    app.recover();
    app.logout();
  }
}

export type { ScreenContext, ScreenHandler, ScreenOutcome } from './types.js';
