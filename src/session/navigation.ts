/**
 * Screen navigation
 *
 * The screen set is a tagged union and the allowed moves are an explicit
 * table. Only LoggedOut exists without a session.
 *
 *   LoggedOut --login--> MainMenu
 *   MainMenu --open(X)--> X          (every menu screen)
 *   X --back--> MainMenu
 *   MainMenu --logout--> LoggedOut
 *   any signed-in screen --recover--> MainMenu
 */

import { InvalidTransitionError } from '../errors/index.js';
import type { Session } from './session.js';

/** Screens reachable from the main menu, in menu order */
export const MENU_SCREENS = [
  'TaskManager',
  'StudyTracker',
  'AIHelper',
  'AIQuiz',
  'AIChat',
  'Analytics',
  'ReviewHub',
  'Settings',
] as const;

export type MenuScreen = (typeof MENU_SCREENS)[number];
export type SignedInScreen = 'MainMenu' | MenuScreen;
export type Screen = 'LoggedOut' | SignedInScreen;

export type NavState = { screen: 'LoggedOut' } | { screen: SignedInScreen; session: Session };

export type NavAction =
  | { type: 'login'; session: Session }
  | { type: 'open'; screen: MenuScreen }
  | { type: 'back' }
  | { type: 'logout' }
  | { type: 'recover' };

export type NavActionType = NavAction['type'];

const BACK_OR_RECOVER: readonly NavActionType[] = ['back', 'recover'];

/**
 * Actions each screen accepts.
 */
export const TRANSITIONS: Record<Screen, readonly NavActionType[]> = {
  LoggedOut: ['login'],
  MainMenu: ['open', 'logout', 'recover'],
  TaskManager: BACK_OR_RECOVER,
  StudyTracker: BACK_OR_RECOVER,
  AIHelper: BACK_OR_RECOVER,
  AIQuiz: BACK_OR_RECOVER,
  AIChat: BACK_OR_RECOVER,
  Analytics: BACK_OR_RECOVER,
  ReviewHub: BACK_OR_RECOVER,
  Settings: BACK_OR_RECOVER,
};

export const INITIAL_NAV_STATE: NavState = { screen: 'LoggedOut' };

export function isMenuScreen(value: string): value is MenuScreen {
  return MENU_SCREENS.some((screen) => screen === value);
}

export function canTransition(state: NavState, action: NavActionType): boolean {
  return TRANSITIONS[state.screen].includes(action);
}

function describe(action: NavAction): string {
  return action.type === 'open' ? `open ${action.screen}` : action.type;
}

/**
 * Apply `action` to `state`.
 *
 * @throws InvalidTransitionError for a move the table does not allow
 */
export function transition(state: NavState, action: NavAction): NavState {
  if (!canTransition(state, action.type)) {
    throw new InvalidTransitionError(state.screen, describe(action));
  }

  if (action.type === 'login') {
    return { screen: 'MainMenu', session: action.session };
  }
  if (state.screen === 'LoggedOut') {
    throw new InvalidTransitionError(state.screen, describe(action));
  }

  switch (action.type) {
    case 'open':
      return { screen: action.screen, session: state.session };
    case 'back':
    case 'recover':
      return { screen: 'MainMenu', session: state.session };
    case 'logout':
      return { screen: 'LoggedOut' };
  }
}
