export { Session } from './session.js';
export {
  MENU_SCREENS,
  TRANSITIONS,
  INITIAL_NAV_STATE,
  isMenuScreen,
  canTransition,
  transition,
  type MenuScreen,
  type SignedInScreen,
  type Screen,
  type NavState,
  type NavAction,
  type NavActionType,
} from './navigation.js';
export {
  AppController,
  type AppControllerOptions,
  type GatewayFactory,
} from './controller.js';
