import { describe, it, expect } from 'vitest';
import {
  INITIAL_NAV_STATE,
  MENU_SCREENS,
  canTransition,
  isMenuScreen,
  transition,
  type NavState,
} from '../navigation.js';
import { Session } from '../session.js';
import { InvalidTransitionError } from '../../errors/index.js';
import type { DomainRepository } from '../../repository/index.js';
import { FakeGateway, createTestDb, seedRepository } from '../../test-utils/index.js';

function makeSession(): Session {
  const repository: DomainRepository = seedRepository(createTestDb());
  return new Session({ id: repository.ownerId, username: 'ada', createdAt: '2024-03-01 09:00:00' }, repository, new FakeGateway(), new Date());
}

describe('navigation', () => {
  const session = makeSession();
  const menu: NavState = { screen: 'MainMenu', session };

  it('starts logged out', () => {
    expect(INITIAL_NAV_STATE).toEqual({ screen: 'LoggedOut' });
  });

  it('logs in to the main menu', () => {
    expect(transition(INITIAL_NAV_STATE, { type: 'login', session })).toEqual(menu);
  });

  it('opens every menu screen and comes back', () => {
    for (const screen of MENU_SCREENS) {
      const opened = transition(menu, { type: 'open', screen });
      expect(opened).toEqual({ screen, session });
      expect(transition(opened, { type: 'back' })).toEqual(menu);
      expect(transition(opened, { type: 'recover' })).toEqual(menu);
    }
  });

  it('logs out only from the main menu', () => {
    expect(transition(menu, { type: 'logout' })).toEqual({ screen: 'LoggedOut' });
    expect(() => transition({ screen: 'Settings', session }, { type: 'logout' })).toThrow(
      'Cannot logout from Settings'
    );
  });

  it('rejects moves the table does not list', () => {
    expect(() => transition(INITIAL_NAV_STATE, { type: 'open', screen: 'Analytics' })).toThrow(
      'Cannot open Analytics from LoggedOut'
    );
    expect(() => transition(menu, { type: 'login', session })).toThrow(InvalidTransitionError);
    expect(() => transition({ screen: 'AIChat', session }, { type: 'open', screen: 'AIQuiz' })).toThrow(
      'Cannot open AIQuiz from AIChat'
    );
    expect(() => transition(menu, { type: 'back' })).toThrow('Cannot back from MainMenu');
    expect(() => transition(INITIAL_NAV_STATE, { type: 'recover' })).toThrow(InvalidTransitionError);
  });

  it('answers canTransition from the table', () => {
    expect(canTransition(INITIAL_NAV_STATE, 'login')).toBe(true);
    expect(canTransition(menu, 'recover')).toBe(true);
    expect(canTransition({ screen: 'ReviewHub', session }, 'open')).toBe(false);
  });

  it('recognises menu screen names', () => {
    expect(isMenuScreen('TaskManager')).toBe(true);
    expect(isMenuScreen('MainMenu')).toBe(false);
    expect(isMenuScreen('tasks')).toBe(false);
  });
});

describe('Session', () => {
  it('forgets the API key when it ends', () => {
    const gateway = new FakeGateway();
    const repository = seedRepository(createTestDb());
    const session = new Session({ id: repository.ownerId, username: 'ada', createdAt: '' }, repository, gateway, new Date());

    expect(session.active).toBe(true);
    session.end();

    expect(session.active).toBe(false);
    expect(gateway.forgotten).toBe(1);
  });
});
