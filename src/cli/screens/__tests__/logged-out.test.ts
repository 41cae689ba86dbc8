/**
 * Tests for the login/register screen and the main menu
 */

import { describe, it, expect } from 'vitest';
import { NetworkError } from '../../../errors/index.js';
import { createScreenHarness } from '../../../test-utils/index.js';

const RULE = '─'.repeat(20);

const MAIN_MENU = [
  '',
  'Main menu · ada',
  RULE,
  '"Keep going!"',
  '  1) Task Manager',
  '  2) Study Tracker',
  '  3) AI Helper',
  '  4) AI Quiz',
  '  5) AI Chat',
  '  6) Analytics',
  '  7) Review Hub',
  '  8) Settings',
  '  l) Log out',
  '  q) Quit',
];

const LOGGED_OUT_MENU = ['', 'StudyDesk', RULE, '  1) Log in', '  2) Register', '  q) Quit'];

describe('logged-out screen', () => {
  it('registers, logs in and quits from the main menu', async () => {
    const harness = await createScreenHarness(
      ['2', 'ada', 'test-secret', 'test-secret', '1', 'ada', 'test-secret', 'q'],
      { signedIn: false }
    );

    await harness.run();

    expect(harness.term.output).toEqual([
      ...LOGGED_OUT_MENU,
      'Account "ada" created. Log in to continue.',
      'Welcome back, ada!',
      ...MAIN_MENU,
    ]);
    expect(harness.term.prompts).toEqual([
      '> ',
      'Choose a username: ',
      'Choose a password: ',
      'Repeat the password: ',
      '> ',
      'Username: ',
      'Password: ',
      '> ',
    ]);
    expect(harness.app.screen).toBe('LoggedOut');
  });

  it('reports mismatched passwords and stays on the screen', async () => {
    const harness = await createScreenHarness(['2', 'ada', 'test-secret', 'other-secret'], { signedIn: false });

    await harness.run();

    expect(harness.term.output.slice(-2)).toEqual([
      '✗ Passwords do not match',
      '  password: Type the same password twice',
    ]);
    expect(harness.term.prompts.at(-1)).toBe('> ');
  });

  it('shows a generic message for bad credentials', async () => {
    const harness = await createScreenHarness(['1', 'nobody', 'test-secret'], { signedIn: false });

    await harness.run();

    expect(harness.term.output.at(-1)).toBe('✗ Invalid username or password');
    expect(harness.app.screen).toBe('LoggedOut');
  });

  it('reports a taken username', async () => {
    const harness = await createScreenHarness(['2', 'ada', 'test-secret', 'test-secret']);
    harness.app.logout();

    await harness.run();

    expect(harness.term.output.at(-1)).toBe('✗ Username "ada" is already taken');
  });

  it('asks again on an unknown choice', async () => {
    const harness = await createScreenHarness(['7', '', 'quit'], { signedIn: false });

    await harness.run();

    expect(harness.term.output).toEqual([...LOGGED_OUT_MENU, 'Choose 1, 2 or q.']);
    expect(harness.term.prompts).toEqual(['> ', '> ', '> ']);
  });

  it('lists overdue and due-today tasks after login', async () => {
    const harness = await createScreenHarness(['1', 'ada', 'test-secret']);
    const repository = harness.repository();
    repository.tasks.create({ title: 'Essay', dueDate: '2024-03-14' });
    repository.tasks.create({ title: 'Quiz prep', dueDate: '2024-03-15' });
    repository.tasks.create({ title: 'Project', dueDate: '2024-03-20' });
    harness.app.logout();

    await harness.run();

    const welcome = harness.term.output.indexOf('Welcome back, ada!');
    expect(harness.term.output.slice(welcome, welcome + 6)).toEqual([
      'Welcome back, ada!',
      '',
      'Overdue (1):',
      '  #1 Essay (due 2024-03-14)',
      'Due today (1):',
      '  #2 Quiz prep',
    ]);
  });
});

describe('main menu', () => {
  it('rejects an unknown choice and logs out', async () => {
    const harness = await createScreenHarness(['9', 'l']);

    await harness.run();

    expect(harness.term.output).toEqual([...MAIN_MENU, 'Choose 1-8, l or q.', 'Logged out.', ...LOGGED_OUT_MENU]);
    expect(harness.gateway.forgotten).toBe(1);
  });

  it('shows a fetched quote under the heading', async () => {
    const harness = await createScreenHarness(['q']);
    harness.repository().settings.set('gemini_api_key', 'test-key');
    harness.gateway.reply('Small steps add up.');

    await harness.run();

    expect(harness.term.output.slice(0, 5)).toEqual(['', 'Main menu · ada', RULE, '"Small steps add up."', '  1) Task Manager']);
    expect(harness.term.spinners).toEqual(['Fetching inspiration... (Ctrl+C to stop waiting)']);
    expect(harness.gateway.asks.map((ask) => ask.mode)).toEqual(['quote']);
  });

  it('shows the fixed line instead of an error when the quote request fails', async () => {
    const harness = await createScreenHarness(['q']);
    harness.repository().settings.set('gemini_api_key', 'test-key');
    harness.gateway.reply(new NetworkError('Could not reach Gemini: fetch failed'));

    await harness.run();

    expect(harness.term.output).toEqual(MAIN_MENU);
  });

  it('opens screens by number or name and redraws on return', async () => {
    const harness = await createScreenHarness(['study tracker', 'back', '6', 'back', 'q']);

    await harness.run();

    expect(harness.term.prompts).toEqual(['> ', 'study> ', '> ', 'analytics> ', '> ']);
    expect(harness.term.output.filter((line) => line === 'Main menu · ada')).toHaveLength(3);
    expect(harness.app.screen).toBe('LoggedOut');
  });

  it('signs out when input ends', async () => {
    const harness = await createScreenHarness([]);

    await harness.run();

    expect(harness.app.screen).toBe('LoggedOut');
    expect(harness.session?.active).toBe(false);
  });
});
