/**
 * Tests for the Study Tracker screen
 */

import { describe, it, expect } from 'vitest';
import { createScreenHarness } from '../../../test-utils/index.js';

describe('study tracker screen', () => {
  it('logs sessions, rejects bad durations and shows totals', async () => {
    const harness = await createScreenHarness([
      '2',
      'log',
      'Calculus',
      '45',
      'Chapter 4',
      'log',
      'Physics',
      'abc',
      'log',
      'Physics',
      '0',
      '',
      'totals',
    ]);

    await harness.run();
    const lines = harness.lines();

    expect(lines).toContain('No study sessions logged yet.');
    expect(lines).toContain('Logged 45 min of Calculus.');
    expect(lines).toContain('✗ Invalid duration');
    expect(lines).toContain('  durationMinutes: Enter whole minutes');
    expect(lines).toContain('✗ Invalid study log');
    expect(lines).toContain('  durationMinutes: Duration must be at least 1 minute');
    expect(lines.at(-1)).toBe('1 session(s), 45 minute(s) in total.');
    expect(harness.repository().studyLogs.list()).toMatchObject([
      { subject: 'Calculus', durationMinutes: 45, notes: 'Chapter 4', loggedAt: '2024-03-15 10:00:00' },
    ]);
  });

  it('pre-fills the log with the stopwatch minutes', async () => {
    const harness = await createScreenHarness(['2', 'stopwatch', '', 'Chemistry', '', '', 'list']);

    await harness.run();

    expect(harness.term.prompts.slice(2, 6)).toEqual([
      'Stopwatch running. Press Enter to stop.',
      'Subject: ',
      'Minutes [1]: ',
      'Notes (optional): ',
    ]);
    const lines = harness.lines();
    expect(lines).toContain('Stopped at 00:00.');
    expect(lines).toContain('Logged 1 min of Chemistry.');
    expect(lines).toContain('│ 1 │ 2024-03-15 10:00 │ Chemistry │   1 │       │');
  });

  it('asks before logging pomodoro work time', async () => {
    const harness = await createScreenHarness(['2', 'pomodoro', '', 'n', 'totals']);

    await harness.run();

    expect(harness.term.prompts.slice(2, 4)).toEqual([
      'Pomodoro running. Press Enter to stop.',
      'Log 1 min of work? (y/N) ',
    ]);
    expect(harness.lines().at(-1)).toBe('0 session(s), 0 minute(s) in total.');
  });

  it('deletes a session after confirmation', async () => {
    const harness = await createScreenHarness(['2', 'delete 1', 'y', 'delete 1']);
    harness.repository().studyLogs.create({ subject: 'Calculus', durationMinutes: 45 });

    await harness.run();

    expect(harness.term.prompts).toContain('Delete 45 min of Calculus? (y/N) ');
    const lines = harness.lines();
    expect(lines).toContain('Deleted session #1.');
    expect(lines.at(-1)).toBe('Study log not found.');
  });
});
