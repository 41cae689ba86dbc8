/**
 * Tests for the Task Manager screen
 */

import { describe, it, expect } from 'vitest';
import { createScreenHarness } from '../../../test-utils/index.js';

describe('task manager screen', () => {
  it('adds, lists and completes tasks', async () => {
    const harness = await createScreenHarness([
      '1',
      'add',
      'Read chapter 3',
      'academic',
      '2024-03-15',
      'add',
      'Lab report',
      '',
      '',
      'list',
      'done 1',
      'list completed',
    ]);

    await harness.run();
    const lines = harness.lines();

    expect(lines).toContain('No tasks.');
    expect(lines).toContain('Added task #1.');
    expect(lines).toContain('Added task #2.');
    expect(lines).toContain('│ 1 │ Read chapter 3 │ Academic      │ 2024-03-15 │ pending │');
    expect(lines).toContain('│ 2 │ Lab report     │ Uncategorized │            │ pending │');
    expect(lines).toContain('Task #1 is now completed.');
    expect(lines).toContain('│ 1 │ Read chapter 3 │ Academic │ 2024-03-15 │ done   │');
    expect(harness.term.prompts.slice(1, 5)).toEqual([
      'tasks> ',
      'Title: ',
      'Category (blank for none): ',
      'Due date YYYY-MM-DD (blank for none): ',
    ]);
  });

  it('edits a task and clears its category and due date', async () => {
    const harness = await createScreenHarness(['1', 'edit 1', '', 'none', 'none']);
    const task = harness.repository().tasks.create({ title: 'Read chapter 3', categoryId: 2, dueDate: '2024-03-15' });

    await harness.run();

    expect(harness.term.prompts.slice(2, 5)).toEqual([
      'Title [Read chapter 3]: ',
      'Category [Academic]: ',
      'Due date [2024-03-15] ("none" clears): ',
    ]);
    expect(harness.lines()).toContain('Updated task #1.');
    expect(harness.repository().tasks.get(task.id)).toMatchObject({
      title: 'Read chapter 3',
      categoryId: null,
      dueDate: null,
    });
  });

  it('leaves the task alone when every edit answer is blank', async () => {
    const harness = await createScreenHarness(['1', 'edit 1', '', '', '']);
    const task = harness.repository().tasks.create({ title: 'Read chapter 3', categoryId: 2, dueDate: '2024-03-15' });

    await harness.run();

    expect(harness.term.output.at(-1)).toBe('No changes.');
    expect(harness.repository().tasks.get(task.id)).toEqual(task);
  });

  it('deletes a task only after confirmation', async () => {
    const harness = await createScreenHarness(['1', 'delete 1', 'n', 'delete 1', 'yes']);
    harness.repository().tasks.create({ title: 'Read chapter 3' });

    await harness.run();

    expect(harness.term.prompts.filter((p) => p === 'Delete "Read chapter 3"? (y/N) ')).toHaveLength(2);
    expect(harness.lines().filter((line) => line === 'Deleted task #1.')).toHaveLength(1);
    expect(harness.repository().tasks.list({ status: 'all' })).toEqual([]);
  });

  it('manages categories and moves tasks of a deleted one to Uncategorized', async () => {
    const harness = await createScreenHarness([
      '1',
      'cat-add',
      'Reading',
      'add',
      'Novel',
      'reading',
      '',
      'filter reading',
      'cat-delete 6',
      'y',
      'filter none',
      'categories',
    ]);

    await harness.run();
    const lines = harness.lines();

    expect(lines).toContain('Created category #6 Reading.');
    expect(lines).toContain('│ 1 │ Novel │ Reading  │     │ pending │');
    expect(lines).toContain('Deleted Reading. 1 task(s) moved to Uncategorized.');
    expect(lines).toContain('│ 1 │ Novel │ Uncategorized │     │ pending │');

    const listed = lines.indexOf('  #2 Academic');
    expect(lines.slice(listed, listed + 5)).toEqual([
      '  #2 Academic',
      '  #1 General',
      '  #3 Personal',
      '  #4 Project',
      '  #5 Urgent',
    ]);
  });

  it('reports bad input without leaving the screen', async () => {
    const harness = await createScreenHarness([
      '1',
      'done',
      'done 99',
      'add',
      '',
      '',
      'soon',
      'add',
      'Essay',
      'Nope',
      '',
      'list everything',
      'frobnicate',
    ]);

    await harness.run();
    const lines = harness.lines();

    expect(lines).toContain('✗ Invalid task number');
    expect(lines).toContain('  id: Enter the task number shown in the list');
    expect(lines).toContain('Task not found.');
    expect(lines).toContain('✗ Invalid task');
    expect(lines).toContain('  title: Title cannot be empty');
    expect(lines).toContain('  dueDate: Use a real date in YYYY-MM-DD form');
    expect(lines).toContain('✗ Unknown category');
    expect(lines).toContain('  category: "Nope" does not exist');
    expect(lines).toContain('  status: Use pending, completed or all');
    expect(lines.at(-1)).toBe("Unknown command 'frobnicate'. Type help for the list.");
    expect(harness.term.prompts.filter((p) => p === 'tasks> ')).toHaveLength(7);
    expect(harness.repository().tasks.list({ status: 'all' })).toEqual([]);
  });
});
