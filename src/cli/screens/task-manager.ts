/**
 * Task Manager: tasks and categories.
 */

import chalk from 'chalk';
import type { Category, Task } from '../../database/schema.js';
import { ValidationError } from '../../errors/index.js';
import type { DomainRepository, TaskFilter } from '../../repository/index.js';
import { formatTable, type Column } from '../../utils/table.js';
import { ask, confirm, heading, parseId, printHelp, runCommandPrompt, type CommandSpec } from './shared.js';
import type { ScreenContext, ScreenHandler } from './types.js';

const TASK_COLUMNS: Column[] = [
  { header: '#', key: 'id', align: 'right' },
  { header: 'Title', key: 'title', maxWidth: 40 },
  { header: 'Category', key: 'category' },
  { header: 'Due', key: 'due' },
  { header: 'Status', key: 'status' },
];

const UNCATEGORIZED = 'Uncategorized';

function repo(context: ScreenContext): DomainRepository {
  return context.app.requireSession().repository;
}

export function printTasks(context: ScreenContext, tasks: Task[]): void {
  if (tasks.length === 0) {
    context.term.print(chalk.dim('No tasks.'));
    return;
  }
  const rows = tasks.map((task) => ({
    id: task.id,
    title: task.title,
    category: task.categoryName ?? UNCATEGORIZED,
    due: task.dueDate ?? '',
    status: task.status === 'completed' ? chalk.green('done') : 'pending',
  }));
  context.term.print(formatTable(TASK_COLUMNS, rows));
}

function printCategories(context: ScreenContext, categories: Category[]): void {
  for (const category of categories) {
    context.term.print(`  #${category.id} ${category.name}`);
  }
}

/**
 * Category typed by name; blank, "none" and "uncategorized" mean no category.
 */
function resolveCategory(repository: DomainRepository, name: string): number | null {
  const wanted = name.trim().toLowerCase();
  if (!wanted || wanted === 'none' || wanted === UNCATEGORIZED.toLowerCase()) {
    return null;
  }
  const category = repository.categories.list().find((c) => c.name.toLowerCase() === wanted);
  if (!category) {
    throw new ValidationError('Unknown category', [`category: "${name.trim()}" does not exist`]);
  }
  return category.id;
}

function listWith(filter: TaskFilter): CommandSpec['run'] {
  return (_args, context) => printTasks(context, repo(context).tasks.list(filter));
}

const COMMANDS: Record<string, CommandSpec> = {
  list: {
    usage: 'list [pending|completed|all]',
    description: 'List tasks (pending by default)',
    run: (args, context) => {
      const status = args[0] ?? 'pending';
      if (status !== 'pending' && status !== 'completed' && status !== 'all') {
        throw new ValidationError('Invalid filter', ['status: Use pending, completed or all']);
      }
      printTasks(context, repo(context).tasks.list({ status }));
    },
  },
  today: { usage: 'today', description: 'Pending tasks due today', run: listWith({ due: 'today' }) },
  upcoming: {
    usage: 'upcoming',
    description: 'Pending tasks due in the next 7 days',
    run: listWith({ due: 'upcoming' }),
  },
  overdue: { usage: 'overdue', description: 'Pending tasks past their due date', run: listWith({ due: 'overdue' }) },
  filter: {
    usage: 'filter <category>',
    description: 'Pending tasks in one category',
    run: (args, context) => {
      const repository = repo(context);
      const categoryId = resolveCategory(repository, args.join(' '));
      const filter: TaskFilter = categoryId === null ? { uncategorized: true } : { categoryId };
      printTasks(context, repository.tasks.list(filter));
    },
  },
  add: {
    usage: 'add',
    description: 'Add a task',
    run: async (_args, context) => {
      const repository = repo(context);
      const title = await ask(context, 'Title: ');
      const category = await ask(context, 'Category (blank for none): ');
      const due = await ask(context, 'Due date YYYY-MM-DD (blank for none): ');

      const task = repository.tasks.create({
        title,
        categoryId: resolveCategory(repository, category),
        dueDate: due || null,
      });
      context.term.print(chalk.green(`Added task #${task.id}.`));
    },
  },
  edit: {
    usage: 'edit <id>',
    description: 'Change title, category or due date',
    run: async (args, context) => {
      const repository = repo(context);
      const task = repository.tasks.get(parseId(args[0], 'task'));

      const title = await ask(context, `Title [${task.title}]: `);
      const category = await ask(context, `Category [${task.categoryName ?? UNCATEGORIZED}]: `);
      const due = await ask(context, `Due date [${task.dueDate ?? 'none'}] ("none" clears): `);

      if (!title && !category && !due) {
        context.term.print(chalk.dim('No changes.'));
        return;
      }

      repository.tasks.update(task.id, {
        title: title || undefined,
        categoryId: category ? resolveCategory(repository, category) : undefined,
        dueDate: due.toLowerCase() === 'none' ? null : due || undefined,
      });
      context.term.print(chalk.green(`Updated task #${task.id}.`));
    },
  },
  done: {
    usage: 'done <id>',
    description: 'Mark a task completed (or pending again)',
    run: (args, context) => {
      const task = repo(context).tasks.toggle(parseId(args[0], 'task'));
      const state = task.status === 'completed' ? chalk.green('completed') : 'pending';
      context.term.print(`Task #${task.id} is now ${state}.`);
    },
  },
  delete: {
    usage: 'delete <id>',
    description: 'Delete a task',
    run: async (args, context) => {
      const repository = repo(context);
      const task = repository.tasks.get(parseId(args[0], 'task'));
      if (await confirm(context, `Delete "${task.title}"?`)) {
        repository.tasks.delete(task.id);
        context.term.print(chalk.green(`Deleted task #${task.id}.`));
      }
    },
  },
  categories: {
    usage: 'categories',
    description: 'List categories',
    run: (_args, context) => printCategories(context, repo(context).categories.list()),
  },
  'cat-add': {
    usage: 'cat-add',
    description: 'Create a category',
    run: async (_args, context) => {
      const category = repo(context).categories.create(await ask(context, 'Category name: '));
      context.term.print(chalk.green(`Created category #${category.id} ${category.name}.`));
    },
  },
  'cat-rename': {
    usage: 'cat-rename <id>',
    description: 'Rename a category',
    run: async (args, context) => {
      const repository = repo(context);
      const current = repository.categories.get(parseId(args[0], 'category'));
      const category = repository.categories.rename(current.id, await ask(context, `New name for ${current.name}: `));
      context.term.print(chalk.green(`Renamed to ${category.name}.`));
    },
  },
  'cat-delete': {
    usage: 'cat-delete <id>',
    description: 'Delete a category (its tasks become Uncategorized)',
    run: async (args, context) => {
      const repository = repo(context);
      const category = repository.categories.get(parseId(args[0], 'category'));
      if (!(await confirm(context, `Delete category "${category.name}"?`))) {
        return;
      }
      const { reassignedTasks } = repository.categories.delete(category.id);
      context.term.print(
        chalk.green(`Deleted ${category.name}.`) +
          (reassignedTasks > 0 ? ` ${reassignedTasks} task(s) moved to ${UNCATEGORIZED}.` : '')
      );
    },
  },
};

export const taskManagerScreen: ScreenHandler = async (context) => {
  if (context.entering) {
    heading(context, 'Task Manager');
    printTasks(context, repo(context).tasks.list());
    printHelp(context, COMMANDS);
  }
  return runCommandPrompt(context, 'tasks', COMMANDS);
};
