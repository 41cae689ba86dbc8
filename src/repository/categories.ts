/**
 * Categories
 *
 * Deleting a category never deletes tasks: its tasks become Uncategorized
 * (category_id = NULL) in the same transaction.
 */

import type Database from 'better-sqlite3';
import { NotFoundError, ValidationError } from '../errors/index.js';
import { DEFAULT_CATEGORIES, type Category } from '../database/schema.js';
import { CategoryRowSchema, validateRow, validateRows } from '../database/validation.js';
import { OwnedRepository, parseInput } from './base.js';
import { CategoryNameSchema, EntityIdSchema } from './inputs.js';

export interface CategoryDeletion {
  /** Tasks moved to Uncategorized */
  reassignedTasks: number;
}

/**
 * Seed the starter categories for a new account (inside the caller's transaction).
 */
export function insertDefaultCategories(db: Database.Database, ownerId: number, createdAt: string): void {
  const insert = db.prepare(
    'INSERT INTO categories (owner_user_id, name, created_at) VALUES (?, ?, ?)'
  );
  for (const name of DEFAULT_CATEGORIES) {
    insert.run(ownerId, name, createdAt);
  }
}

/**
 * Throw NotFoundError unless `categoryId` belongs to `ownerId`.
 */
export function assertCategoryOwned(db: Database.Database, ownerId: number, categoryId: number): void {
  const row = db
    .prepare('SELECT 1 FROM categories WHERE id = ? AND owner_user_id = ?')
    .get(categoryId, ownerId);
  if (!row) {
    throw new NotFoundError('Category', categoryId);
  }
}

export class CategoryRepository extends OwnedRepository {
  list(): Category[] {
    return this.read('List categories', () => {
      const rows = this.db
        .prepare(
          'SELECT * FROM categories WHERE owner_user_id = ? ORDER BY name COLLATE NOCASE, id'
        )
        .all(this.ownerId);
      return validateRows(CategoryRowSchema, rows, 'categories');
    });
  }

  get(id: number): Category {
    return this.read('Load category', () => {
      const row = this.db
        .prepare('SELECT * FROM categories WHERE id = ? AND owner_user_id = ?')
        .get(id, this.ownerId);
      if (!row) {
        throw new NotFoundError('Category', id);
      }
      return validateRow(CategoryRowSchema, row, `categories.id=${id}`);
    });
  }

  create(name: string): Category {
    const cleanName = parseInput(CategoryNameSchema, name, 'category');

    return this.write('Create category', () => {
      this.assertNameFree(cleanName);
      const result = this.db
        .prepare('INSERT INTO categories (owner_user_id, name, created_at) VALUES (?, ?, ?)')
        .run(this.ownerId, cleanName, this.now());
      return this.get(Number(result.lastInsertRowid));
    });
  }

  rename(id: number, name: string): Category {
    const categoryId = parseInput(EntityIdSchema, id, 'category id');
    const cleanName = parseInput(CategoryNameSchema, name, 'category');

    return this.write('Rename category', () => {
      const current = this.get(categoryId);
      if (current.name === cleanName) {
        return current;
      }
      this.assertNameFree(cleanName);
      this.db
        .prepare('UPDATE categories SET name = ? WHERE id = ? AND owner_user_id = ?')
        .run(cleanName, categoryId, this.ownerId);
      return this.get(categoryId);
    });
  }

  delete(id: number): CategoryDeletion {
    const categoryId = parseInput(EntityIdSchema, id, 'category id');

    return this.write('Delete category', () => {
      assertCategoryOwned(this.db, this.ownerId, categoryId);

      const reassigned = this.db
        .prepare('UPDATE tasks SET category_id = NULL WHERE category_id = ? AND owner_user_id = ?')
        .run(categoryId, this.ownerId);

      this.db
        .prepare('DELETE FROM categories WHERE id = ? AND owner_user_id = ?')
        .run(categoryId, this.ownerId);

      return { reassignedTasks: reassigned.changes };
    });
  }

  private assertNameFree(name: string): void {
    const taken = this.db
      .prepare('SELECT 1 FROM categories WHERE owner_user_id = ? AND name = ?')
      .get(this.ownerId, name);
    if (taken) {
      throw new ValidationError('Invalid category', [`name: "${name}" already exists`]);
    }
  }
}
