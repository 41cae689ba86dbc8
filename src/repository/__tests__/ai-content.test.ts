import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { defaultContentTitle, type DomainRepository } from '../index.js';
import { NotFoundError, ValidationError } from '../../errors/index.js';
import { createTestDb, seedRepository } from '../../test-utils/index.js';

describe('defaultContentTitle', () => {
  it('prefixes the kind label', () => {
    expect(defaultContentTitle('explanation', 'Photosynthesis')).toBe('Explanation: Photosynthesis');
    expect(defaultContentTitle('questions', 'Cells')).toBe('Practice Questions: Cells');
  });

  it('collapses whitespace and cuts long prompts at 50 characters', () => {
    const prompt = 'The causes of the First World War\nand how the alliance system turned it global';
    expect(defaultContentTitle('summary', prompt)).toBe(
      'Summary: The causes of the First World War and how the alli...'
    );
  });
});

describe('AIContentRepository', () => {
  let db: Database.Database;
  let ada: DomainRepository;

  beforeEach(() => {
    db = createTestDb();
    ada = seedRepository(db, 'ada');
  });

  afterEach(() => {
    db.close();
  });

  it('saves with a default title', () => {
    const saved = ada.aiContent.save({
      kind: 'explanation',
      prompt: 'Photosynthesis',
      responseText: 'Plants turn light into sugar.',
    });

    expect(saved).toEqual({
      id: saved.id,
      ownerUserId: ada.ownerId,
      kind: 'explanation',
      title: 'Explanation: Photosynthesis',
      prompt: 'Photosynthesis',
      responseText: 'Plants turn light into sugar.',
      createdAt: '2024-03-15 10:00:00',
    });
  });

  it('keeps an explicit title', () => {
    const saved = ada.aiContent.save({
      kind: 'chat_snapshot',
      title: 'Revision chat',
      prompt: 'hi',
      responseText: 'You: hi',
    });
    expect(saved.title).toBe('Revision chat');
  });

  it('requires a response', () => {
    expect(() => ada.aiContent.save({ kind: 'summary', prompt: 'x', responseText: ' ' })).toThrow(ValidationError);
  });

  it('lists newest first, optionally by kind', () => {
    ada.aiContent.save({ kind: 'summary', prompt: 'one', responseText: 'r' });
    ada.aiContent.save({ kind: 'explanation', prompt: 'two', responseText: 'r' });
    ada.aiContent.save({ kind: 'summary', prompt: 'three', responseText: 'r' });

    expect(ada.aiContent.list().map((c) => c.prompt)).toEqual(['three', 'two', 'one']);
    expect(ada.aiContent.list({ kind: 'summary' }).map((c) => c.prompt)).toEqual(['three', 'one']);
    expect(ada.aiContent.list({ limit: 1 }).map((c) => c.prompt)).toEqual(['three']);
  });

  it("hides another user's content", () => {
    const bob = seedRepository(db, 'bob');
    const saved = ada.aiContent.save({ kind: 'summary', prompt: 'x', responseText: 'y' });

    expect(() => bob.aiContent.get(saved.id)).toThrow(NotFoundError);
    expect(() => bob.aiContent.get(saved.id)).toThrow(`Saved content #${saved.id} not found`);
  });
});
