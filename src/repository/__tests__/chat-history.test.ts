import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import type { DomainRepository } from '../index.js';
import { StoreError, ValidationError } from '../../errors/index.js';
import { createTestDb, seedRepository } from '../../test-utils/index.js';

describe('ChatHistoryRepository', () => {
  let db: Database.Database;
  let ada: DomainRepository;

  beforeEach(() => {
    db = createTestDb();
    ada = seedRepository(db, 'ada');
  });

  afterEach(() => {
    db.close();
  });

  it('appends messages', () => {
    const message = ada.chat.append('user', ' What is entropy? ');

    expect(message).toEqual({
      id: message.id,
      ownerUserId: ada.ownerId,
      role: 'user',
      content: 'What is entropy?',
      createdAt: '2024-03-15 10:00:00',
    });
  });

  it('rejects empty messages', () => {
    try {
      ada.chat.append('model', '  ');
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ message: 'Invalid chat message', issues: ['content: Message cannot be empty'] });
    }
  });

  it('stores a question and its answer together', () => {
    const [asked, answered] = ada.chat.appendExchange('What is entropy?', 'A measure of disorder.');

    expect([asked.role, answered.role]).toEqual(['user', 'model']);
    expect(ada.chat.recent(10).map((m) => m.content)).toEqual(['What is entropy?', 'A measure of disorder.']);
  });

  it('saves neither turn when the answer cannot be stored', () => {
    db.exec(`
      CREATE TRIGGER reject_model_turns BEFORE INSERT ON chat_messages
      WHEN NEW.role = 'model'
      BEGIN SELECT RAISE(ABORT, 'model turns disabled'); END;
    `);

    expect(() => ada.chat.appendExchange('What is entropy?', 'A measure of disorder.')).toThrow(StoreError);
    expect(ada.chat.recent(10)).toEqual([]);
  });

  it('validates both turns before writing', () => {
    expect(() => ada.chat.appendExchange('What is entropy?', '   ')).toThrow(ValidationError);
    expect(ada.chat.recent(10)).toEqual([]);
  });

  it('returns the newest messages in conversation order', () => {
    ada.chat.append('user', 'one');
    ada.chat.append('model', 'two');
    ada.chat.append('user', 'three');

    expect(ada.chat.recent(2).map((m) => m.content)).toEqual(['two', 'three']);
    expect(ada.chat.recent(10).map((m) => m.content)).toEqual(['one', 'two', 'three']);
  });

  it('clears only the owner transcript', () => {
    const bob = seedRepository(db, 'bob');
    ada.chat.append('user', 'one');
    ada.chat.append('model', 'two');
    bob.chat.append('user', 'hers');

    expect(ada.chat.clear()).toBe(2);
    expect(ada.chat.recent(10)).toEqual([]);
    expect(bob.chat.recent(10).map((m) => m.content)).toEqual(['hers']);
  });
});
