/**
 * Chat History
 *
 * The AI chat screen's transcript, kept across sessions until the user
 * clears it.
 */

import type { ChatMessage, ChatRole } from '../database/schema.js';
import { ChatMessageRowSchema, validateRow, validateRows } from '../database/validation.js';
import { OwnedRepository, parseInput } from './base.js';
import { ChatMessageInputSchema, ListLimitSchema } from './inputs.js';

export class ChatHistoryRepository extends OwnedRepository {
  append(role: ChatRole, content: string): ChatMessage {
    const data = parseInput(ChatMessageInputSchema, { role, content }, 'chat message');
    return this.write('Save chat message', () => this.insert(data.role, data.content));
  }

  /**
   * Store a question and its answer together: either both turns are saved
   * or neither is.
   */
  appendExchange(question: string, reply: string): [ChatMessage, ChatMessage] {
    const asked = parseInput(ChatMessageInputSchema, { role: 'user', content: question }, 'chat message');
    const answered = parseInput(ChatMessageInputSchema, { role: 'model', content: reply }, 'chat message');

    return this.write('Save chat exchange', () => [
      this.insert(asked.role, asked.content),
      this.insert(answered.role, answered.content),
    ]);
  }

  /**
   * The newest `limit` messages, oldest first (conversation order).
   */
  recent(limit: number): ChatMessage[] {
    const { limit: max } = parseInput(ListLimitSchema, { limit }, 'list options');

    return this.read('Load chat history', () => {
      const rows = this.db
        .prepare(
          `SELECT * FROM (
             SELECT * FROM chat_messages WHERE owner_user_id = ? ORDER BY id DESC LIMIT ?
           ) ORDER BY id ASC`
        )
        .all(this.ownerId, max ?? limit);
      return validateRows(ChatMessageRowSchema, rows, 'chat_messages');
    });
  }

  private insert(role: ChatRole, content: string): ChatMessage {
    const result = this.db
      .prepare('INSERT INTO chat_messages (owner_user_id, role, content, created_at) VALUES (?, ?, ?, ?)')
      .run(this.ownerId, role, content, this.now());
    const row = this.db.prepare('SELECT * FROM chat_messages WHERE id = ?').get(result.lastInsertRowid);
    return validateRow(ChatMessageRowSchema, row, 'chat_messages.insert');
  }

  /**
   * Delete the whole transcript. Returns the number of messages removed.
   */
  clear(): number {
    return this.write('Clear chat history', () => {
      return this.db.prepare('DELETE FROM chat_messages WHERE owner_user_id = ?').run(this.ownerId)
        .changes;
    });
  }
}
