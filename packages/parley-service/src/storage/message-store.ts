/**
 * Message store for conversation messages. The invitation core writes only
 * the system seed message of each conversation.
 */

import { ErrorCode, ParleyError } from '../errors';
import type { ChatMessage } from '../types';
import type { RecordStore } from './record-store';
import { decodeMessage } from './records';

export const MESSAGES_COLLECTION = 'messages';

export class MessageStore {
  constructor(private readonly records: RecordStore) {}

  /**
   * @throws {ParleyError} DuplicateId if a message with this ID exists
   */
  async append(message: ChatMessage): Promise<void> {
    const existing = await this.records.get(MESSAGES_COLLECTION, message.id);
    if (existing !== undefined) {
      throw new ParleyError(ErrorCode.DuplicateId, `Message ${message.id} already exists`);
    }
    await this.records.put(MESSAGES_COLLECTION, message.id, message);
  }

  async listByConversation(conversationId: string): Promise<ChatMessage[]> {
    const rows = await this.records.list(MESSAGES_COLLECTION);
    return rows
      .map(decodeMessage)
      .filter((m) => m.conversationId === conversationId)
      .sort((x, y) => x.createdAt - y.createdAt);
  }

  /** @returns how many messages were removed */
  async deleteByConversation(conversationId: string): Promise<number> {
    const messages = await this.listByConversation(conversationId);
    for (const message of messages) {
      await this.records.delete(MESSAGES_COLLECTION, message.id);
    }
    return messages.length;
  }
}
