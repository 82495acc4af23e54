/**
 * Conversation store
 *
 * One row per accepted invitation on this device. Rows are created and
 * removed only by the invitation controller.
 *
 * @packageDocumentation
 */

import { ErrorCode, ParleyError } from '../errors';
import type { Conversation } from '../types';
import type { RecordStore } from './record-store';
import { decodeConversation } from './records';

export const CONVERSATIONS_COLLECTION = 'conversations';

export class ConversationStore {
  constructor(private readonly records: RecordStore) {}

  /**
   * @throws {ParleyError} DuplicateId if a conversation with this ID exists
   */
  async create(conversation: Conversation): Promise<void> {
    const existing = await this.records.get(CONVERSATIONS_COLLECTION, conversation.id);
    if (existing !== undefined) {
      throw new ParleyError(ErrorCode.DuplicateId, `Conversation ${conversation.id} already exists`);
    }
    await this.records.put(CONVERSATIONS_COLLECTION, conversation.id, conversation);
  }

  /**
   * Remove a conversation. Absent IDs are ignored.
   *
   * @returns true if a conversation was removed
   */
  async delete(id: string): Promise<boolean> {
    return this.records.delete(CONVERSATIONS_COLLECTION, id);
  }

  /**
   * @throws {ParleyError} NotFound if no conversation has this ID
   */
  async get(id: string): Promise<Conversation> {
    const conversation = await this.find(id);
    if (!conversation) {
      throw new ParleyError(ErrorCode.NotFound, `Conversation ${id} not found`);
    }
    return conversation;
  }

  async find(id: string): Promise<Conversation | null> {
    const raw = await this.records.get(CONVERSATIONS_COLLECTION, id);
    return raw === undefined ? null : decodeConversation(raw);
  }

  /**
   * Find the conversation between two peers, in either order.
   */
  async findByParticipants(a: string, b: string): Promise<Conversation | null> {
    const all = await this.list();
    return (
      all.find(
        (c) =>
          (c.participantA === a && c.participantB === b) ||
          (c.participantA === b && c.participantB === a),
      ) ?? null
    );
  }

  async list(): Promise<Conversation[]> {
    const rows = await this.records.list(CONVERSATIONS_COLLECTION);
    return rows.map(decodeConversation);
  }
}
