/**
 * Conversation IDs remembered per invitation.
 *
 * Any channel that sees a complete acceptance for an invitation records the
 * conversation ID here. When a later copy of the same acceptance arrives with
 * the ID stripped (push platforms truncate large data payloads), the
 * controller recovers it from this cache instead of stranding the sender.
 */

import { isNonEmptyString, isRecord } from '../util/guards';
import type { RecordStore } from './record-store';

export const RESPONSE_CACHE_COLLECTION = 'response_cache';

interface CachedResponse {
  invitationId: string;
  conversationId: string;
  cachedAt: number;
}

export class ResponseCache {
  constructor(
    private readonly records: RecordStore,
    private readonly now: () => number = Date.now,
  ) {}

  async remember(invitationId: string, conversationId: string): Promise<void> {
    const entry: CachedResponse = { invitationId, conversationId, cachedAt: this.now() };
    await this.records.put(RESPONSE_CACHE_COLLECTION, invitationId, entry);
  }

  async recall(invitationId: string): Promise<string | null> {
    const raw = await this.records.get(RESPONSE_CACHE_COLLECTION, invitationId);
    if (!isRecord(raw)) return null;
    const { conversationId } = raw;
    return isNonEmptyString(conversationId) ? conversationId : null;
  }

  async forget(invitationId: string): Promise<void> {
    await this.records.delete(RESPONSE_CACHE_COLLECTION, invitationId);
  }
}
