/**
 * Decoding of persisted records.
 *
 * Stores never hand out a value they have not checked against the record
 * shape; anything else is reported as corrupt.
 */

import { ErrorCode, ParleyError } from '../errors';
import type { ChatMessage, Conversation, Invitation, InvitationStatus } from '../types';
import {
  isNonEmptyString,
  isNullableString,
  isNullableTimestamp,
  isRecord,
  isTimestamp,
} from '../util/guards';

const STATUSES: readonly InvitationStatus[] = ['pending', 'accepted', 'declined', 'cancelled'];

export function isInvitationStatus(value: unknown): value is InvitationStatus {
  return typeof value === 'string' && STATUSES.some((status) => status === value);
}

function corrupt(collection: string, detail: string): ParleyError {
  return new ParleyError(ErrorCode.StorageCorrupted, `Corrupt ${collection} record: ${detail}`);
}

export function decodeInvitation(raw: unknown): Invitation {
  if (!isRecord(raw)) throw corrupt('invitation', 'not an object');
  const { id, senderId, recipientId, message, status, createdAt, respondedAt, conversationId } = raw;
  if (!isNonEmptyString(id)) throw corrupt('invitation', 'missing id');
  if (!isNonEmptyString(senderId) || !isNonEmptyString(recipientId)) {
    throw corrupt('invitation', `bad participants on ${id}`);
  }
  if (typeof message !== 'string') throw corrupt('invitation', `bad message on ${id}`);
  if (!isInvitationStatus(status)) throw corrupt('invitation', `bad status on ${id}`);
  if (!isTimestamp(createdAt) || !isNullableTimestamp(respondedAt)) {
    throw corrupt('invitation', `bad timestamps on ${id}`);
  }
  if (!isNullableString(conversationId)) throw corrupt('invitation', `bad conversationId on ${id}`);

  return {
    id,
    senderId,
    recipientId,
    message,
    status,
    createdAt,
    respondedAt,
    conversationId,
    // Records written before the flag existed have no field at all
    resyncRequired: raw.resyncRequired === true,
  };
}

export function decodeConversation(raw: unknown): Conversation {
  if (!isRecord(raw)) throw corrupt('conversation', 'not an object');
  const { id, participantA, participantB, createdAt, updatedAt, seedMessageId } = raw;
  if (!isNonEmptyString(id)) throw corrupt('conversation', 'missing id');
  if (!isNonEmptyString(participantA) || !isNonEmptyString(participantB)) {
    throw corrupt('conversation', `bad participants on ${id}`);
  }
  if (!isTimestamp(createdAt) || !isTimestamp(updatedAt)) {
    throw corrupt('conversation', `bad timestamps on ${id}`);
  }
  if (!isNonEmptyString(seedMessageId)) throw corrupt('conversation', `bad seedMessageId on ${id}`);
  return { id, participantA, participantB, createdAt, updatedAt, seedMessageId };
}

export function decodeMessage(raw: unknown): ChatMessage {
  if (!isRecord(raw)) throw corrupt('message', 'not an object');
  const { id, conversationId, senderId, content, createdAt } = raw;
  if (!isNonEmptyString(id)) throw corrupt('message', 'missing id');
  if (!isNonEmptyString(conversationId) || !isNonEmptyString(senderId)) {
    throw corrupt('message', `bad references on ${id}`);
  }
  if (typeof content !== 'string' || !isTimestamp(createdAt)) {
    throw corrupt('message', `bad body on ${id}`);
  }
  return { id, conversationId, senderId, content, createdAt };
}
