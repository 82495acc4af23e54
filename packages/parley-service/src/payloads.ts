/**
 * Wire payload validation.
 *
 * This is the trust boundary for everything a peer sends. Each parser accepts
 * exactly one shape and throws `MalformedPayload` naming the first offending
 * field; there is no probing of alternative field names here. Translation
 * from third-party push formats lives in `adapters/push-data.ts`.
 *
 * @packageDocumentation
 */

import { ErrorCode, ParleyError } from './errors';
import { isTransportSafeId } from './ids';
import type {
  CancellationPayload,
  InboundEnvelope,
  InvitationPayload,
  InvitationResponse,
  ResponsePayload,
} from './types';
import { isRecord, isTimestamp } from './util/guards';

function malformed(kind: string, detail: string): ParleyError {
  return new ParleyError(ErrorCode.MalformedPayload, `Malformed ${kind} payload: ${detail}`);
}

function requireId(kind: string, raw: Record<string, unknown>, field: string): string {
  const value = raw[field];
  if (typeof value !== 'string' || !isTransportSafeId(value)) {
    throw malformed(kind, `${field} must be a non-empty ASCII identifier`);
  }
  return value;
}

function requireTimestamp(kind: string, raw: Record<string, unknown>, field: string): number {
  const value = raw[field];
  if (!isTimestamp(value)) {
    throw malformed(kind, `${field} must be an epoch-millisecond integer`);
  }
  return value;
}

function isResponse(value: unknown): value is InvitationResponse {
  return value === 'accepted' || value === 'declined';
}

/**
 * Validate an accept/decline response.
 *
 * An acceptance without `conversationId` is returned as-is so the controller
 * can run its recovery path; a decline carrying one is rejected.
 */
export function parseResponsePayload(raw: unknown): ResponsePayload {
  if (!isRecord(raw)) throw malformed('response', 'not an object');

  const invitationId = requireId('response', raw, 'invitationId');
  const responderId = requireId('response', raw, 'responderId');
  const { response } = raw;
  if (!isResponse(response)) {
    throw malformed('response', 'response must be "accepted" or "declined"');
  }
  const timestamp = requireTimestamp('response', raw, 'timestamp');

  const hasConversationId = raw.conversationId !== undefined && raw.conversationId !== null;
  if (response === 'declined') {
    if (hasConversationId) throw malformed('response', 'a decline cannot carry conversationId');
    return { invitationId, responderId, response, timestamp };
  }
  if (!hasConversationId) {
    return { invitationId, responderId, response, timestamp };
  }
  const conversationId = requireId('response', raw, 'conversationId');
  return { invitationId, responderId, response, conversationId, timestamp };
}

export function parseInvitationPayload(raw: unknown): InvitationPayload {
  if (!isRecord(raw)) throw malformed('invitation', 'not an object');

  const invitationId = requireId('invitation', raw, 'invitationId');
  const senderId = requireId('invitation', raw, 'senderId');
  const recipientId = requireId('invitation', raw, 'recipientId');
  const { message } = raw;
  if (typeof message !== 'string') throw malformed('invitation', 'message must be a string');
  const createdAt = requireTimestamp('invitation', raw, 'createdAt');
  if (senderId === recipientId) throw malformed('invitation', 'sender and recipient are the same peer');

  return { invitationId, senderId, recipientId, message, createdAt };
}

export function parseCancellationPayload(raw: unknown): CancellationPayload {
  if (!isRecord(raw)) throw malformed('cancellation', 'not an object');

  return {
    invitationId: requireId('cancellation', raw, 'invitationId'),
    senderId: requireId('cancellation', raw, 'senderId'),
    timestamp: requireTimestamp('cancellation', raw, 'timestamp'),
  };
}

/**
 * Validate a `{ kind, payload }` envelope, such as one decoded from JSON.
 */
export function parseEnvelope(raw: unknown): InboundEnvelope {
  if (!isRecord(raw)) throw malformed('envelope', 'not an object');

  switch (raw.kind) {
    case 'invitation':
      return { kind: 'invitation', payload: parseInvitationPayload(raw.payload) };
    case 'response':
      return { kind: 'response', payload: parseResponsePayload(raw.payload) };
    case 'cancellation':
      return { kind: 'cancellation', payload: parseCancellationPayload(raw.payload) };
    default:
      throw malformed('envelope', `unknown kind ${JSON.stringify(raw.kind)}`);
  }
}

/**
 * Build the outbound response. Accepted responses always carry the ID.
 */
export function buildResponsePayload(
  invitationId: string,
  responderId: string,
  response: InvitationResponse,
  timestamp: number,
  conversationId?: string,
): ResponsePayload {
  if (response === 'accepted') {
    if (!conversationId) {
      throw new ParleyError(ErrorCode.Internal, 'An accepted response needs a conversationId');
    }
    return { invitationId, responderId, response, conversationId, timestamp };
  }
  return { invitationId, responderId, response, timestamp };
}
