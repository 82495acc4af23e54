/**
 * Push data adapter.
 *
 * Push platforms carry a flat map of string values next to the visible
 * alert. This module converts invitation traffic to that map and back.
 * Inbound decoding tolerates the field-name variants older app builds sent
 * (`chatGuid`, `fromUserId`, string timestamps, a nested `data` object) and
 * then hands the normalised object to the strict parsers in `payloads.ts`.
 */

import { ErrorCode, ParleyError, isParleyError } from '../errors';
import { isTransportSafeId } from '../ids';
import {
  parseCancellationPayload,
  parseInvitationPayload,
  parseResponsePayload,
} from '../payloads';
import type {
  CancellationPayload,
  InboundEnvelope,
  InvitationPayload,
  MalformedInbound,
  ResponsePayload,
} from '../types';
import { isRecord } from '../util/guards';

export type PushData = Record<string, string>;

export const PUSH_TYPE = 'invitation';

export type PushSubtype = 'invite' | 'accepted' | 'declined' | 'cancelled';

const SUBTYPE_KINDS: Record<PushSubtype, InboundEnvelope['kind']> = {
  invite: 'invitation',
  accepted: 'response',
  declined: 'response',
  cancelled: 'cancellation',
};

// ── Outbound ─────────────────────────────────────────────────────────────────

export function encodeInvitationData(payload: InvitationPayload): PushData {
  return {
    type: PUSH_TYPE,
    subtype: 'invite',
    invitationId: payload.invitationId,
    senderId: payload.senderId,
    recipientId: payload.recipientId,
    message: payload.message,
    createdAt: String(payload.createdAt),
  };
}

export function encodeResponseData(payload: ResponsePayload): PushData {
  const data: PushData = {
    type: PUSH_TYPE,
    subtype: payload.response,
    invitationId: payload.invitationId,
    responderId: payload.responderId,
    timestamp: String(payload.timestamp),
  };
  if (payload.conversationId !== undefined) {
    data.conversationId = payload.conversationId;
  }
  return data;
}

export function encodeCancellationData(payload: CancellationPayload): PushData {
  return {
    type: PUSH_TYPE,
    subtype: 'cancelled',
    invitationId: payload.invitationId,
    senderId: payload.senderId,
    timestamp: String(payload.timestamp),
  };
}

// ── Inbound ──────────────────────────────────────────────────────────────────

const ALIASES: Record<string, readonly string[]> = {
  invitationId: ['invitationId', 'invitation_id'],
  senderId: ['senderId', 'fromUserId', 'sender_id'],
  recipientId: ['recipientId', 'toUserId', 'recipient_id'],
  responderId: ['responderId', 'fromUserId', 'senderId'],
  conversationId: ['conversationId', 'chatGuid', 'conversation_id'],
  message: ['message'],
  createdAt: ['createdAt', 'created_at'],
  timestamp: ['timestamp'],
};

function pick(data: Record<string, unknown>, field: string): unknown {
  for (const key of ALIASES[field] ?? [field]) {
    const value = data[key];
    if (value !== undefined && value !== null && value !== '') return value;
  }
  return undefined;
}

function toTimestamp(value: unknown): unknown {
  if (typeof value === 'string' && /^\d+$/.test(value)) return Number(value);
  return value;
}

function unsupported(detail: string): ParleyError {
  return new ParleyError(ErrorCode.UnsupportedPayload, `Unsupported push data: ${detail}`);
}

function isInvitationTraffic(data: Record<string, unknown>): boolean {
  const { type } = data;
  return type === PUSH_TYPE || type === 'invitation_response' || type === 'invitation_cancelled';
}

function isPushSubtype(value: unknown): value is PushSubtype {
  return value === 'invite' || value === 'accepted' || value === 'declined' || value === 'cancelled';
}

/** The subtype of invitation traffic, or null when it cannot be told. */
function readSubtype(data: Record<string, unknown>): PushSubtype | null {
  const { type, subtype, response } = data;
  if (type === 'invitation_cancelled') return 'cancelled';
  if (type === 'invitation_response') {
    return response === 'accepted' || response === 'declined' ? response : null;
  }
  if (subtype === undefined) return 'invite';
  return isPushSubtype(subtype) ? subtype : null;
}

function unwrap(raw: Record<string, unknown>): Record<string, unknown> {
  const { data: nested, type } = raw;
  return isRecord(nested) && type === undefined ? nested : raw;
}

function readableId(value: unknown): string | null {
  return typeof value === 'string' && isTransportSafeId(value) ? value : null;
}

/**
 * Decode push data received from a platform or the relay.
 *
 * @param raw - the data map, or a whole push body with the map under `data`
 * @param receivedAt - used when the sender omitted a timestamp
 * @throws {ParleyError} UnsupportedPayload if the data is not invitation
 *   traffic, MalformedPayload if it is but fails strict validation
 */
export function decodePushData(raw: unknown, receivedAt: number): InboundEnvelope {
  if (!isRecord(raw)) throw unsupported('not an object');
  const data = unwrap(raw);
  if (!isInvitationTraffic(data)) throw unsupported(`type ${JSON.stringify(data.type)}`);
  const subtype = readSubtype(data);
  if (subtype === null) {
    throw new ParleyError(
      ErrorCode.MalformedPayload,
      `Malformed invitation push data: subtype ${JSON.stringify(data.subtype ?? data.response)}`,
    );
  }

  switch (subtype) {
    case 'invite':
      return {
        kind: 'invitation',
        payload: parseInvitationPayload({
          invitationId: pick(data, 'invitationId'),
          senderId: pick(data, 'senderId'),
          recipientId: pick(data, 'recipientId'),
          message: pick(data, 'message') ?? '',
          createdAt: toTimestamp(pick(data, 'createdAt') ?? receivedAt),
        }),
      };
    case 'accepted':
    case 'declined':
      return {
        kind: 'response',
        payload: parseResponsePayload({
          invitationId: pick(data, 'invitationId'),
          responderId: pick(data, 'responderId'),
          response: subtype,
          conversationId: subtype === 'accepted' ? pick(data, 'conversationId') : undefined,
          timestamp: toTimestamp(pick(data, 'timestamp') ?? receivedAt),
        }),
      };
    case 'cancelled':
      return {
        kind: 'cancellation',
        payload: parseCancellationPayload({
          invitationId: pick(data, 'invitationId'),
          senderId: pick(data, 'senderId'),
          timestamp: toTimestamp(pick(data, 'timestamp') ?? receivedAt),
        }),
      };
  }
}

export type PushInspection =
  | { kind: 'envelope'; envelope: InboundEnvelope }
  | { kind: 'malformed'; report: MalformedInbound }
  | { kind: 'unsupported'; error: ParleyError };

/**
 * Classify push data without throwing. Invitation traffic that fails
 * validation comes back as a {@link MalformedInbound} report carrying
 * whichever identifiers could still be read.
 */
export function inspectPushData(raw: unknown, receivedAt: number): PushInspection {
  try {
    return { kind: 'envelope', envelope: decodePushData(raw, receivedAt) };
  } catch (err) {
    if (isParleyError(err, ErrorCode.UnsupportedPayload)) {
      return { kind: 'unsupported', error: err };
    }
    if (!isParleyError(err, ErrorCode.MalformedPayload) || !isRecord(raw)) throw err;

    const data = unwrap(raw);
    const subtype = readSubtype(data);
    const isResponse = subtype === 'accepted' || subtype === 'declined';
    const report: MalformedInbound = {
      kind: subtype === null ? null : SUBTYPE_KINDS[subtype],
      response: isResponse ? subtype : null,
      invitationId: readableId(pick(data, 'invitationId')),
      peerId: readableId(pick(data, isResponse ? 'responderId' : 'senderId')),
      error: err,
    };
    return { kind: 'malformed', report };
  }
}

/**
 * Encode any envelope as push data.
 */
export function encodePushData(envelope: InboundEnvelope): PushData {
  switch (envelope.kind) {
    case 'invitation':
      return encodeInvitationData(envelope.payload);
    case 'response':
      return encodeResponseData(envelope.payload);
    case 'cancellation':
      return encodeCancellationData(envelope.payload);
  }
}
