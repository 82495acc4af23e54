/**
 * Parley shared types.
 *
 * Record shapes are JSON-serializable and match what the record store
 * persists. Timestamps are Unix epoch milliseconds.
 *
 * @packageDocumentation
 */

import type { ParleyError } from './errors';

// ── Records ──────────────────────────────────────────────────────────────────

export type InvitationStatus = 'pending' | 'accepted' | 'declined' | 'cancelled';

/**
 * A one-directional request from a sender to a recipient to open a conversation.
 */
export interface Invitation {
  /** Unique invitation ID, shared by both peers' copies */
  id: string;
  senderId: string;
  recipientId: string;
  /** Free-text note from the sender */
  message: string;
  status: InvitationStatus;
  createdAt: number;
  /** When the invitation reached a terminal state */
  respondedAt: number | null;
  /** Shared conversation ID, set only on a committed acceptance */
  conversationId: string | null;
  /** Accepted by the peer but the conversation ID could not be recovered */
  resyncRequired: boolean;
}

/**
 * A conversation provisioned by an accepted invitation.
 *
 * Each device keeps its own row; the `id` is the only value the two rows share.
 */
export interface Conversation {
  id: string;
  /** The local identity on the device that owns this row */
  participantA: string;
  /** The remote peer */
  participantB: string;
  createdAt: number;
  updatedAt: number;
  /** ID of the system message inserted when the conversation was created */
  seedMessageId: string;
}

/**
 * A message stored against a conversation. The invitation core only ever
 * writes system seed messages.
 */
export interface ChatMessage {
  id: string;
  conversationId: string;
  /** `system` for messages inserted by Parley itself */
  senderId: string;
  content: string;
  createdAt: number;
}

// ── Wire payloads ────────────────────────────────────────────────────────────

export type InvitationResponse = 'accepted' | 'declined';

/**
 * Sent by the recipient to the original sender after accept/decline.
 *
 * `conversationId` is present only when `response` is `accepted`; an
 * inbound acceptance without it is treated as truncated.
 */
export interface ResponsePayload {
  invitationId: string;
  responderId: string;
  response: InvitationResponse;
  conversationId?: string;
  timestamp: number;
}

/** Sent by the sender to announce a new invitation. */
export interface InvitationPayload {
  invitationId: string;
  senderId: string;
  recipientId: string;
  message: string;
  createdAt: number;
}

/** Sent by the sender when a pending invitation is withdrawn. */
export interface CancellationPayload {
  invitationId: string;
  senderId: string;
  timestamp: number;
}

/** A validated inbound payload tagged with its kind. */
export type InboundEnvelope =
  | { kind: 'invitation'; payload: InvitationPayload }
  | { kind: 'response'; payload: ResponsePayload }
  | { kind: 'cancellation'; payload: CancellationPayload };

/**
 * Invitation traffic that failed validation. Fields that could not be read
 * are null.
 */
export interface MalformedInbound {
  kind: InboundEnvelope['kind'] | null;
  response: InvitationResponse | null;
  invitationId: string | null;
  /** The peer the traffic claims to come from */
  peerId: string | null;
  error: ParleyError;
}

// ── Local notifications ──────────────────────────────────────────────────────

export type LocalNotificationKind =
  | 'invitation_sent'
  | 'invitation_received'
  | 'invitation_accepted'
  | 'invitation_declined'
  | 'invitation_cancelled'
  | 'invitation_failed'
  | 'resync_required';

// ── Events ───────────────────────────────────────────────────────────────────

export type InvitationEvent =
  | { type: 'invitationSent'; invitation: Invitation }
  | { type: 'invitationReceived'; invitation: Invitation }
  | { type: 'invitationAccepted'; invitation: Invitation }
  | { type: 'invitationDeclined'; invitation: Invitation }
  | { type: 'invitationCancelled'; invitation: Invitation }
  | { type: 'invitationReverted'; invitation: Invitation; reason: InvitationResponse }
  | { type: 'conversationCreated'; conversation: Conversation; invitationId: string }
  | { type: 'resyncRequired'; invitation: Invitation };

export type InvitationListener = (event: InvitationEvent) => void;

// ── Results ──────────────────────────────────────────────────────────────────

export interface AcceptResult {
  invitation: Invitation;
  conversation: Conversation;
}

export interface SendResult {
  invitation: Invitation;
  /** Whether the invitation notice reached at least one of the recipient's devices */
  delivered: boolean;
}

export interface CanInviteResult {
  canInvite: boolean;
  reason: string;
}

/**
 * Outcome of applying an inbound response on the sender's device.
 */
export type ResponseOutcome =
  | { kind: 'adopted'; invitation: Invitation; conversation: Conversation }
  | { kind: 'declined'; invitation: Invitation }
  | { kind: 'duplicate'; invitation: Invitation }
  | { kind: 'resync_required'; invitation: Invitation; error: ParleyError };
