/**
 * Invitation lifecycle controller
 *
 * Owns the invitation state machine on one device. Accepting or declining
 * writes the new state first, then delivers the response to the sender and
 * keeps the write only once delivery is confirmed; otherwise the write is
 * reverted and the caller gets `RecipientUnreachable`. On the sender's device
 * the controller adopts the conversation ID the accepter minted, so both
 * devices end up with the same ID.
 *
 * Every operation on an invitation runs under a per-invitation lock.
 *
 * @packageDocumentation
 */

import { ErrorCode, ParleyError } from '../errors';
import { isTransportSafeId, newConversationId, newInvitationId, newMessageId } from '../ids';
import type { LocalNotificationEmitter } from '../notifications/emitter';
import { quietEmitter } from '../notifications/emitter';
import type { NotificationGateway } from '../notifications/gateway';
import {
  DEFAULT_DELIVERY_POLICY,
  deliverWithRetry,
  sleep as realSleep,
} from '../notifications/delivery';
import type { DeliveryOutcome, DeliveryPolicy, Sleep } from '../notifications/delivery';
import { buildResponsePayload } from '../payloads';
import type { ConversationStore } from '../storage/conversation-store';
import { collect } from '../storage/invitation-store';
import type { InvitationStore } from '../storage/invitation-store';
import type { MessageStore } from '../storage/message-store';
import type { ResponseCache } from '../storage/response-cache';
import type {
  AcceptResult,
  CanInviteResult,
  CancellationPayload,
  ChatMessage,
  Conversation,
  InboundEnvelope,
  Invitation,
  InvitationEvent,
  InvitationListener,
  InvitationPayload,
  InvitationResponse,
  MalformedInbound,
  ResponseOutcome,
  ResponsePayload,
  SendResult,
} from '../types';
import { KeyedMutex } from '../util/keyed-mutex';
import { getLogger } from '../util/logger';
import type { Logger } from '../util/logger';
import {
  UNREACHABLE_MESSAGE,
  cancelledNotice,
  failedNotice,
  receivedNotice,
  respondedNotice,
  responseReceivedNotice,
  resyncNotice,
  seedMessageContent,
  sentNotice,
  unreadableNotice,
} from './notices';
import type { Notice } from './notices';

/** Sender ID of messages Parley inserts itself. */
export const SYSTEM_SENDER = 'system';

export interface InvitationControllerDeps {
  /** The local identity */
  selfId: string;
  invitations: InvitationStore;
  conversations: ConversationStore;
  messages: MessageStore;
  responseCache: ResponseCache;
  gateway: NotificationGateway;
  emitter: LocalNotificationEmitter;
  logger?: Logger;
  delivery?: Partial<DeliveryPolicy>;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * A response that is not newer than the one already applied. A newer one
 * means the peer reverted its earlier response and answered again.
 */
function isStale(invitation: Invitation, payload: ResponsePayload): boolean {
  return invitation.respondedAt !== null && payload.timestamp <= invitation.respondedAt;
}

interface Adoption {
  invitation: Invitation;
  conversation: Conversation;
  created: boolean;
}

export class InvitationController {
  readonly selfId: string;
  private readonly invitations: InvitationStore;
  private readonly conversations: ConversationStore;
  private readonly messages: MessageStore;
  private readonly responseCache: ResponseCache;
  private readonly gateway: NotificationGateway;
  private readonly emitter: LocalNotificationEmitter;
  private readonly log: Logger;
  private readonly policy: DeliveryPolicy;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly locks = new KeyedMutex();
  /** Serialises the can-invite check with the create, per peer */
  private readonly peerLocks = new KeyedMutex();
  private listeners: InvitationListener[] = [];

  constructor(deps: InvitationControllerDeps) {
    this.selfId = deps.selfId;
    this.invitations = deps.invitations;
    this.conversations = deps.conversations;
    this.messages = deps.messages;
    this.responseCache = deps.responseCache;
    this.gateway = deps.gateway;
    this.log = (deps.logger ?? getLogger()).child({ module: 'invitations', selfId: deps.selfId });
    this.emitter = quietEmitter(deps.emitter, this.log);
    this.policy = { ...DEFAULT_DELIVERY_POLICY, ...deps.delivery };
    this.sleep = deps.sleep ?? realSleep;
    this.now = deps.now ?? Date.now;
  }

  // ===========================================================================
  // RECIPIENT: ACCEPT / DECLINE
  // ===========================================================================

  /**
   * Accept a pending invitation addressed to this device.
   *
   * Provisions the conversation and commits the acceptance, then delivers the
   * response to the sender. The acceptance stands only if delivery is
   * confirmed.
   *
   * @throws {ParleyError} NotFound, InvalidState, RecipientUnreachable (state
   *   reverted), CompensationFailed (revert failed), or a store error
   */
  async accept(invitationId: string): Promise<AcceptResult> {
    return this.locks.withLock(invitationId, async () => {
      const original = await this.invitations.get(invitationId);
      this.assertRespondable(original);

      const respondedAt = this.now();
      const conversation = await this.provisionConversation(
        newConversationId(),
        original.senderId,
        respondedAt,
      );
      const accepted: Invitation = {
        ...original,
        status: 'accepted',
        respondedAt,
        conversationId: conversation.id,
      };
      try {
        await this.invitations.update(accepted);
      } catch (err) {
        await this.rollbackConversation(conversation.id);
        throw err;
      }

      const payload = buildResponsePayload(
        original.id,
        this.selfId,
        'accepted',
        respondedAt,
        conversation.id,
      );
      const outcome = await this.deliverResponse(original.senderId, payload);
      if (!outcome.delivered) {
        return this.compensate(original, 'accepted', outcome, conversation.id);
      }

      this.log.info(
        { invitationId, conversationId: conversation.id, attempts: outcome.attempts },
        'Invitation accepted',
      );
      this.notify(respondedNotice(accepted));
      this.dispatch({ type: 'invitationAccepted', invitation: accepted });
      this.dispatch({ type: 'conversationCreated', conversation, invitationId });
      return { invitation: accepted, conversation };
    });
  }

  /**
   * Decline a pending invitation addressed to this device.
   *
   * @throws {ParleyError} NotFound, InvalidState, RecipientUnreachable (state
   *   reverted), CompensationFailed, or a store error
   */
  async decline(invitationId: string): Promise<Invitation> {
    return this.locks.withLock(invitationId, async () => {
      const original = await this.invitations.get(invitationId);
      this.assertRespondable(original);

      const respondedAt = this.now();
      const declined: Invitation = { ...original, status: 'declined', respondedAt };
      await this.invitations.update(declined);

      const payload = buildResponsePayload(original.id, this.selfId, 'declined', respondedAt);
      const outcome = await this.deliverResponse(original.senderId, payload);
      if (!outcome.delivered) {
        return this.compensate(original, 'declined', outcome);
      }

      this.log.info({ invitationId, attempts: outcome.attempts }, 'Invitation declined');
      this.notify(respondedNotice(declined));
      this.dispatch({ type: 'invitationDeclined', invitation: declined });
      return declined;
    });
  }

  private assertRespondable(invitation: Invitation): void {
    if (invitation.recipientId !== this.selfId) {
      throw new ParleyError(
        ErrorCode.InvalidState,
        `Invitation ${invitation.id} is not addressed to ${this.selfId}`,
      );
    }
    if (invitation.status !== 'pending') {
      throw new ParleyError(
        ErrorCode.InvalidState,
        `Invitation ${invitation.id} is already ${invitation.status}`,
      );
    }
  }

  private async deliverResponse(
    senderId: string,
    payload: ResponsePayload,
  ): Promise<DeliveryOutcome> {
    const log = this.log.child({ invitationId: payload.invitationId, response: payload.response });
    return deliverWithRetry(
      () => this.gateway.sendResponse(senderId, payload),
      this.policy,
      this.sleep,
      log,
    );
  }

  /**
   * Undo an optimistic accept/decline after delivery failed, then throw.
   */
  private async compensate(
    original: Invitation,
    reason: InvitationResponse,
    outcome: DeliveryOutcome,
    conversationId?: string,
  ): Promise<never> {
    const reverted: Invitation = {
      ...original,
      status: 'pending',
      respondedAt: null,
      conversationId: null,
    };
    try {
      await this.invitations.update(reverted);
      if (conversationId !== undefined) {
        await this.removeConversation(conversationId);
      }
    } catch (err) {
      this.log.error(
        { err, invitationId: original.id, conversationId },
        'Failed to revert undelivered response',
      );
      throw new ParleyError(
        ErrorCode.CompensationFailed,
        `Could not revert invitation ${original.id} after delivery failed`,
        false,
        err,
      );
    }

    this.log.warn(
      { invitationId: original.id, reason, attempts: outcome.attempts },
      'Response undelivered, invitation reverted to pending',
    );
    this.dispatch({ type: 'invitationReverted', invitation: reverted, reason });
    this.notify(failedNotice(reverted));
    throw new ParleyError(ErrorCode.RecipientUnreachable, UNREACHABLE_MESSAGE, true, outcome.lastError);
  }

  // ===========================================================================
  // SENDER: SEND / RESEND / CANCEL
  // ===========================================================================

  /**
   * Whether this device may send a new invitation to `peerId`.
   */
  async canInvite(peerId: string): Promise<CanInviteResult> {
    const blocker = await this.inviteBlocker(peerId, false);
    return blocker ? { canInvite: false, reason: blocker.message } : { canInvite: true, reason: '' };
  }

  /**
   * Create and announce a new invitation.
   *
   * Delivery of the announcement is best effort; the invitation stays pending
   * either way and `delivered` reports what happened.
   *
   * @throws {ParleyError} CannotInviteSelf, InvitationExists, InvalidState
   */
  async send(recipientId: string, message: string): Promise<SendResult> {
    return this.peerLocks.withLock(recipientId, async () => {
      const blocker = await this.inviteBlocker(recipientId, false);
      if (blocker) throw blocker;
      return this.createOutgoing(recipientId, message);
    });
  }

  /**
   * Send a declined invitation again under a new ID. The declined record is
   * kept as history.
   */
  async resend(invitationId: string): Promise<SendResult> {
    return this.locks.withLock(invitationId, async () => {
      const previous = await this.invitations.get(invitationId);
      if (previous.senderId !== this.selfId || previous.status !== 'declined') {
        throw new ParleyError(
          ErrorCode.InvalidState,
          `Only a declined invitation sent by ${this.selfId} can be resent`,
        );
      }
      return this.peerLocks.withLock(previous.recipientId, async () => {
        const blocker = await this.inviteBlocker(previous.recipientId, true);
        if (blocker) throw blocker;
        return this.createOutgoing(previous.recipientId, previous.message);
      });
    });
  }

  /**
   * Withdraw a pending invitation this device sent.
   *
   * Succeeds locally once the state check passes; telling the recipient is
   * best effort.
   */
  async cancel(invitationId: string): Promise<Invitation> {
    return this.locks.withLock(invitationId, async () => {
      const invitation = await this.invitations.get(invitationId);
      if (invitation.senderId !== this.selfId) {
        throw new ParleyError(
          ErrorCode.InvalidState,
          `Invitation ${invitationId} was not sent by ${this.selfId}`,
        );
      }
      if (invitation.status !== 'pending') {
        throw new ParleyError(
          ErrorCode.InvalidState,
          `Invitation ${invitationId} is already ${invitation.status}`,
        );
      }

      const timestamp = this.now();
      const cancelled: Invitation = { ...invitation, status: 'cancelled', respondedAt: timestamp };
      await this.invitations.update(cancelled);
      this.log.info({ invitationId }, 'Invitation cancelled');
      this.notify(cancelledNotice(cancelled, true));
      this.dispatch({ type: 'invitationCancelled', invitation: cancelled });

      const payload: CancellationPayload = { invitationId, senderId: this.selfId, timestamp };
      try {
        const report = await this.gateway.sendCancellation(invitation.recipientId, payload);
        if (!report.delivered) {
          this.log.warn({ invitationId }, 'Cancellation notice not delivered');
        }
      } catch (err) {
        this.log.warn({ err, invitationId }, 'Cancellation notice failed');
      }
      return cancelled;
    });
  }

  private async inviteBlocker(peerId: string, allowDeclined: boolean): Promise<ParleyError | null> {
    if (peerId === this.selfId) {
      return new ParleyError(ErrorCode.CannotInviteSelf, 'You cannot invite yourself');
    }
    if (!isTransportSafeId(peerId)) {
      return new ParleyError(ErrorCode.InvalidState, `Invalid peer ID ${JSON.stringify(peerId)}`);
    }

    const history = await collect(this.invitations.listBetween(this.selfId, peerId));
    if (history.some((inv) => inv.status === 'accepted')) {
      return new ParleyError(ErrorCode.InvitationExists, 'You are already connected with this user');
    }
    const pending = history.find((inv) => inv.status === 'pending');
    if (pending) {
      return new ParleyError(
        ErrorCode.InvitationExists,
        pending.senderId === this.selfId
          ? 'Invitation already sent to this user'
          : 'This user has already invited you',
      );
    }
    const lastSent = history.filter((inv) => inv.senderId === this.selfId).pop();
    if (lastSent?.status === 'declined' && !allowDeclined) {
      return new ParleyError(
        ErrorCode.InvitationExists,
        'This user declined your invitation; resend it instead',
      );
    }
    return null;
  }

  private async createOutgoing(recipientId: string, message: string): Promise<SendResult> {
    const invitation: Invitation = {
      id: newInvitationId(),
      senderId: this.selfId,
      recipientId,
      message,
      status: 'pending',
      createdAt: this.now(),
      respondedAt: null,
      conversationId: null,
      resyncRequired: false,
    };
    await this.invitations.create(invitation);

    const payload: InvitationPayload = {
      invitationId: invitation.id,
      senderId: this.selfId,
      recipientId,
      message,
      createdAt: invitation.createdAt,
    };
    let delivered = false;
    try {
      delivered = (await this.gateway.sendInvitation(recipientId, payload)).delivered;
    } catch (err) {
      this.log.warn({ err, invitationId: invitation.id }, 'Invitation notice failed');
    }

    this.log.info({ invitationId: invitation.id, recipientId, delivered }, 'Invitation sent');
    this.notify(sentNotice(invitation, delivered));
    this.dispatch({ type: 'invitationSent', invitation });
    return { invitation, delivered };
  }

  // ===========================================================================
  // INBOUND
  // ===========================================================================

  /**
   * Route a validated inbound envelope to its handler.
   */
  async handleInbound(envelope: InboundEnvelope): Promise<void> {
    switch (envelope.kind) {
      case 'invitation':
        await this.handleInvitation(envelope.payload);
        return;
      case 'response':
        await this.handleResponse(envelope.payload);
        return;
      case 'cancellation':
        await this.handleCancellation(envelope.payload);
        return;
    }
  }

  /**
   * Store an invitation announced by its sender. Redelivery is a no-op.
   *
   * @throws {ParleyError} MalformedPayload if not addressed to this device,
   *   DuplicateId if the ID is taken by a different invitation
   */
  async handleInvitation(payload: InvitationPayload): Promise<Invitation> {
    if (payload.recipientId !== this.selfId) {
      throw new ParleyError(
        ErrorCode.MalformedPayload,
        `Invitation ${payload.invitationId} is addressed to ${payload.recipientId}`,
      );
    }

    return this.locks.withLock(payload.invitationId, async () => {
      const existing = await this.invitations.find(payload.invitationId);
      if (existing) {
        if (existing.senderId === payload.senderId && existing.recipientId === payload.recipientId) {
          this.log.debug({ invitationId: existing.id }, 'Duplicate invitation ignored');
          return existing;
        }
        throw new ParleyError(
          ErrorCode.DuplicateId,
          `Invitation ${payload.invitationId} already exists with other participants`,
        );
      }

      const invitation: Invitation = {
        id: payload.invitationId,
        senderId: payload.senderId,
        recipientId: payload.recipientId,
        message: payload.message,
        status: 'pending',
        createdAt: payload.createdAt,
        respondedAt: null,
        conversationId: null,
        resyncRequired: false,
      };
      await this.invitations.create(invitation);
      this.log.info({ invitationId: invitation.id, senderId: invitation.senderId }, 'Invitation received');
      this.notify(receivedNotice(invitation));
      this.dispatch({ type: 'invitationReceived', invitation });
      return invitation;
    });
  }

  /**
   * Apply a cancellation from the sender. Anything but a pending invitation
   * is left as it is.
   */
  async handleCancellation(payload: CancellationPayload): Promise<Invitation> {
    return this.locks.withLock(payload.invitationId, async () => {
      const invitation = await this.invitations.get(payload.invitationId);
      if (invitation.senderId !== payload.senderId || invitation.recipientId !== this.selfId) {
        throw new ParleyError(
          ErrorCode.MalformedPayload,
          `Cancellation of ${payload.invitationId} does not come from its sender`,
        );
      }
      if (invitation.status !== 'pending') {
        this.log.warn(
          { invitationId: invitation.id, status: invitation.status },
          'Cancellation for settled invitation ignored',
        );
        return invitation;
      }

      const cancelled: Invitation = { ...invitation, status: 'cancelled', respondedAt: this.now() };
      await this.invitations.update(cancelled);
      this.log.info({ invitationId: cancelled.id }, 'Invitation cancelled by sender');
      this.notify(cancelledNotice(cancelled, false));
      this.dispatch({ type: 'invitationCancelled', invitation: cancelled });
      return cancelled;
    });
  }

  /**
   * Apply the recipient's response on the sender's device.
   *
   * An acceptance adopts the conversation ID from the payload, or from the
   * response cache when the payload arrived without it. When neither has it
   * the invitation is marked accepted with `resyncRequired` set. A response
   * contradicting a settled one replaces it only when its timestamp is newer.
   *
   * @throws {ParleyError} NotFound, MalformedPayload (wrong responder or not
   *   our invitation), InvalidState (cancelled here)
   */
  async handleResponse(payload: ResponsePayload): Promise<ResponseOutcome> {
    return this.locks.withLock(payload.invitationId, async () => {
      const invitation = await this.invitations.get(payload.invitationId);
      if (invitation.senderId !== this.selfId) {
        throw new ParleyError(
          ErrorCode.MalformedPayload,
          `Invitation ${invitation.id} was not sent by ${this.selfId}`,
        );
      }
      if (invitation.recipientId !== payload.responderId) {
        throw new ParleyError(
          ErrorCode.MalformedPayload,
          `${payload.responderId} is not the recipient of invitation ${invitation.id}`,
        );
      }
      if (invitation.status === 'cancelled') {
        throw new ParleyError(
          ErrorCode.InvalidState,
          `Invitation ${invitation.id} was cancelled before the response arrived`,
        );
      }

      return payload.response === 'declined'
        ? this.applyDecline(invitation, payload)
        : this.applyAcceptance(invitation, payload);
    });
  }

  /**
   * Clear a `resyncRequired` invitation with a conversation ID obtained out
   * of band.
   */
  async completeResync(invitationId: string, conversationId: string): Promise<AcceptResult> {
    return this.locks.withLock(invitationId, async () => {
      const invitation = await this.invitations.get(invitationId);
      if (invitation.status !== 'accepted' || !invitation.resyncRequired) {
        throw new ParleyError(ErrorCode.InvalidState, `Invitation ${invitationId} is not awaiting resync`);
      }
      if (!isTransportSafeId(conversationId)) {
        throw new ParleyError(
          ErrorCode.MalformedPayload,
          `Invalid conversation ID ${JSON.stringify(conversationId)}`,
        );
      }

      await this.responseCache.remember(invitationId, conversationId);
      const adoption = await this.adopt(invitation, conversationId, invitation.respondedAt ?? this.now());
      this.publishAdoption(adoption);
      return { invitation: adoption.invitation, conversation: adoption.conversation };
    });
  }

  /**
   * Surface invitation traffic that failed validation. An acceptance that
   * names a pending invitation we sent marks it `resyncRequired`; anything
   * else gets a resync notice keyed by whatever fields could be read.
   *
   * @returns The invitation the traffic was matched to, or null
   */
  async handleMalformed(report: MalformedInbound): Promise<Invitation | null> {
    const { invitationId, peerId } = report;
    this.log.warn(
      { err: report.error, kind: report.kind, invitationId, peerId },
      'Malformed invitation traffic',
    );

    if (report.kind === 'response' && report.response === 'accepted' && invitationId !== null) {
      const matched = await this.locks.withLock(invitationId, async () => {
        const invitation = await this.invitations.find(invitationId);
        if (!invitation || invitation.senderId !== this.selfId) return null;
        if (peerId !== null && peerId !== invitation.recipientId) return null;
        if (invitation.status !== 'pending') {
          this.log.debug({ invitationId, status: invitation.status }, 'Malformed acceptance for settled invitation');
          return invitation;
        }
        const outcome = await this.markResyncRequired(invitation, this.now(), report.error);
        return outcome.invitation;
      });
      if (matched) return matched;
    }

    this.notify(unreadableNotice(invitationId, peerId));
    return null;
  }

  private async applyDecline(invitation: Invitation, payload: ResponsePayload): Promise<ResponseOutcome> {
    if (invitation.status === 'declined') {
      this.log.debug({ invitationId: invitation.id }, 'Duplicate decline ignored');
      return { kind: 'duplicate', invitation };
    }
    const previous = invitation.status === 'accepted' ? invitation.conversationId : null;
    if (invitation.status === 'accepted') {
      if (isStale(invitation, payload)) {
        this.log.warn({ invitationId: invitation.id }, 'Stale decline after acceptance ignored');
        return { kind: 'duplicate', invitation };
      }
      await this.responseCache.forget(invitation.id);
    }

    const declined: Invitation = {
      ...invitation,
      status: 'declined',
      respondedAt: payload.timestamp,
      conversationId: null,
      resyncRequired: false,
    };
    await this.invitations.update(declined);
    if (previous !== null) {
      await this.removeConversation(previous);
      this.log.warn(
        { invitationId: declined.id, previous },
        'Acceptance replaced by a newer decline',
      );
    }
    this.log.info({ invitationId: declined.id }, 'Invitation declined by recipient');
    this.notify(responseReceivedNotice(declined));
    this.dispatch({ type: 'invitationDeclined', invitation: declined });
    return { kind: 'declined', invitation: declined };
  }

  private async applyAcceptance(invitation: Invitation, payload: ResponsePayload): Promise<ResponseOutcome> {
    if (invitation.status === 'declined') {
      if (isStale(invitation, payload)) {
        this.log.warn({ invitationId: invitation.id }, 'Stale acceptance after decline ignored');
        return { kind: 'duplicate', invitation };
      }
      this.log.warn({ invitationId: invitation.id }, 'Decline replaced by a newer acceptance');
    }
    if (invitation.status === 'accepted' && !invitation.resyncRequired) {
      return this.applyRepeatedAcceptance(invitation, payload);
    }

    const conversationId = payload.conversationId ?? (await this.responseCache.recall(invitation.id));
    if (conversationId === null) {
      if (invitation.resyncRequired) {
        return { kind: 'duplicate', invitation };
      }
      return this.markResyncRequired(invitation, payload.timestamp);
    }

    if (payload.conversationId !== undefined) {
      await this.responseCache.remember(invitation.id, payload.conversationId);
    } else {
      this.log.info({ invitationId: invitation.id, conversationId }, 'Recovered conversation ID from cache');
    }
    const respondedAt =
      invitation.resyncRequired && invitation.respondedAt !== null ? invitation.respondedAt : payload.timestamp;
    const adoption = await this.adopt(invitation, conversationId, respondedAt);
    this.publishAdoption(adoption);
    return { kind: 'adopted', invitation: adoption.invitation, conversation: adoption.conversation };
  }

  /**
   * An acceptance for an invitation already accepted here. The same ID, or
   * none, is a redelivery. A different ID with a newer timestamp means the
   * accepter reverted an acceptance we had already adopted and accepted again,
   * so its new conversation replaces ours.
   */
  private async applyRepeatedAcceptance(
    invitation: Invitation,
    payload: ResponsePayload,
  ): Promise<ResponseOutcome> {
    const incoming = payload.conversationId;
    const previous = invitation.conversationId;
    if (incoming === undefined || incoming === previous) {
      this.log.debug({ invitationId: invitation.id }, 'Duplicate acceptance ignored');
      return { kind: 'duplicate', invitation };
    }
    if (isStale(invitation, payload)) {
      this.log.warn(
        { invitationId: invitation.id, conversationId: incoming },
        'Stale acceptance with a different conversation ignored',
      );
      return { kind: 'duplicate', invitation };
    }

    await this.responseCache.remember(invitation.id, incoming);
    const adoption = await this.adopt(invitation, incoming, payload.timestamp);
    if (previous !== null) {
      await this.removeConversation(previous);
    }
    this.log.warn(
      { invitationId: invitation.id, previous, conversationId: incoming },
      'Conversation replaced by a newer acceptance',
    );
    this.dispatch({ type: 'invitationAccepted', invitation: adoption.invitation });
    if (adoption.created) {
      this.dispatch({
        type: 'conversationCreated',
        conversation: adoption.conversation,
        invitationId: invitation.id,
      });
    }
    return { kind: 'adopted', invitation: adoption.invitation, conversation: adoption.conversation };
  }

  private async markResyncRequired(
    invitation: Invitation,
    respondedAt: number,
    error = new ParleyError(
      ErrorCode.MalformedPayload,
      `Acceptance of invitation ${invitation.id} arrived without a conversationId`,
    ),
  ): Promise<ResponseOutcome> {
    const marked: Invitation = {
      ...invitation,
      status: 'accepted',
      respondedAt,
      conversationId: null,
      resyncRequired: true,
    };
    await this.invitations.update(marked);
    this.log.error({ invitationId: marked.id, err: error }, 'Acceptance arrived without a conversation ID');
    this.notify(resyncNotice(marked));
    this.dispatch({ type: 'resyncRequired', invitation: marked });
    return { kind: 'resync_required', invitation: marked, error };
  }

  /**
   * Take `conversationId` as the invitation's conversation, provisioning it
   * unless this device already has it.
   */
  private async adopt(invitation: Invitation, conversationId: string, respondedAt: number): Promise<Adoption> {
    const peerId = invitation.recipientId;
    let conversation = await this.conversations.find(conversationId);
    let created = false;
    if (conversation) {
      if (conversation.participantB !== peerId) {
        throw new ParleyError(
          ErrorCode.DuplicateId,
          `Conversation ${conversationId} already belongs to ${conversation.participantB}`,
        );
      }
    } else {
      conversation = await this.provisionConversation(conversationId, peerId, this.now());
      created = true;
    }

    const accepted: Invitation = {
      ...invitation,
      status: 'accepted',
      respondedAt,
      conversationId,
      resyncRequired: false,
    };
    try {
      await this.invitations.update(accepted);
    } catch (err) {
      if (created) await this.rollbackConversation(conversationId);
      throw err;
    }
    return { invitation: accepted, conversation, created };
  }

  private publishAdoption(adoption: Adoption): void {
    const { invitation, conversation, created } = adoption;
    this.log.info({ invitationId: invitation.id, conversationId: conversation.id }, 'Invitation accepted by recipient');
    this.notify(responseReceivedNotice(invitation));
    this.dispatch({ type: 'invitationAccepted', invitation });
    if (created) {
      this.dispatch({ type: 'conversationCreated', conversation, invitationId: invitation.id });
    }
  }

  // ===========================================================================
  // QUERIES & EVENTS
  // ===========================================================================

  /** Invitations addressed to this device, oldest first. */
  async listIncoming(): Promise<Invitation[]> {
    return collect(this.invitations.listByRecipient(this.selfId));
  }

  /** Invitations sent from this device, oldest first. */
  async listOutgoing(): Promise<Invitation[]> {
    return collect(this.invitations.listBySender(this.selfId));
  }

  /**
   * Subscribe to state changes.
   *
   * @returns Unsubscribe function
   */
  onInvitationEvent(listener: InvitationListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private dispatch(event: InvitationEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.log.warn({ err, event: event.type }, 'Invitation listener threw');
      }
    }
  }

  private notify(notice: Notice): void {
    this.emitter.show(notice.title, notice.body, notice.kind, notice.data);
  }

  // ===========================================================================
  // CONVERSATIONS
  // ===========================================================================

  private async provisionConversation(id: string, peerId: string, now: number): Promise<Conversation> {
    const seed: ChatMessage = {
      id: newMessageId(),
      conversationId: id,
      senderId: SYSTEM_SENDER,
      content: seedMessageContent(peerId),
      createdAt: now,
    };
    const conversation: Conversation = {
      id,
      participantA: this.selfId,
      participantB: peerId,
      createdAt: now,
      updatedAt: now,
      seedMessageId: seed.id,
    };
    await this.conversations.create(conversation);
    try {
      await this.messages.append(seed);
    } catch (err) {
      await this.rollbackConversation(id);
      throw err;
    }
    return conversation;
  }

  private async removeConversation(id: string): Promise<void> {
    await this.messages.deleteByConversation(id);
    await this.conversations.delete(id);
  }

  /** Best-effort cleanup while another error is already propagating. */
  private async rollbackConversation(id: string): Promise<void> {
    try {
      await this.removeConversation(id);
    } catch (err) {
      this.log.error({ err, conversationId: id }, 'Failed to roll back conversation');
    }
  }
}
