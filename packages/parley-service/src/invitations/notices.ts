/**
 * Local notification content for invitation events.
 */

import type { Invitation, LocalNotificationKind } from '../types';

export interface Notice {
  title: string;
  body: string;
  kind: LocalNotificationKind;
  data: Record<string, unknown>;
}

export const UNREACHABLE_MESSAGE =
  'Unable to reach the invitation sender. They may be offline or have notifications disabled. Please try again later.';

export const RESYNC_MESSAGE =
  'The invitation was accepted but the conversation could not be located. Ask your contact to resend it.';

export function sentNotice(invitation: Invitation, delivered: boolean): Notice {
  return {
    title: 'Invitation Sent',
    body: `Invitation sent to ${invitation.recipientId}`,
    kind: 'invitation_sent',
    data: { invitationId: invitation.id, peerId: invitation.recipientId, delivered },
  };
}

export function receivedNotice(invitation: Invitation): Notice {
  return {
    title: 'New Invitation',
    body: `${invitation.senderId} wants to connect with you`,
    kind: 'invitation_received',
    data: { invitationId: invitation.id, peerId: invitation.senderId },
  };
}

/** Shown on the device that took the action. */
export function respondedNotice(invitation: Invitation): Notice {
  const accepted = invitation.status === 'accepted';
  return {
    title: accepted ? 'Invitation Accepted' : 'Invitation Declined',
    body: `You ${accepted ? 'accepted' : 'declined'} the invitation from ${invitation.senderId}`,
    kind: accepted ? 'invitation_accepted' : 'invitation_declined',
    data: {
      invitationId: invitation.id,
      peerId: invitation.senderId,
      conversationId: invitation.conversationId,
    },
  };
}

/** Shown on the sender's device when the peer's response arrives. */
export function responseReceivedNotice(invitation: Invitation): Notice {
  const accepted = invitation.status === 'accepted';
  return {
    title: accepted ? 'Invitation Accepted' : 'Invitation Declined',
    body: `${invitation.recipientId} ${accepted ? 'accepted' : 'declined'} your invitation`,
    kind: accepted ? 'invitation_accepted' : 'invitation_declined',
    data: {
      invitationId: invitation.id,
      peerId: invitation.recipientId,
      conversationId: invitation.conversationId,
    },
  };
}

export function failedNotice(invitation: Invitation): Notice {
  return {
    title: 'Invitation Failed',
    body: UNREACHABLE_MESSAGE,
    kind: 'invitation_failed',
    data: { invitationId: invitation.id, peerId: invitation.senderId },
  };
}

export function cancelledNotice(invitation: Invitation, byMe: boolean): Notice {
  return {
    title: 'Invitation Cancelled',
    body: byMe
      ? `You cancelled your invitation to ${invitation.recipientId}`
      : `${invitation.senderId} cancelled their invitation`,
    kind: 'invitation_cancelled',
    data: { invitationId: invitation.id, peerId: byMe ? invitation.recipientId : invitation.senderId },
  };
}

export function resyncNotice(invitation: Invitation): Notice {
  return {
    title: 'Resync Required',
    body: RESYNC_MESSAGE,
    kind: 'resync_required',
    data: { invitationId: invitation.id, peerId: invitation.recipientId },
  };
}

/** For invitation traffic that arrived unreadable and matched no local invitation. */
export function unreadableNotice(invitationId: string | null, peerId: string | null): Notice {
  const from = peerId === null ? '' : ` from ${peerId}`;
  return {
    title: 'Resync Required',
    body: `An invitation update${from} could not be read. Ask your contact to send it again.`,
    kind: 'resync_required',
    data: { invitationId, peerId },
  };
}

/** Body of the system message that opens every conversation. */
export function seedMessageContent(peerId: string): string {
  return `You are now connected with ${peerId}. Start chatting!`;
}
