import { ErrorCode, deliveryReport } from '@parley/service';
import type { ResponsePayload } from '@parley/service';
import { createDevice, eventTypes } from '../support/fixtures';
import type { Device } from '../support/fixtures';

const NOW = 4000;

/** Route each device's outbound notifications straight into the other's controller. */
function link(from: Device, to: Device): void {
  from.gateway.sendInvitation.mockImplementation(async (_recipient, payload) => {
    await to.controller.handleInvitation(payload);
    return deliveryReport(1);
  });
  from.gateway.sendResponse.mockImplementation(async (_sender, payload) => {
    await to.controller.handleResponse(payload);
    return deliveryReport(1);
  });
  from.gateway.sendCancellation.mockImplementation(async (_recipient, payload) => {
    await to.controller.handleCancellation(payload);
    return deliveryReport(1);
  });
}

describe('Two devices exchanging an invitation', () => {
  let a: Device;
  let b: Device;

  beforeEach(() => {
    a = createDevice('A', { now: () => NOW });
    b = createDevice('B', { now: () => NOW });
    link(a, b);
    link(b, a);
  });

  test('both devices end up with the same conversation ID', async () => {
    const { invitation } = await a.controller.send('B', 'hello');
    await expect(b.controller.listIncoming()).resolves.toEqual([invitation]);

    const { conversation } = await b.controller.accept(invitation.id);

    const senderCopy = await a.invitations.get(invitation.id);
    expect(senderCopy).toEqual({
      ...invitation,
      status: 'accepted',
      respondedAt: NOW,
      conversationId: conversation.id,
    });
    await expect(a.conversations.get(conversation.id)).resolves.toMatchObject({
      participantA: 'A',
      participantB: 'B',
    });
    expect(conversation).toMatchObject({ participantA: 'B', participantB: 'A' });
    expect(eventTypes(a)).toEqual(['invitationSent', 'invitationAccepted', 'conversationCreated']);
    expect(eventTypes(b)).toEqual(['invitationReceived', 'invitationAccepted', 'conversationCreated']);
  });

  test('a declined invitation can be resent and accepted', async () => {
    const { invitation } = await a.controller.send('B', 'hello');
    await b.controller.decline(invitation.id);
    await expect(a.invitations.get(invitation.id)).resolves.toMatchObject({ status: 'declined' });

    const resent = await a.controller.resend(invitation.id);
    const { conversation } = await b.controller.accept(resent.invitation.id);

    await expect(a.invitations.get(resent.invitation.id)).resolves.toMatchObject({
      status: 'accepted',
      conversationId: conversation.id,
    });
    await expect(a.controller.canInvite('B')).resolves.toEqual({
      canInvite: false,
      reason: 'You are already connected with this user',
    });
  });

  test('a cancelled invitation can no longer be accepted', async () => {
    const { invitation } = await a.controller.send('B', 'hello');
    await a.controller.cancel(invitation.id);

    await expect(b.controller.accept(invitation.id)).rejects.toMatchObject({
      code: ErrorCode.InvalidState,
      message: `Invitation ${invitation.id} is already cancelled`,
    });
  });

  test('an offline sender leaves both copies pending until a retry gets through', async () => {
    const { invitation } = await a.controller.send('B', 'hello');
    b.gateway.sendResponse.mockResolvedValue(deliveryReport(0));

    await expect(b.controller.accept(invitation.id)).rejects.toMatchObject({
      code: ErrorCode.RecipientUnreachable,
    });
    await expect(b.invitations.get(invitation.id)).resolves.toEqual(invitation);
    await expect(a.invitations.get(invitation.id)).resolves.toEqual(invitation);
    await expect(b.conversations.list()).resolves.toEqual([]);

    link(b, a);
    const { conversation } = await b.controller.accept(invitation.id);

    await expect(a.invitations.get(invitation.id)).resolves.toMatchObject({
      conversationId: conversation.id,
    });
  });

  test('a truncated acceptance is repaired with completeResync', async () => {
    const { invitation } = await a.controller.send('B', 'hello');
    b.gateway.sendResponse.mockImplementation(async (_sender, payload: ResponsePayload) => {
      await a.controller.handleResponse({ ...payload, conversationId: undefined });
      return deliveryReport(1);
    });

    const { conversation } = await b.controller.accept(invitation.id);

    await expect(a.invitations.get(invitation.id)).resolves.toMatchObject({
      status: 'accepted',
      conversationId: null,
      resyncRequired: true,
    });

    await a.controller.completeResync(invitation.id, conversation.id);

    await expect(a.invitations.get(invitation.id)).resolves.toMatchObject({
      conversationId: conversation.id,
      resyncRequired: false,
    });
    await expect(a.conversations.list()).resolves.toHaveLength(1);
  });
});
