import { ErrorCode, ParleyError } from '@parley/service';
import type { MalformedInbound, ResponsePayload } from '@parley/service';
import { createDevice, eventTypes, noticeTitles, pendingInvitation } from '../support/fixtures';
import type { Device } from '../support/fixtures';

const NOW = 9000;

function acceptance(overrides: Partial<ResponsePayload> = {}): ResponsePayload {
  return {
    invitationId: 'inv1',
    responderId: 'B',
    response: 'accepted',
    conversationId: 'chat_xyz',
    timestamp: 5000,
    ...overrides,
  };
}

function truncatedAcceptance(timestamp = 5000): ResponsePayload {
  return { invitationId: 'inv1', responderId: 'B', response: 'accepted', timestamp };
}

const DECLINE: ResponsePayload = {
  invitationId: 'inv1',
  responderId: 'B',
  response: 'declined',
  timestamp: 5000,
};

describe('Response handling on the sender device', () => {
  let a: Device;

  beforeEach(async () => {
    a = createDevice('A', { now: () => NOW });
    await a.invitations.create(pendingInvitation());
  });

  test('adopts the conversation ID minted by the accepter', async () => {
    const outcome = await a.controller.handleResponse(acceptance());

    expect(outcome.kind).toBe('adopted');
    await expect(a.invitations.get('inv1')).resolves.toEqual({
      ...pendingInvitation(),
      status: 'accepted',
      respondedAt: 5000,
      conversationId: 'chat_xyz',
    });
    await expect(a.conversations.get('chat_xyz')).resolves.toEqual({
      id: 'chat_xyz',
      participantA: 'A',
      participantB: 'B',
      createdAt: NOW,
      updatedAt: NOW,
      seedMessageId: expect.stringMatching(/^msg_/),
    });
    const [seed] = await a.messages.listByConversation('chat_xyz');
    expect(seed.content).toBe('You are now connected with B. Start chatting!');
  });

  test('notifies the sender once', async () => {
    await a.controller.handleResponse(acceptance());

    expect(a.emitter.show).toHaveBeenCalledWith(
      'Invitation Accepted',
      'B accepted your invitation',
      'invitation_accepted',
      { invitationId: 'inv1', peerId: 'B', conversationId: 'chat_xyz' },
    );
    expect(eventTypes(a)).toEqual(['invitationAccepted', 'conversationCreated']);
  });

  test('records the conversation ID in the response cache', async () => {
    await a.controller.handleResponse(acceptance());
    await expect(a.responseCache.recall('inv1')).resolves.toBe('chat_xyz');
  });

  test('a redelivered acceptance is a no-op', async () => {
    await a.controller.handleResponse(acceptance());
    const outcome = await a.controller.handleResponse(acceptance());

    expect(outcome.kind).toBe('duplicate');
    await expect(a.conversations.list()).resolves.toHaveLength(1);
    expect(a.emitter.show).toHaveBeenCalledTimes(1);
  });

  test('concurrent duplicates are serialised', async () => {
    const outcomes = await Promise.all([
      a.controller.handleResponse(acceptance()),
      a.controller.handleResponse(acceptance()),
    ]);

    expect(outcomes.map((o) => o.kind)).toEqual(['adopted', 'duplicate']);
    await expect(a.conversations.list()).resolves.toHaveLength(1);
  });

  test('applies a decline', async () => {
    const outcome = await a.controller.handleResponse(DECLINE);

    expect(outcome).toEqual({
      kind: 'declined',
      invitation: { ...pendingInvitation(), status: 'declined', respondedAt: 5000 },
    });
    await expect(a.conversations.list()).resolves.toEqual([]);
    expect(noticeTitles(a)).toEqual(['Invitation Declined']);
    expect(a.emitter.show.mock.calls[0][1]).toBe('B declined your invitation');
  });

  test('a redelivered decline is a no-op', async () => {
    await a.controller.handleResponse(DECLINE);
    await expect(a.controller.handleResponse(DECLINE)).resolves.toMatchObject({ kind: 'duplicate' });
  });

  test('a contradicting response no newer than the settled one is ignored', async () => {
    await a.controller.handleResponse(acceptance());
    await expect(a.controller.handleResponse(DECLINE)).resolves.toMatchObject({ kind: 'duplicate' });
    await expect(a.invitations.get('inv1')).resolves.toMatchObject({ status: 'accepted', conversationId: 'chat_xyz' });

    await a.invitations.create(pendingInvitation({ id: 'inv2' }));
    await a.controller.handleResponse({ ...DECLINE, invitationId: 'inv2' });
    await expect(
      a.controller.handleResponse(acceptance({ invitationId: 'inv2', timestamp: 4000 })),
    ).resolves.toMatchObject({ kind: 'duplicate' });
    await expect(a.invitations.get('inv2')).resolves.toMatchObject({ status: 'declined' });
    expect((await a.conversations.list()).map((c) => c.id)).toEqual(['chat_xyz']);
  });

  test('a newer acceptance replaces a decline', async () => {
    await a.controller.handleResponse(DECLINE);

    const outcome = await a.controller.handleResponse(acceptance({ timestamp: 6000 }));

    expect(outcome.kind).toBe('adopted');
    await expect(a.invitations.get('inv1')).resolves.toEqual({
      ...pendingInvitation(),
      status: 'accepted',
      respondedAt: 6000,
      conversationId: 'chat_xyz',
    });
    expect(eventTypes(a)).toEqual(['invitationDeclined', 'invitationAccepted', 'conversationCreated']);
  });

  test('a response to a cancelled invitation is rejected', async () => {
    await a.controller.cancel('inv1');

    await expect(a.controller.handleResponse(acceptance())).rejects.toMatchObject({
      code: ErrorCode.InvalidState,
      message: 'Invitation inv1 was cancelled before the response arrived',
    });
    await expect(a.conversations.list()).resolves.toEqual([]);
  });

  test('a responder other than the recipient is rejected', async () => {
    await expect(a.controller.handleResponse(acceptance({ responderId: 'C' }))).rejects.toMatchObject({
      code: ErrorCode.MalformedPayload,
      message: 'C is not the recipient of invitation inv1',
    });
    await expect(a.invitations.get('inv1')).resolves.toEqual(pendingInvitation());
  });

  test('a response to an invitation we did not send is rejected', async () => {
    await a.invitations.create(pendingInvitation({ id: 'inv9', senderId: 'B', recipientId: 'A' }));

    await expect(
      a.controller.handleResponse(acceptance({ invitationId: 'inv9', responderId: 'A' })),
    ).rejects.toMatchObject({
      code: ErrorCode.MalformedPayload,
      message: 'Invitation inv9 was not sent by A',
    });
  });

  test('a response for an unknown invitation is NotFound', async () => {
    await expect(
      a.controller.handleResponse(acceptance({ invitationId: 'missing' })),
    ).rejects.toMatchObject({ code: ErrorCode.NotFound });
  });

  test('refuses to adopt an ID that belongs to another peer', async () => {
    await a.conversations.create({
      id: 'chat_xyz',
      participantA: 'A',
      participantB: 'C',
      createdAt: 1,
      updatedAt: 1,
      seedMessageId: 'msg_c',
    });

    await expect(a.controller.handleResponse(acceptance())).rejects.toMatchObject({
      code: ErrorCode.DuplicateId,
      message: 'Conversation chat_xyz already belongs to C',
    });
    await expect(a.invitations.get('inv1')).resolves.toEqual(pendingInvitation());
  });

  describe('truncated acceptances', () => {
    test('recover the ID from the response cache', async () => {
      await a.responseCache.remember('inv1', 'chat_cached');

      const outcome = await a.controller.handleResponse(truncatedAcceptance());

      expect(outcome).toMatchObject({
        kind: 'adopted',
        invitation: { conversationId: 'chat_cached', resyncRequired: false },
        conversation: { id: 'chat_cached', participantA: 'A', participantB: 'B' },
      });
    });

    test('without a cached ID the invitation needs a resync', async () => {
      const outcome = await a.controller.handleResponse(truncatedAcceptance());

      if (outcome.kind !== 'resync_required') {
        throw new Error(`unexpected outcome ${outcome.kind}`);
      }
      expect(outcome.error.code).toBe(ErrorCode.MalformedPayload);
      expect(outcome.invitation).toEqual({
        ...pendingInvitation(),
        status: 'accepted',
        respondedAt: 5000,
        conversationId: null,
        resyncRequired: true,
      });
      await expect(a.invitations.get('inv1')).resolves.toEqual(outcome.invitation);
      await expect(a.conversations.list()).resolves.toEqual([]);
      expect(noticeTitles(a)).toEqual(['Resync Required']);
      expect(eventTypes(a)).toEqual(['resyncRequired']);
    });

    test('a second truncated copy leaves the resync state alone', async () => {
      await a.controller.handleResponse(truncatedAcceptance());
      await expect(a.controller.handleResponse(truncatedAcceptance())).resolves.toMatchObject({
        kind: 'duplicate',
      });
      expect(a.emitter.show).toHaveBeenCalledTimes(1);
    });

    test('a later complete copy clears the resync state', async () => {
      await a.controller.handleResponse(truncatedAcceptance());

      const outcome = await a.controller.handleResponse(acceptance({ timestamp: 6000 }));

      expect(outcome.kind).toBe('adopted');
      await expect(a.invitations.get('inv1')).resolves.toMatchObject({
        status: 'accepted',
        conversationId: 'chat_xyz',
        respondedAt: 5000,
        resyncRequired: false,
      });
    });

    test('completeResync adopts an ID obtained out of band', async () => {
      await a.controller.handleResponse(truncatedAcceptance());

      const result = await a.controller.completeResync('inv1', 'chat_manual');

      expect(result.conversation).toMatchObject({ id: 'chat_manual', participantA: 'A', participantB: 'B' });
      expect(result.invitation).toMatchObject({ conversationId: 'chat_manual', resyncRequired: false });
      expect(eventTypes(a)).toEqual(['resyncRequired', 'invitationAccepted', 'conversationCreated']);
    });

    test('completeResync needs an invitation awaiting resync and a valid ID', async () => {
      await expect(a.controller.completeResync('inv1', 'chat_manual')).rejects.toMatchObject({
        code: ErrorCode.InvalidState,
        message: 'Invitation inv1 is not awaiting resync',
      });

      await a.controller.handleResponse(truncatedAcceptance());
      await expect(a.controller.completeResync('inv1', 'chat manual')).rejects.toMatchObject({
        code: ErrorCode.MalformedPayload,
      });
    });
  });

  describe('acceptances with a different conversation ID', () => {
    beforeEach(async () => {
      await a.controller.handleResponse(acceptance({ conversationId: 'chat_1', timestamp: 5000 }));
    });

    test('a newer acceptance replaces the adopted conversation', async () => {
      const outcome = await a.controller.handleResponse(acceptance({ conversationId: 'chat_2', timestamp: 6000 }));

      expect(outcome.kind).toBe('adopted');
      await expect(a.invitations.get('inv1')).resolves.toMatchObject({
        conversationId: 'chat_2',
        respondedAt: 6000,
      });
      expect((await a.conversations.list()).map((c) => c.id)).toEqual(['chat_2']);
      await expect(a.messages.listByConversation('chat_1')).resolves.toEqual([]);
    });

    test('a newer decline removes the adopted conversation', async () => {
      const outcome = await a.controller.handleResponse({ ...DECLINE, timestamp: 6000 });

      expect(outcome).toEqual({
        kind: 'declined',
        invitation: { ...pendingInvitation(), status: 'declined', respondedAt: 6000 },
      });
      await expect(a.invitations.get('inv1')).resolves.toEqual(outcome.invitation);
      await expect(a.conversations.list()).resolves.toEqual([]);
      await expect(a.messages.listByConversation('chat_1')).resolves.toEqual([]);
      await expect(a.responseCache.recall('inv1')).resolves.toBeNull();
      expect(eventTypes(a)).toEqual(['invitationAccepted', 'conversationCreated', 'invitationDeclined']);
    });

    test('a decline no newer than the acceptance is ignored', async () => {
      const outcome = await a.controller.handleResponse(DECLINE);

      expect(outcome.kind).toBe('duplicate');
      await expect(a.invitations.get('inv1')).resolves.toMatchObject({ status: 'accepted', conversationId: 'chat_1' });
      expect((await a.conversations.list()).map((c) => c.id)).toEqual(['chat_1']);
      await expect(a.responseCache.recall('inv1')).resolves.toBe('chat_1');
    });

    test('an older acceptance is ignored', async () => {
      const outcome = await a.controller.handleResponse(acceptance({ conversationId: 'chat_0', timestamp: 4000 }));

      expect(outcome.kind).toBe('duplicate');
      await expect(a.invitations.get('inv1')).resolves.toMatchObject({ conversationId: 'chat_1' });
      expect((await a.conversations.list()).map((c) => c.id)).toEqual(['chat_1']);
    });
  });
});

describe('Malformed invitation traffic', () => {
  let a: Device;

  const report = (overrides: Partial<MalformedInbound> = {}): MalformedInbound => ({
    kind: 'response',
    response: 'accepted',
    invitationId: 'inv1',
    peerId: null,
    error: new ParleyError(ErrorCode.MalformedPayload, 'Malformed response payload: responderId missing'),
    ...overrides,
  });

  beforeEach(async () => {
    a = createDevice('A', { now: () => NOW });
    await a.invitations.create(pendingInvitation());
  });

  test('an unreadable acceptance of a pending invitation marks it for resync', async () => {
    const matched = await a.controller.handleMalformed(report());

    expect(matched).toEqual({
      ...pendingInvitation(),
      status: 'accepted',
      respondedAt: NOW,
      conversationId: null,
      resyncRequired: true,
    });
    await expect(a.invitations.get('inv1')).resolves.toEqual(matched);
    expect(noticeTitles(a)).toEqual(['Resync Required']);
    expect(eventTypes(a)).toEqual(['resyncRequired']);
  });

  test('a resync can then be completed', async () => {
    await a.controller.handleMalformed(report({ peerId: 'B' }));

    await expect(a.controller.completeResync('inv1', 'chat_1')).resolves.toMatchObject({
      invitation: { status: 'accepted', conversationId: 'chat_1', resyncRequired: false },
    });
  });

  test('an acceptance for a settled invitation changes nothing', async () => {
    await a.controller.handleResponse(acceptance());

    const matched = await a.controller.handleMalformed(report());

    expect(matched).toMatchObject({ status: 'accepted', conversationId: 'chat_xyz' });
    expect(noticeTitles(a)).toEqual(['Invitation Accepted']);
  });

  test('traffic matching no invitation of ours gets a resync notice', async () => {
    await expect(a.controller.handleMalformed(report({ invitationId: 'missing', peerId: 'B' }))).resolves.toBeNull();
    await expect(a.controller.handleMalformed(report({ peerId: 'C' }))).resolves.toBeNull();
    await expect(a.controller.handleMalformed(report({ kind: null, response: null, invitationId: null }))).resolves.toBeNull();

    expect(a.emitter.show.mock.calls.map(([, body, kind, data]) => [body, kind, data])).toEqual([
      [
        'An invitation update from B could not be read. Ask your contact to send it again.',
        'resync_required',
        { invitationId: 'missing', peerId: 'B' },
      ],
      [
        'An invitation update from C could not be read. Ask your contact to send it again.',
        'resync_required',
        { invitationId: 'inv1', peerId: 'C' },
      ],
      [
        'An invitation update could not be read. Ask your contact to send it again.',
        'resync_required',
        { invitationId: null, peerId: null },
      ],
    ]);
    await expect(a.invitations.get('inv1')).resolves.toEqual(pendingInvitation());
    expect(a.events).toEqual([]);
  });

  test('an unreadable decline is only surfaced as a notice', async () => {
    await expect(a.controller.handleMalformed(report({ response: 'declined' }))).resolves.toBeNull();

    expect(noticeTitles(a)).toEqual(['Resync Required']);
    await expect(a.invitations.get('inv1')).resolves.toEqual(pendingInvitation());
  });
});
