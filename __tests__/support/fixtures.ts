/**
 * Shared test fixtures: in-memory devices with jest.fn collaborators.
 */

import {
  ConversationStore,
  InvitationController,
  InvitationStore,
  MemoryRecordStore,
  MessageStore,
  ResponseCache,
  deliveryReport,
} from '@parley/service';
import type {
  CancellationPayload,
  DeliveryPolicy,
  DeliveryReport,
  Invitation,
  InvitationEvent,
  InvitationPayload,
  LocalNotificationKind,
  ResponsePayload,
} from '@parley/service';

export function createGateway() {
  return {
    sendResponse: jest
      .fn<Promise<DeliveryReport>, [string, ResponsePayload]>()
      .mockResolvedValue(deliveryReport(1)),
    sendInvitation: jest
      .fn<Promise<DeliveryReport>, [string, InvitationPayload]>()
      .mockResolvedValue(deliveryReport(1)),
    sendCancellation: jest
      .fn<Promise<DeliveryReport>, [string, CancellationPayload]>()
      .mockResolvedValue(deliveryReport(1)),
  };
}

export function createEmitter() {
  return {
    show: jest.fn<void, [string, string, LocalNotificationKind, Record<string, unknown>]>(),
  };
}

export interface DeviceOptions {
  now?: () => number;
  delivery?: Partial<DeliveryPolicy>;
}

export function createDevice(selfId: string, options: DeviceOptions = {}) {
  const records = new MemoryRecordStore();
  const invitations = new InvitationStore(records);
  const conversations = new ConversationStore(records);
  const messages = new MessageStore(records);
  const responseCache = new ResponseCache(records);
  const gateway = createGateway();
  const emitter = createEmitter();
  const sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
  const events: InvitationEvent[] = [];

  const controller = new InvitationController({
    selfId,
    invitations,
    conversations,
    messages,
    responseCache,
    gateway,
    emitter,
    sleep,
    now: options.now,
    delivery: options.delivery,
  });
  controller.onInvitationEvent((event) => events.push(event));

  return {
    selfId,
    records,
    invitations,
    conversations,
    messages,
    responseCache,
    gateway,
    emitter,
    sleep,
    events,
    controller,
  };
}

export type Device = ReturnType<typeof createDevice>;

export function pendingInvitation(overrides: Partial<Invitation> = {}): Invitation {
  return {
    id: 'inv1',
    senderId: 'A',
    recipientId: 'B',
    message: 'hello',
    status: 'pending',
    createdAt: 1000,
    respondedAt: null,
    conversationId: null,
    resyncRequired: false,
    ...overrides,
  };
}

/** Titles passed to the emitter, in call order. */
export function noticeTitles(device: Device): string[] {
  return device.emitter.show.mock.calls.map(([title]) => title);
}

export function eventTypes(device: Device): string[] {
  return device.events.map((event) => event.type);
}
