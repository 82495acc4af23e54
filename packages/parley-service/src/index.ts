/**
 * # Parley Service
 *
 * Contact invitations between two devices that share no database.
 *
 * An invitation moves from `pending` to `accepted`, `declined` or
 * `cancelled`. Accepting mints the conversation ID on the recipient's device
 * and carries it to the sender inside the response notification; the
 * acceptance is kept only once that notification is confirmed delivered.
 *
 * ## Architecture
 *
 * ```
 * ┌──────────────────────────────────────────────────────────┐
 * │                 Host (UI, @parley/node)                  │
 * └──────────────────────────────────────────────────────────┘
 *            │ accept/decline/send        ▲ events, notices
 *            ▼                            │
 * ┌──────────────────────────────────────────────────────────┐
 * │               InvitationController                       │
 * │  • state machine under a per-invitation lock             │
 * │  • delivery-gated commit with compensation               │
 * │  • sender-side conversation ID adoption                  │
 * └──────────────────────────────────────────────────────────┘
 *        │                    │                    │
 *        ▼                    ▼                    ▼
 *  ┌────────────┐     ┌───────────────┐    ┌──────────────┐
 *  │  Stores    │     │ Notification  │    │ Local notice │
 *  │ (records)  │     │   Gateway     │    │   emitter    │
 *  └────────────┘     └───────────────┘    └──────────────┘
 * ```
 *
 * ## Usage
 *
 * ```typescript
 * import { createInvitationController, MemoryRecordStore } from '@parley/service';
 *
 * const controller = createInvitationController({
 *   selfId: 'alice',
 *   records: new MemoryRecordStore(),
 *   gateway,
 *   emitter,
 * });
 *
 * const unsubscribe = controller.onInvitationEvent((event) => {
 *   console.log('Invitation event:', event.type);
 * });
 * await controller.send('bob', 'Hi Bob');
 * ```
 *
 * @packageDocumentation
 */

import { InvitationController } from './invitations/controller';
import type { InvitationControllerDeps } from './invitations/controller';
import { ConversationStore } from './storage/conversation-store';
import { InvitationStore } from './storage/invitation-store';
import { MessageStore } from './storage/message-store';
import type { RecordStore } from './storage/record-store';
import { ResponseCache } from './storage/response-cache';

export * from './types';
export { ErrorCode, ParleyError, isParleyError, toParleyError } from './errors';
export {
  isTransportSafeId,
  newConversationId,
  newInvitationId,
  newMessageId,
} from './ids';
export {
  buildResponsePayload,
  parseCancellationPayload,
  parseEnvelope,
  parseInvitationPayload,
  parseResponsePayload,
} from './payloads';
export {
  PUSH_TYPE,
  decodePushData,
  encodeCancellationData,
  encodeInvitationData,
  encodePushData,
  encodeResponseData,
  inspectPushData,
} from './adapters/push-data';
export type { PushData, PushInspection, PushSubtype } from './adapters/push-data';
export { deliveryReport } from './notifications/gateway';
export type { DeliveryReport, NotificationGateway } from './notifications/gateway';
export { quietEmitter } from './notifications/emitter';
export type { LocalNotificationEmitter } from './notifications/emitter';
export {
  DEFAULT_DELIVERY_POLICY,
  deliverWithRetry,
  retryDelay,
  sleep,
} from './notifications/delivery';
export type {
  BackoffKind,
  DeliveryOutcome,
  DeliveryPolicy,
  Sleep,
} from './notifications/delivery';
export { MemoryRecordStore } from './storage/record-store';
export type { RecordStore } from './storage/record-store';
export { INVITATIONS_COLLECTION, InvitationStore, collect } from './storage/invitation-store';
export { CONVERSATIONS_COLLECTION, ConversationStore } from './storage/conversation-store';
export { MESSAGES_COLLECTION, MessageStore } from './storage/message-store';
export { RESPONSE_CACHE_COLLECTION, ResponseCache } from './storage/response-cache';
export { InvitationController, SYSTEM_SENDER } from './invitations/controller';
export type { InvitationControllerDeps } from './invitations/controller';
export { RESYNC_MESSAGE, UNREACHABLE_MESSAGE } from './invitations/notices';
export { KeyedMutex } from './util/keyed-mutex';
export { isRecord } from './util/guards';
export { getLogger, initLogger } from './util/logger';
export type { Logger } from './util/logger';

export type CreateInvitationControllerOptions = Omit<
  InvitationControllerDeps,
  'invitations' | 'conversations' | 'messages' | 'responseCache'
> & {
  /** Backing store for every collection the controller uses */
  records: RecordStore;
};

/**
 * Build a controller with all of its stores on one record store.
 */
export function createInvitationController(options: CreateInvitationControllerOptions): InvitationController {
  const { records, ...rest } = options;
  return new InvitationController({
    ...rest,
    invitations: new InvitationStore(records),
    conversations: new ConversationStore(records),
    messages: new MessageStore(records),
    responseCache: new ResponseCache(records, rest.now),
  });
}
