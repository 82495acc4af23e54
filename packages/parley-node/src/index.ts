/**
 * # Parley Node
 *
 * Node.js host for the Parley invitation core: configuration, file-backed
 * storage, the HTTP push gateway and the relay inbound channel.
 *
 * @packageDocumentation
 */

export { loadConfig } from './config';
export type { ParleyNodeConfig } from './config';
export { ParleyNode } from './host';
export type { ParleyNodeOverrides } from './host';
export { FileRecordStore } from './storage/file-record-store';
export { HttpNotificationGateway, SESSION_NOTIFICATION_PATH } from './push/push-gateway';
export type { PushGatewayOptions, SessionNotification } from './push/push-gateway';
export { RelayConnection } from './relay/connection';
export type { RelayConnectionOptions } from './relay/connection';
export { parseRelayInbound } from './relay/protocol';
export type { RelayInbound, RelayOutbound } from './relay/protocol';
export { NOTIFICATIONS_COLLECTION, NotificationFeed } from './local/notification-feed';
export type { StoredNotice } from './local/notification-feed';
