/**
 * Parley node: one device's invitation host.
 *
 * Wires together:
 * - File record store (durable state under DATA_DIR)
 * - HTTP push gateway (outbound invitation traffic)
 * - Relay connection (inbound invitation traffic)
 * - Notification feed (local notices)
 * - Invitation controller (the state machine)
 */

import {
  ErrorCode,
  createInvitationController,
  getLogger,
  inspectPushData,
  isParleyError,
} from '@parley/service';
import type {
  InboundEnvelope,
  InvitationController,
  MalformedInbound,
  NotificationGateway,
  RecordStore,
} from '@parley/service';
import type { ParleyNodeConfig } from './config';
import { NotificationFeed } from './local/notification-feed';
import { HttpNotificationGateway } from './push/push-gateway';
import { RelayConnection } from './relay/connection';
import { FileRecordStore } from './storage/file-record-store';

export interface ParleyNodeOverrides {
  records?: RecordStore;
  gateway?: NotificationGateway;
}

/** The peer that originated an inbound payload. */
function originOf(envelope: InboundEnvelope): string {
  switch (envelope.kind) {
    case 'invitation':
    case 'cancellation':
      return envelope.payload.senderId;
    case 'response':
      return envelope.payload.responderId;
  }
}

export class ParleyNode {
  readonly controller: InvitationController;
  readonly notifications: NotificationFeed;
  private relay: RelayConnection;
  private inbound: Promise<void> = Promise.resolve();
  private log = getLogger().child({ module: 'node' });

  constructor(
    private readonly config: ParleyNodeConfig,
    overrides: ParleyNodeOverrides = {},
  ) {
    const records = overrides.records ?? new FileRecordStore(config.dataDir);
    const gateway =
      overrides.gateway ??
      new HttpNotificationGateway({
        baseUrl: config.pushApiUrl,
        appName: config.pushAppName,
        appKey: config.pushAppKey,
      });

    this.notifications = new NotificationFeed(records);
    this.controller = createInvitationController({
      selfId: config.peerId,
      records,
      gateway,
      emitter: this.notifications,
      delivery: config.delivery,
    });

    this.relay = new RelayConnection({
      url: config.relayUrl,
      did: config.peerId,
      keepaliveInterval: config.keepaliveInterval,
      maxReconnectDelay: config.maxReconnectDelay,
    });
    this.relay.on('envelope', (envelope, fromDid) => {
      this.enqueue(() => this.receive(envelope, fromDid));
    });
    this.relay.on('malformed', (report, fromDid) => {
      this.enqueue(() => this.receiveMalformed(report, fromDid));
    });
  }

  /** Connect the inbound relay channel. */
  start(): void {
    this.log.info({ peerId: this.config.peerId, relayUrl: this.config.relayUrl }, 'Starting Parley node');
    this.relay.connect();
  }

  /** Disconnect and wait for queued inbound work and notice writes. */
  async stop(): Promise<void> {
    this.log.info('Stopping Parley node');
    this.relay.disconnect();
    await this.inbound;
    await this.notifications.flush();
    this.log.info('Parley node stopped');
  }

  /**
   * Apply push data handed over by a platform push service.
   *
   * Invitation traffic that fails validation is surfaced through
   * {@link receiveMalformed} rather than dropped.
   *
   * @returns false if the data was not invitation traffic or was rejected
   */
  async receivePush(raw: unknown): Promise<boolean> {
    const inspection = inspectPushData(raw, Date.now());
    switch (inspection.kind) {
      case 'unsupported':
        this.log.debug({ err: inspection.error }, 'Ignoring push data that is not invitation traffic');
        return false;
      case 'malformed':
        await this.receiveMalformed(inspection.report);
        return false;
      case 'envelope':
        return this.receive(inspection.envelope);
    }
  }

  /**
   * Surface invitation traffic that failed validation as a resync.
   *
   * @param fromDid - Relay-authenticated origin, when known
   */
  async receiveMalformed(report: MalformedInbound, fromDid?: string): Promise<void> {
    if (fromDid !== undefined && report.peerId !== null && report.peerId !== fromDid) {
      this.log.warn(
        { kind: report.kind, fromDid, origin: report.peerId },
        'Dropping malformed payload relayed for another peer',
      );
      return;
    }

    try {
      await this.controller.handleMalformed({ ...report, peerId: report.peerId ?? fromDid ?? null });
    } catch (err) {
      this.log.error({ err, invitationId: report.invitationId }, 'Failed to surface malformed payload');
    }
  }

  /**
   * Apply one inbound envelope. Errors are logged, not thrown: the peer that
   * sent the payload cannot act on them.
   *
   * @param fromDid - Relay-authenticated origin, when known
   * @returns whether the controller accepted the payload
   */
  async receive(envelope: InboundEnvelope, fromDid?: string): Promise<boolean> {
    const origin = originOf(envelope);
    if (fromDid !== undefined && fromDid !== origin) {
      this.log.warn({ kind: envelope.kind, fromDid, origin }, 'Dropping payload relayed for another peer');
      return false;
    }

    try {
      await this.controller.handleInbound(envelope);
      return true;
    } catch (err) {
      if (
        isParleyError(err, ErrorCode.MalformedPayload) ||
        isParleyError(err, ErrorCode.NotFound) ||
        isParleyError(err, ErrorCode.InvalidState)
      ) {
        this.log.warn({ err, kind: envelope.kind, origin }, 'Inbound payload rejected');
      } else {
        this.log.error({ err, kind: envelope.kind, origin }, 'Failed to apply inbound payload');
      }
      return false;
    }
  }

  private enqueue(work: () => Promise<unknown>): void {
    this.inbound = this.inbound.then(async () => {
      await work();
    });
  }
}
