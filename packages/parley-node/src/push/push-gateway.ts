/**
 * HTTP push notification gateway.
 *
 * Sends invitation traffic through a push server's session endpoint. The
 * server answers `202` with a count of devices it reached; only a count of
 * one or more is reported as delivered.
 */

import {
  ErrorCode,
  ParleyError,
  deliveryReport,
  encodeCancellationData,
  encodeInvitationData,
  encodeResponseData,
  getLogger,
  isRecord,
} from '@parley/service';
import type {
  CancellationPayload,
  DeliveryReport,
  InvitationPayload,
  NotificationGateway,
  PushData,
  ResponsePayload,
} from '@parley/service';

export const SESSION_NOTIFICATION_PATH = '/api/v2/notifications/session';

export interface PushGatewayOptions {
  baseUrl: string;
  appName: string;
  appKey: string;
  /** Per-request timeout (ms). */
  timeoutMs?: number;
}

interface Alert {
  title: string;
  body: string;
}

/** Request body for the session endpoint. */
export interface SessionNotification {
  session_id: string;
  alert: Alert;
  sound: string;
  badge: number;
  data: PushData;
}

export class HttpNotificationGateway implements NotificationGateway {
  private baseUrl: string;
  private log = getLogger().child({ module: 'push' });

  constructor(private readonly options: PushGatewayOptions) {
    // Strip trailing slash
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
  }

  async sendResponse(recipientPeerId: string, payload: ResponsePayload): Promise<DeliveryReport> {
    const accepted = payload.response === 'accepted';
    return this.push(
      recipientPeerId,
      {
        title: accepted ? 'Invitation Accepted' : 'Invitation Declined',
        body: `${payload.responderId} ${accepted ? 'accepted' : 'declined'} your invitation`,
      },
      encodeResponseData(payload),
    );
  }

  async sendInvitation(recipientPeerId: string, payload: InvitationPayload): Promise<DeliveryReport> {
    return this.push(
      recipientPeerId,
      { title: 'New Invitation', body: `${payload.senderId} wants to connect with you` },
      encodeInvitationData(payload),
    );
  }

  async sendCancellation(recipientPeerId: string, payload: CancellationPayload): Promise<DeliveryReport> {
    return this.push(
      recipientPeerId,
      { title: 'Invitation Cancelled', body: `${payload.senderId} cancelled their invitation` },
      encodeCancellationData(payload),
    );
  }

  // ── HTTP ─────────────────────────────────────────────────────────────────

  private async push(sessionId: string, alert: Alert, data: PushData): Promise<DeliveryReport> {
    const request: SessionNotification = {
      session_id: sessionId,
      alert,
      sound: 'default',
      badge: 1,
      data,
    };

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}${SESSION_NOTIFICATION_PATH}`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'X-An-App-Name': this.options.appName,
          'X-An-App-Key': this.options.appKey,
        },
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 30000),
      });
    } catch (err) {
      this.log.error({ err, sessionId, subtype: data.subtype }, 'Push request error');
      throw new ParleyError(ErrorCode.TransportError, `Push request for ${sessionId} failed`, true, err);
    }

    if (res.status !== 202) {
      this.log.warn({ sessionId, status: res.status }, 'Push request rejected');
      return deliveryReport(0);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      this.log.warn({ err, sessionId }, 'Push response was not JSON');
      return deliveryReport(0);
    }

    const sent = isRecord(body) ? body.notifications_sent : undefined;
    if (typeof sent !== 'number' || !Number.isFinite(sent)) {
      this.log.warn({ sessionId }, 'Push response without notifications_sent');
      return deliveryReport(0);
    }
    if (sent < 1) {
      this.log.warn({ sessionId, subtype: data.subtype }, 'Push accepted but no device reached');
    }
    return deliveryReport(sent);
  }
}
