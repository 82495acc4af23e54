/**
 * Notification gateway boundary
 *
 * The push-delivery service that carries invitation traffic between two
 * devices. For responses it is also the only channel that carries the
 * conversation ID to the sender, which is why the controller gates commits on
 * its delivery report.
 *
 * @packageDocumentation
 */

import type { CancellationPayload, InvitationPayload, ResponsePayload } from '../types';

/**
 * Per-call delivery outcome.
 *
 * `delivered` means at least one live device of the recipient acknowledged the
 * notification; a gateway that merely accepted the request for delivery must
 * report `delivered: false`.
 */
export interface DeliveryReport {
  delivered: boolean;
  /** Devices the gateway reports as reached */
  notificationsSent: number;
}

export interface NotificationGateway {
  /**
   * Deliver an accept/decline response to the original sender.
   *
   * @throws on transport failure; the caller counts it as a failed attempt
   */
  sendResponse(recipientPeerId: string, payload: ResponsePayload): Promise<DeliveryReport>;

  /** Announce a new invitation to its recipient. */
  sendInvitation(recipientPeerId: string, payload: InvitationPayload): Promise<DeliveryReport>;

  /** Tell the recipient a pending invitation was withdrawn. */
  sendCancellation(recipientPeerId: string, payload: CancellationPayload): Promise<DeliveryReport>;
}

export function deliveryReport(notificationsSent: number): DeliveryReport {
  return { delivered: notificationsSent >= 1, notificationsSent };
}
