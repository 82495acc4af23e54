/**
 * Identifier generation.
 *
 * Conversation IDs are minted on the accepting device and adopted verbatim by
 * the sender, so they carry their own entropy instead of coming from an
 * allocator: a millisecond timestamp followed by 128 random bits.
 */

import { randomBytes } from 'crypto';
import { v4 as uuidv4 } from 'uuid';

/** Printable ASCII without spaces, short enough for push data limits. */
const TRANSPORT_SAFE_ID = /^[\x21-\x7e]{1,128}$/;

function randomHex(): string {
  return randomBytes(16).toString('hex');
}

/** `chat_<epoch-ms>-<32 hex>` */
export function newConversationId(): string {
  return `chat_${Date.now()}-${randomHex()}`;
}

/** `msg_<epoch-ms>-<uuid v4>` */
export function newMessageId(): string {
  return `msg_${Date.now()}-${uuidv4()}`;
}

/** `inv_<epoch-ms>-<32 hex>` */
export function newInvitationId(): string {
  return `inv_${Date.now()}-${randomHex()}`;
}

/**
 * Whether an identifier received from a peer can be stored and echoed back
 * over JSON and push payloads unchanged.
 */
export function isTransportSafeId(value: string): boolean {
  return TRANSPORT_SAFE_ID.test(value);
}
