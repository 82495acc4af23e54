/**
 * Relay wire protocol.
 */

import { isRecord } from '@parley/service';

/** Message sent over WebSocket to the relay. */
export type RelayOutbound =
  | { type: 'register'; did: string }
  | { type: 'ping' };

/** Message received from the relay over WebSocket. */
export type RelayInbound =
  | { type: 'registered'; did: string }
  | { type: 'message'; from_did: string; payload: string }
  | { type: 'pong' }
  | { type: 'error'; message: string };

/**
 * Narrow a decoded relay frame. Returns null for anything unrecognised.
 */
export function parseRelayInbound(raw: unknown): RelayInbound | null {
  if (!isRecord(raw)) return null;
  switch (raw.type) {
    case 'registered':
      return typeof raw.did === 'string' ? { type: 'registered', did: raw.did } : null;
    case 'message':
      return typeof raw.from_did === 'string' && typeof raw.payload === 'string'
        ? { type: 'message', from_did: raw.from_did, payload: raw.payload }
        : null;
    case 'pong':
      return { type: 'pong' };
    case 'error':
      return { type: 'error', message: typeof raw.message === 'string' ? raw.message : '' };
    default:
      return null;
  }
}
