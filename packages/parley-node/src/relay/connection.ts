/**
 * Relay WebSocket client.
 *
 * Inbound channel for invitation traffic. Connects to the relay and handles:
 * - Registration with this device's peer ID
 * - Decoding push data carried in relay messages into inbound envelopes
 * - Keepalive pings with exponential backoff reconnection
 */

import WebSocket from 'ws';
import { EventEmitter } from 'events';
import { getLogger, inspectPushData } from '@parley/service';
import type { InboundEnvelope, MalformedInbound } from '@parley/service';
import { parseRelayInbound } from './protocol';
import type { RelayInbound, RelayOutbound } from './protocol';

export interface RelayConnectionOptions {
  url: string;
  did: string;
  keepaliveInterval: number;
  maxReconnectDelay: number;
}

export declare interface RelayConnection {
  on(event: 'envelope', listener: (envelope: InboundEnvelope, fromDid: string) => void): this;
  on(event: 'malformed', listener: (report: MalformedInbound, fromDid: string) => void): this;
  on(event: 'connected', listener: () => void): this;
  on(event: 'disconnected', listener: () => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
}

export class RelayConnection extends EventEmitter {
  private ws: WebSocket | null = null;
  private options: RelayConnectionOptions;
  private reconnectDelay = 1000;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private keepaliveTimer: ReturnType<typeof setInterval> | null = null;
  private isRegistered = false;
  private shouldReconnect = true;
  private log = getLogger().child({ module: 'relay' });

  constructor(options: RelayConnectionOptions) {
    super();
    this.options = options;
  }

  /** Start the WebSocket connection. */
  connect(): void {
    this.shouldReconnect = true;
    this._connect();
  }

  /** Gracefully disconnect and stop reconnecting. */
  disconnect(): void {
    this.shouldReconnect = false;
    this.stopKeepalive();

    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    if (this.ws) {
      this.ws.removeAllListeners();
      this.ws.on('error', (err) => this.log.debug({ err }, 'Error on discarded socket'));
      this.ws.close(1000, 'Parley node shutting down');
      this.ws = null;
    }
    this.isRegistered = false;
  }

  /** Whether the connection is open and registered. */
  get connected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN && this.isRegistered;
  }

  // ── Internal ─────────────────────────────────────────────────────────────

  private _connect(): void {
    if (this.ws) {
      this.ws.removeAllListeners();
      this.ws.on('error', (err) => this.log.debug({ err }, 'Error on discarded socket'));
      this.ws.close();
    }

    this.log.info({ url: this.options.url }, 'Connecting to relay');

    try {
      this.ws = new WebSocket(this.options.url);
    } catch (err) {
      this.log.error({ err }, 'Failed to create WebSocket');
      this.scheduleReconnect();
      return;
    }

    this.ws.on('open', () => {
      this.log.info('WebSocket connected, registering');
      this.reconnectDelay = 1000;
      this.isRegistered = false;
      this._send({ type: 'register', did: this.options.did });
    });

    this.ws.on('message', (data: WebSocket.RawData) => {
      const text = data.toString();
      let decoded: unknown;
      try {
        decoded = JSON.parse(text);
      } catch (err) {
        this.log.warn({ err, data: text.slice(0, 200) }, 'Failed to parse relay message');
        return;
      }
      const msg = parseRelayInbound(decoded);
      if (!msg) {
        this.log.debug({ data: text.slice(0, 200) }, 'Unknown relay message type');
        return;
      }
      this.handleMessage(msg);
    });

    this.ws.on('close', (code, reason) => {
      this.log.info({ code, reason: reason.toString() }, 'WebSocket closed');
      this.isRegistered = false;
      this.stopKeepalive();
      this.emit('disconnected');
      this.scheduleReconnect();
    });

    this.ws.on('error', (err) => {
      this.log.error({ err }, 'WebSocket error');
      // EventEmitter throws on an unhandled 'error'
      if (this.listenerCount('error') > 0) {
        this.emit('error', err);
      }
    });
  }

  private handleMessage(msg: RelayInbound): void {
    switch (msg.type) {
      case 'registered':
        this.log.info({ did: msg.did }, 'Registered with relay');
        this.isRegistered = true;
        this.startKeepalive();
        this.emit('connected');
        break;

      case 'message': {
        let payload: unknown;
        try {
          payload = JSON.parse(msg.payload);
        } catch (err) {
          this.log.debug({ err, from: msg.from_did }, 'Ignoring non-JSON message');
          break;
        }
        const inspection = inspectPushData(payload, Date.now());
        switch (inspection.kind) {
          case 'unsupported':
            this.log.debug({ err: inspection.error, from: msg.from_did }, 'Ignoring non-invitation message');
            break;
          case 'malformed':
            this.log.warn(
              { err: inspection.report.error, from: msg.from_did, invitationId: inspection.report.invitationId },
              'Malformed invitation message',
            );
            this.emit('malformed', inspection.report, msg.from_did);
            break;
          case 'envelope':
            this.emit('envelope', inspection.envelope, msg.from_did);
            break;
        }
        break;
      }

      case 'pong':
        break;

      case 'error':
        this.log.warn({ message: msg.message }, 'Relay error');
        break;
    }
  }

  private _send(msg: RelayOutbound): boolean {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      this.log.warn({ type: msg.type }, 'Cannot send, WebSocket not open');
      return false;
    }

    try {
      this.ws.send(JSON.stringify(msg));
      return true;
    } catch (err) {
      this.log.error({ err, type: msg.type }, 'Failed to send message');
      return false;
    }
  }

  private startKeepalive(): void {
    this.stopKeepalive();
    this.keepaliveTimer = setInterval(() => {
      this._send({ type: 'ping' });
    }, this.options.keepaliveInterval);
  }

  private stopKeepalive(): void {
    if (this.keepaliveTimer) {
      clearInterval(this.keepaliveTimer);
      this.keepaliveTimer = null;
    }
  }

  private scheduleReconnect(): void {
    if (!this.shouldReconnect) return;

    this.log.info({ delay: this.reconnectDelay }, 'Scheduling reconnect');

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this._connect();
    }, this.reconnectDelay);

    // Exponential backoff with jitter
    this.reconnectDelay = Math.min(
      this.reconnectDelay * 2 + Math.random() * 1000,
      this.options.maxReconnectDelay,
    );
  }
}
